import { describe, it, expect, beforeEach } from 'vitest';
import { SimulationError } from '../src/errors';
import { GridEnvironment } from '../src/grid';
import { RecordingSink, occupant, sequenceRng } from './helpers';

describe('GridEnvironment', () => {
  let sink: RecordingSink;
  let grid: GridEnvironment;

  beforeEach(() => {
    sink = new RecordingSink();
    grid = new GridEnvironment(5, 5, sink);
  });

  // ── Construction ─────────────────────────────────────────

  describe('construction', () => {
    it('rejects empty or fractional sizes', () => {
      expect(() => new GridEnvironment(0, 5, sink)).toThrow(SimulationError);
      expect(() => new GridEnvironment(5, -1, sink)).toThrow(SimulationError);
      expect(() => new GridEnvironment(2.5, 5, sink)).toThrow(SimulationError);
    });

    it('rejects obstacles outside the grid', () => {
      expect(() => new GridEnvironment(3, 3, sink, { obstacles: [{ x: 3, y: 0 }] }))
        .toThrow(/outside the grid/);
    });

    it('defaults to shared occupancy', () => {
      expect(grid.occupancy).toBe('shared');
    });
  });

  // ── Bounds ───────────────────────────────────────────────

  describe('isInBounds', () => {
    it('accepts the corners', () => {
      expect(grid.isInBounds({ x: 0, y: 0 })).toBe(true);
      expect(grid.isInBounds({ x: 4, y: 4 })).toBe(true);
    });

    it('rejects cells past any edge', () => {
      expect(grid.isInBounds({ x: -1, y: 0 })).toBe(false);
      expect(grid.isInBounds({ x: 0, y: -1 })).toBe(false);
      expect(grid.isInBounds({ x: 5, y: 0 })).toBe(false);
      expect(grid.isInBounds({ x: 0, y: 5 })).toBe(false);
    });
  });

  // ── Movement ─────────────────────────────────────────────

  describe('move', () => {
    it('moves a drone and updates occupancy', () => {
      const d = occupant(1, 0, 0);
      grid.placeDrone(d);

      const result = grid.move(d, 'right');

      expect(result).toEqual({ ok: true, from: { x: 0, y: 0 }, to: { x: 1, y: 0 } });
      expect(d.position).toEqual({ x: 1, y: 0 });
      expect(grid.dronesAt({ x: 0, y: 0 })).toEqual([]);
      expect(grid.dronesAt({ x: 1, y: 0 })).toEqual([1]);
      expect(sink.events).toEqual([
        { type: 'move_completed', tick: 0, payload: { droneId: 1, from: { x: 0, y: 0 }, to: { x: 1, y: 0 } } },
      ]);
    });

    it('treats up as y - 1', () => {
      const d = occupant(1, 2, 2);
      grid.placeDrone(d);
      grid.move(d, 'up');
      expect(d.position).toEqual({ x: 2, y: 1 });
    });

    it('fails OutOfBounds at the edge without mutating anything', () => {
      const d = occupant(1, 0, 0);
      grid.placeDrone(d);

      const result = grid.move(d, 'left');

      expect(result).toEqual({ ok: false, error: 'OutOfBounds', at: { x: 0, y: 0 } });
      expect(d.position).toEqual({ x: 0, y: 0 });
      expect(grid.dronesAt({ x: 0, y: 0 })).toEqual([1]);
      expect(sink.events).toEqual([
        {
          type: 'move_failed',
          tick: 0,
          payload: { droneId: 1, direction: 'left', reason: 'OutOfBounds', at: { x: 0, y: 0 } },
        },
      ]);
    });

    it('fails Blocked on an obstacle', () => {
      const walled = new GridEnvironment(3, 3, sink, { obstacles: [{ x: 1, y: 0 }] });
      const d = occupant(1, 0, 0);
      walled.placeDrone(d);

      expect(walled.move(d, 'right')).toEqual({ ok: false, error: 'Blocked', at: { x: 0, y: 0 } });
      expect(d.position).toEqual({ x: 0, y: 0 });
    });

    it('lets drones share a cell and reports a collision', () => {
      const a = occupant(1, 1, 0);
      const b = occupant(2, 0, 0);
      grid.placeDrone(a);
      grid.placeDrone(b);

      const result = grid.move(b, 'right');

      expect(result.ok).toBe(true);
      expect(grid.dronesAt({ x: 1, y: 0 })).toEqual([1, 2]);
      expect(sink.types()).toEqual(['move_completed', 'collision']);
      expect(sink.events[1].payload).toEqual({ droneId: 2, cell: { x: 1, y: 0 }, others: [1] });
    });

    it('blocks entry to an occupied cell under exclusive occupancy', () => {
      const strict = new GridEnvironment(3, 3, sink, { occupancy: 'exclusive' });
      const a = occupant(1, 1, 0);
      const b = occupant(2, 0, 0);
      strict.placeDrone(a);
      strict.placeDrone(b);

      expect(strict.move(b, 'right')).toEqual({ ok: false, error: 'Blocked', at: { x: 0, y: 0 } });
      expect(strict.dronesAt({ x: 1, y: 0 })).toEqual([1]);
    });
  });

  // ── Placement ────────────────────────────────────────────

  describe('placeDrone', () => {
    it('rejects out-of-bounds cells', () => {
      expect(() => grid.placeDrone(occupant(1, 5, 0))).toThrow(expect.objectContaining({ code: 'OutOfBounds' }));
    });

    it('rejects obstacles', () => {
      const walled = new GridEnvironment(3, 3, sink, { obstacles: [{ x: 1, y: 1 }] });
      expect(() => walled.placeDrone(occupant(1, 1, 1))).toThrow(expect.objectContaining({ code: 'Blocked' }));
    });

    it('rejects a taken cell only under exclusive occupancy', () => {
      grid.placeDrone(occupant(1, 2, 2));
      expect(() => grid.placeDrone(occupant(2, 2, 2))).not.toThrow();

      const strict = new GridEnvironment(3, 3, sink, { occupancy: 'exclusive' });
      strict.placeDrone(occupant(1, 0, 0));
      expect(() => strict.placeDrone(occupant(2, 0, 0))).toThrow(expect.objectContaining({ code: 'Blocked' }));
    });
  });

  // ── Scanning ─────────────────────────────────────────────

  describe('scan', () => {
    it('finds unfound targets within Chebyshev range in id order', () => {
      grid.addTarget({ x: 3, y: 3 });
      grid.addTarget({ x: 1, y: 1 });
      grid.addTarget({ x: 4, y: 0 });
      grid.setTick(7);
      const d = occupant(1, 2, 2, 1);

      const result = grid.scan(d);

      expect(result.found.map(t => t.id)).toEqual([1, 2]);
      expect(grid.getTarget(1)).toEqual({
        id: 1, position: { x: 3, y: 3 }, found: true, foundBy: 1, foundAtTick: 7,
      });
      expect(grid.getTarget(3)?.found).toBe(false);
      expect(sink.types()).toEqual(['target_detected', 'target_detected', 'scan_completed']);
      expect(sink.events[0].payload).toEqual({ droneId: 1, targetId: 1, target: { x: 3, y: 3 } });
      expect(sink.events[2].payload).toEqual({ droneId: 1, cell: { x: 2, y: 2 }, found: 2 });
    });

    it('is idempotent for targets already found', () => {
      grid.addTarget({ x: 1, y: 0 });
      const d = occupant(1, 0, 0, 1);
      grid.scan(d);
      sink.clear();

      const again = grid.scan(d);

      expect(again.found).toEqual([]);
      expect(sink.types()).toEqual(['scan_completed']);
    });

    it('range 0 sees only the drone cell', () => {
      grid.addTarget({ x: 1, y: 0 });
      grid.addTarget({ x: 0, y: 0 });
      const found = grid.scan(occupant(1, 0, 0, 0)).found;
      expect(found.map(t => t.id)).toEqual([2]);
    });

    it('leaves unfoundTargetCount in step with scans', () => {
      grid.addTarget({ x: 0, y: 0 });
      grid.addTarget({ x: 4, y: 4 });
      expect(grid.unfoundTargetCount()).toBe(2);
      grid.scan(occupant(1, 0, 0, 0));
      expect(grid.unfoundTargetCount()).toBe(1);
      expect(grid.unfoundTargets().map(t => t.id)).toEqual([2]);
    });
  });

  // ── Targets ──────────────────────────────────────────────

  describe('targets', () => {
    it('numbers targets from 1 in placement order', () => {
      expect(grid.addTarget({ x: 4, y: 4 }).id).toBe(1);
      expect(grid.addTarget({ x: 0, y: 0 }).id).toBe(2);
    });

    it('refuses two targets in one cell', () => {
      grid.addTarget({ x: 1, y: 1 });
      expect(() => grid.addTarget({ x: 1, y: 1 })).toThrow(expect.objectContaining({ code: 'Blocked' }));
    });

    it('hands out copies', () => {
      grid.addTarget({ x: 1, y: 1 });
      const [copy] = grid.targets();
      copy.position.x = 3;
      copy.found = true;
      expect(grid.getTarget(1)).toEqual({
        id: 1, position: { x: 1, y: 1 }, found: false, foundBy: null, foundAtTick: null,
      });
    });

    it('places targets with a partial Fisher-Yates shuffle', () => {
      const small = new GridEnvironment(2, 2, sink);
      // free = [(0,0),(1,0),(0,1),(1,1)]
      // i=0: j = 0 + floor(0.99*4) = 3 → (1,1)
      // i=1: j = 1 + floor(0*3) = 1 → (1,0)
      const placed = small.placeTargets(2, sequenceRng([0.99, 0]));
      expect(placed.map(t => t.position)).toEqual([{ x: 1, y: 1 }, { x: 1, y: 0 }]);
    });

    it('skips obstacles and existing targets', () => {
      const small = new GridEnvironment(2, 2, sink, { obstacles: [{ x: 0, y: 0 }] });
      small.addTarget({ x: 1, y: 0 });
      // free = [(0,1),(1,1)]
      const placed = small.placeTargets(2, sequenceRng([0]));
      expect(placed.map(t => t.position)).toEqual([{ x: 0, y: 1 }, { x: 1, y: 1 }]);
    });

    it('throws InsufficientSpace when asked for too many', () => {
      const small = new GridEnvironment(2, 2, sink, { obstacles: [{ x: 0, y: 0 }] });
      expect(() => small.placeTargets(4, sequenceRng([0])))
        .toThrow(expect.objectContaining({ code: 'InsufficientSpace' }));
    });
  });
});
