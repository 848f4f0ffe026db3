import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  handleSocketCommand,
  runCancelCommand,
  runMoveCommand,
  runSpawnCommand,
  runTextCommand,
} from '../src/handlers';
import { Simulation } from '../src/simulator';
import { behaviorCommandSchema, cancelSchema } from '../src/validation';

describe('command handlers', () => {
  let sim: Simulation;

  beforeEach(() => {
    sim = new Simulation({ width: 5, height: 5 });
    sim.spawnDrone({ x: 0, y: 0 });
  });

  it('runs a text command against the simulation', () => {
    expect(runTextCommand(sim, 'move drone1 right=2')).toEqual({ ok: true, droneId: 1, msg: 'chain (replace)' });
    sim.run(2);
    expect(sim.getDrone(1).position).toEqual({ x: 2, y: 0 });
  });

  it('stops a drone from text', () => {
    runTextCommand(sim, 'wait drone1 4');
    expect(runTextCommand(sim, 'stop drone1')).toEqual({ ok: true, droneId: 1, msg: 'stopped' });
    expect(sim.getDrone(1).idle).toBe(true);
  });

  it('describes move legs', () => {
    const reply = runMoveCommand(sim, {
      droneId: 1,
      legs: [{ direction: 'down', steps: 2 }, { direction: 'right', steps: 1 }],
      mode: 'enqueue',
    });
    expect(reply.msg).toBe('move down=2 and right=1 (enqueue)');
  });

  it('reports whether cancel had work', () => {
    expect(runCancelCommand(sim, { droneId: 1 }).msg).toBe('already idle');
  });

  it('spawns at the requested cell', () => {
    expect(runSpawnCommand(sim, { x: 3, y: 4 })).toEqual({ ok: true, droneId: 2, msg: 'drone2 at (3, 4)' });
  });

  // ── Socket commands ──────────────────────────────────────

  describe('handleSocketCommand', () => {
    it('runs a valid command', () => {
      const reply = handleSocketCommand(cancelSchema, { droneId: 1 }, body => runCancelCommand(sim, body));
      expect(reply).toEqual({ ok: true, droneId: 1, msg: 'already idle' });
    });

    it('rejects a malformed payload', () => {
      const reply = handleSocketCommand(cancelSchema, { droneId: 'one' }, body => runCancelCommand(sim, body));
      expect(reply).toEqual({ ok: false, error: 'Validation failed: droneId: Expected number, received string' });
    });

    it('turns simulation errors into a rejection', () => {
      const reply = handleSocketCommand(
        behaviorCommandSchema,
        { droneId: 9, behavior: { kind: 'scan' } },
        body => ({ ok: true, droneId: body.droneId, msg: sim.issue(body).kind }),
      );
      expect(reply).toEqual({ ok: false, error: 'Drone 9 does not exist', code: 'UnknownDrone' });
    });

    it('hides unexpected errors', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const reply = handleSocketCommand(cancelSchema, { droneId: 1 }, () => {
        throw new Error('disk on fire');
      });
      expect(reply).toEqual({ ok: false, error: 'Internal server error' });
      expect(console.error).toHaveBeenCalledWith('[WS] Command failed:', expect.any(Error));
    });
  });
});
