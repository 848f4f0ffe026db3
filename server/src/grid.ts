/* grid.ts — Bounded 2D grid: occupancy, targets, obstacles and spatial queries */

import { SimulationError } from './errors';
import type { EventSink } from './events';
import {
  type Cell,
  type Direction,
  type MoveError,
  type OccupancyPolicy,
  type Occupant,
  type TargetState,
  cellKey,
  chebyshev,
  offset,
} from './types';

export type MoveResult =
  | { ok: true; from: Cell; to: Cell }
  | { ok: false; error: MoveError; at: Cell };

export interface ScanResult {
  cell: Cell;
  /** Targets that this scan found for the first time, ascending id */
  found: TargetState[];
}

export interface GridOptions {
  occupancy?: OccupancyPolicy;
  obstacles?: Cell[];
}

export class GridEnvironment {
  readonly width: number;
  readonly height: number;
  readonly occupancy: OccupancyPolicy;

  private readonly obstacles = new Set<string>();
  private readonly cells = new Map<string, Set<number>>();
  private readonly targetList: TargetState[] = [];
  private readonly targetCells = new Set<string>();
  private currentTick = 0;

  constructor(width: number, height: number, private readonly events: EventSink, options: GridOptions = {}) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new SimulationError('InvalidConfig', `Grid must be at least 1×1, got ${width}×${height}`);
    }
    this.width = width;
    this.height = height;
    this.occupancy = options.occupancy ?? 'shared';

    for (const cell of options.obstacles ?? []) {
      if (!this.isInBounds(cell)) {
        throw new SimulationError('InvalidConfig', `Obstacle (${cell.x}, ${cell.y}) is outside the grid`);
      }
      this.obstacles.add(cellKey(cell));
    }
  }

  /** Stamp used for `foundAtTick`; set by the simulation before each tick */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  // ── Queries ────────────────────────────────────────────────

  isInBounds(cell: Cell): boolean {
    return Number.isInteger(cell.x) && Number.isInteger(cell.y)
      && cell.x >= 0 && cell.x < this.width
      && cell.y >= 0 && cell.y < this.height;
  }

  isObstacle(cell: Cell): boolean {
    return this.obstacles.has(cellKey(cell));
  }

  /** In bounds and not an obstacle; drones never make a cell impassable */
  isPassable(cell: Cell): boolean {
    return this.isInBounds(cell) && !this.isObstacle(cell);
  }

  dronesAt(cell: Cell): number[] {
    const ids = this.cells.get(cellKey(cell));
    return ids ? [...ids].sort((a, b) => a - b) : [];
  }

  /** Other drones in a cell, excluding `exceptId` */
  occupiedBy(cell: Cell, exceptId: number): number[] {
    return this.dronesAt(cell).filter(id => id !== exceptId);
  }

  targets(): TargetState[] {
    return this.targetList.map(t => ({ ...t, position: { ...t.position } }));
  }

  unfoundTargets(): TargetState[] {
    return this.targets().filter(t => !t.found);
  }

  unfoundTargetCount(): number {
    let n = 0;
    for (const t of this.targetList) if (!t.found) n++;
    return n;
  }

  getTarget(id: number): TargetState | undefined {
    const t = this.targetList.find(target => target.id === id);
    return t ? { ...t, position: { ...t.position } } : undefined;
  }

  // ── Occupants ──────────────────────────────────────────────

  /** Register an occupant at its current position */
  placeDrone(drone: Occupant): void {
    if (!this.isInBounds(drone.position)) {
      throw new SimulationError('OutOfBounds', `Cell (${drone.position.x}, ${drone.position.y}) is outside the grid`);
    }
    if (this.isObstacle(drone.position)) {
      throw new SimulationError('Blocked', `Cell (${drone.position.x}, ${drone.position.y}) is an obstacle`);
    }
    if (this.occupancy === 'exclusive' && this.dronesAt(drone.position).length > 0) {
      throw new SimulationError('Blocked', `Cell (${drone.position.x}, ${drone.position.y}) is occupied`);
    }
    this.occupy(drone.id, drone.position);
  }

  move(drone: Occupant, direction: Direction): MoveResult {
    const from = { ...drone.position };
    const to = offset(from, direction);

    let error: MoveError | null = null;
    if (!this.isInBounds(to)) {
      error = 'OutOfBounds';
    } else if (this.isObstacle(to)) {
      error = 'Blocked';
    } else if (this.occupancy === 'exclusive' && this.occupiedBy(to, drone.id).length > 0) {
      error = 'Blocked';
    }

    if (error) {
      this.events.emit('move_failed', { droneId: drone.id, direction, reason: error, at: { ...from } });
      return { ok: false, error, at: from };
    }

    this.vacate(drone.id, from);
    this.occupy(drone.id, to);
    drone.relocate(to);

    this.events.emit('move_completed', { droneId: drone.id, from: { ...from }, to: { ...to } });
    const others = this.occupiedBy(to, drone.id);
    if (others.length > 0) {
      this.events.emit('collision', { droneId: drone.id, cell: { ...to }, others });
    }
    return { ok: true, from, to: { ...to } };
  }

  scan(drone: Occupant): ScanResult {
    const cell = { ...drone.position };
    const found: TargetState[] = [];

    for (const target of this.targetList) {
      if (target.found) continue;
      if (chebyshev(cell, target.position) > drone.detectionRange) continue;
      target.found = true;
      target.foundBy = drone.id;
      target.foundAtTick = this.currentTick;
      found.push({ ...target, position: { ...target.position } });
      this.events.emit('target_detected', {
        droneId: drone.id,
        targetId: target.id,
        target: { ...target.position },
      });
    }

    this.events.emit('scan_completed', { droneId: drone.id, cell: { ...cell }, found: found.length });
    return { cell, found };
  }

  // ── Targets ────────────────────────────────────────────────

  addTarget(cell: Cell): TargetState {
    if (!this.isInBounds(cell)) {
      throw new SimulationError('OutOfBounds', `Target (${cell.x}, ${cell.y}) is outside the grid`);
    }
    if (this.isObstacle(cell) || this.targetCells.has(cellKey(cell))) {
      throw new SimulationError('Blocked', `Cell (${cell.x}, ${cell.y}) cannot hold another target`);
    }
    const target: TargetState = {
      id: this.targetList.length + 1,
      position: { x: cell.x, y: cell.y },
      found: false,
      foundBy: null,
      foundAtTick: null,
    };
    this.targetList.push(target);
    this.targetCells.add(cellKey(cell));
    return { ...target, position: { ...target.position } };
  }

  /** Scatter `n` targets over distinct free cells (partial Fisher-Yates) */
  placeTargets(n: number, rng: () => number): TargetState[] {
    const free: Cell[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const cell = { x, y };
        if (!this.isObstacle(cell) && !this.targetCells.has(cellKey(cell))) free.push(cell);
      }
    }
    if (n > free.length) {
      throw new SimulationError('InsufficientSpace', `Cannot place ${n} targets: only ${free.length} free cells`);
    }

    const placed: TargetState[] = [];
    for (let i = 0; i < n; i++) {
      const j = i + Math.floor(rng() * (free.length - i));
      const picked = free[j];
      free[j] = free[i];
      free[i] = picked;
      placed.push(this.addTarget(picked));
    }
    return placed;
  }

  // ── Internal ───────────────────────────────────────────────

  private occupy(id: number, cell: Cell): void {
    const key = cellKey(cell);
    const ids = this.cells.get(key) ?? new Set<number>();
    ids.add(id);
    this.cells.set(key, ids);
  }

  private vacate(id: number, cell: Cell): void {
    const key = cellKey(cell);
    const ids = this.cells.get(key);
    if (!ids) return;
    ids.delete(id);
    if (ids.size === 0) this.cells.delete(key);
  }
}
