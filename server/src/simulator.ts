/**
 * simulator.ts — Tick loop and command boundary for the grid swarm
 *
 * One Simulation owns one grid, one event bus and one set of drones.
 * Each tick every drone takes exactly one step, in ascending id order,
 * and the tick ends with a snapshot that is also kept for replay.
 *
 * Commands (issue, moveLegs, cancel, spawnDrone) run between ticks and
 * throw SimulationError on a bad request; nothing inside a tick throws
 * for a drone-level failure.
 */

import seedrandom from 'seedrandom';
import { type Behavior, chainFromLegs } from './behaviors';
import { parseSimConfig, type SimConfig, type SimConfigInput } from './config';
import { Drone } from './drone';
import { SimulationError } from './errors';
import {
  EventBus,
  type EventHandler,
  type EventPayloads,
  type EventSink,
  type EventType,
  type HandlerFailure,
  makeEvent,
  type SimEvent,
} from './events';
import { GridEnvironment } from './grid';
import { Recorder } from './recorder';
import { type BehaviorRegistry, createDefaultRegistry } from './registry';
import type { Cell, MoveLeg, TickSnapshot } from './types';

export type AssignMode = 'replace' | 'enqueue';

export interface DroneCommand {
  droneId: number;
  /** Behavior spec, resolved through the registry */
  behavior: unknown;
  mode?: AssignMode;
}

export interface SimulationOptions {
  registry?: BehaviorRegistry;
  /** Snapshots kept for replay */
  recorderCapacity?: number;
  /** Events kept for GET /events */
  historyLimit?: number;
}

const DEFAULT_HISTORY_LIMIT = 1000;

export class Simulation implements EventSink {
  readonly config: SimConfig;
  readonly grid: GridEnvironment;
  readonly bus = new EventBus();
  readonly registry: BehaviorRegistry;
  readonly recorder: Recorder;

  private readonly rng: () => number;
  private readonly drones = new Map<number, Drone>();
  private readonly historyLimit: number;
  private currentTick = 0;
  private pending: SimEvent[] = [];
  private history: SimEvent[] = [];
  private lastEvents: SimEvent[] = [];
  private lastFailures: HandlerFailure[] = [];

  constructor(input: SimConfigInput, options: SimulationOptions = {}) {
    this.config = parseSimConfig(input);
    this.registry = options.registry ?? createDefaultRegistry();
    this.recorder = new Recorder(options.recorderCapacity);
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.rng = seedrandom(this.config.seed === undefined ? undefined : String(this.config.seed));

    this.grid = new GridEnvironment(this.config.width, this.config.height, this, {
      occupancy: this.config.occupancy,
      obstacles: this.config.obstacles,
    });
    this.grid.placeTargets(this.config.numTargets, this.rng);
    for (let i = 0; i < this.config.numDrones; i++) {
      this.spawnDrone();
    }
  }

  get tick(): number {
    return this.currentTick;
  }

  // ── Events ─────────────────────────────────────────────────

  emit<K extends EventType>(type: K, payload: EventPayloads[K]): void {
    const event: SimEvent = makeEvent(type, this.currentTick, payload);
    this.pending.push(event);
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    this.bus.emit(event);
  }

  on<K extends EventType>(type: K, handler: EventHandler<K>): () => void {
    return this.bus.on(type, handler);
  }

  onAny(handler: (event: SimEvent) => void): () => void {
    return this.bus.onAny(handler);
  }

  getEventHistory(): SimEvent[] {
    return [...this.history];
  }

  // ── Tick loop ──────────────────────────────────────────────

  step(): TickSnapshot {
    this.currentTick++;
    this.grid.setTick(this.currentTick);

    // Drones spawned by a handler during this tick wait for the next one
    const order = [...this.drones.values()].sort((a, b) => a.id - b.id);
    for (const drone of order) {
      drone.step({
        tick: this.currentTick,
        grid: this.grid,
        events: this,
        retryLimit: this.config.maxRetries,
        passiveSensing: this.config.passiveSensing,
      });
    }

    this.lastEvents = this.pending;
    this.pending = [];
    this.lastFailures = this.bus.drainFailures();

    const snapshot = this.snapshot();
    this.recorder.record(snapshot);
    return snapshot;
  }

  run(ticks: number): TickSnapshot[] {
    const snapshots: TickSnapshot[] = [];
    for (let i = 0; i < ticks; i++) snapshots.push(this.step());
    return snapshots;
  }

  /** State after the last completed tick, with that tick's events */
  snapshot(): TickSnapshot {
    return {
      tick: this.currentTick,
      drones: this.listDrones().map(d => d.getState()),
      targets: this.grid.targets(),
      events: [...this.lastEvents],
      handlerFailures: [...this.lastFailures],
      unfoundTargets: this.grid.unfoundTargetCount(),
    };
  }

  // ── Drones ─────────────────────────────────────────────────

  listDrones(): Drone[] {
    return [...this.drones.values()].sort((a, b) => a.id - b.id);
  }

  findDrone(id: number): Drone | undefined {
    return this.drones.get(id);
  }

  getDrone(id: number): Drone {
    const drone = this.drones.get(id);
    if (!drone) throw new SimulationError('UnknownDrone', `Drone ${id} does not exist`);
    return drone;
  }

  /** Add a drone at `cell`, or at a random free cell */
  spawnDrone(cell?: Cell): Drone {
    let id = 1;
    for (const existing of this.drones.keys()) id = Math.max(id, existing + 1);

    const drone = new Drone(id, cell ?? this.randomFreeCell(), this.config.detectionRange);
    this.grid.placeDrone(drone);
    this.drones.set(id, drone);
    this.emit('drone_spawned', { droneId: id, cell: { ...drone.position } });
    return drone;
  }

  private randomFreeCell(): Cell {
    const free: Cell[] = [];
    for (let y = 0; y < this.grid.height; y++) {
      for (let x = 0; x < this.grid.width; x++) {
        const cell = { x, y };
        if (!this.grid.isPassable(cell)) continue;
        if (this.grid.occupancy === 'exclusive' && this.grid.dronesAt(cell).length > 0) continue;
        free.push(cell);
      }
    }
    if (free.length === 0) {
      throw new SimulationError('InsufficientSpace', 'No free cell left for a drone');
    }
    return free[Math.floor(this.rng() * free.length)];
  }

  // ── Commands ───────────────────────────────────────────────

  createBehavior(spec: unknown): Behavior {
    return this.registry.create(spec, this.grid);
  }

  issue(command: DroneCommand): Behavior {
    const drone = this.getDrone(command.droneId);
    const behavior = this.createBehavior(command.behavior);
    this.assign(drone, behavior, command.mode ?? 'replace');
    return behavior;
  }

  /** All or nothing: every command is resolved before any is applied */
  issueBatch(commands: DroneCommand[]): Behavior[] {
    const resolved = commands.map(c => {
      const mode: AssignMode = c.mode ?? 'replace';
      return { drone: this.getDrone(c.droneId), behavior: this.createBehavior(c.behavior), mode };
    });
    for (const r of resolved) this.assign(r.drone, r.behavior, r.mode);
    return resolved.map(r => r.behavior);
  }

  moveLegs(droneId: number, legs: MoveLeg[], mode: AssignMode = 'replace'): Behavior {
    const drone = this.getDrone(droneId);
    const behavior = chainFromLegs(legs);
    this.assign(drone, behavior, mode);
    return behavior;
  }

  assign(drone: Drone, behavior: Behavior, mode: AssignMode = 'replace'): void {
    if (mode === 'replace') this.clearDrone(drone);
    drone.enqueue(behavior);
  }

  /** Stop the drone and drop its queue. Returns whether anything was queued. */
  cancel(droneId: number): boolean {
    const drone = this.getDrone(droneId);
    const hadWork = !drone.idle;
    this.clearDrone(drone);
    return hadWork;
  }

  private clearDrone(drone: Drone): void {
    const cancelled = drone.clear();
    if (cancelled) {
      this.emit('behavior_aborted', { droneId: drone.id, behavior: cancelled.kind, reason: 'Cancelled' });
    }
  }
}
