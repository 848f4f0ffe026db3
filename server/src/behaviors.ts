/**
 * behaviors.ts — Multi-tick plans built from primitive actions
 *
 * Every behavior follows one lifecycle:
 *   pending → active → completed | aborted | stalled
 *
 * `update` returns exactly one action per call, or null once the behavior
 * has reached a terminal state without acting. `report` feeds the action's
 * outcome back: Blocked is retried up to `retryLimit` extra ticks before the
 * behavior stalls, OutOfBounds aborts it.
 *
 * Chain and Patrol hold other behaviors instead of subclassing them.
 */

import { move, scan, wait } from './actions';
import { SimulationError } from './errors';
import type { GridEnvironment } from './grid';
import { findPath, firstStepToward } from './pathfinding';
import {
  type AbortReason,
  type Action,
  type ActionResult,
  type BehaviorStatus,
  type Cell,
  type Direction,
  type MoveLeg,
  type Occupant,
  type TargetState,
  cellKey,
  manhattan,
  sameCell,
} from './types';

export interface BehaviorContext {
  readonly drone: Occupant;
  readonly grid: GridEnvironment;
  readonly tick: number;
  /** Extra ticks a Blocked move is retried before stalling */
  readonly retryLimit: number;
}

export interface Behavior {
  readonly kind: string;
  readonly status: BehaviorStatus;
  readonly abortReason: AbortReason | null;
  update(ctx: BehaviorContext): Action | null;
  report(result: ActionResult, ctx: BehaviorContext): void;
  cancel(): void;
}

export function isTerminal(status: BehaviorStatus): boolean {
  return status === 'completed' || status === 'aborted' || status === 'stalled';
}

function requireCount(value: number, what: string, min = 0): number {
  if (!Number.isInteger(value) || value < min) {
    throw new SimulationError('InvalidCommand', `${what} must be an integer ≥ ${min}, got ${value}`);
  }
  return value;
}

abstract class BaseBehavior implements Behavior {
  abstract readonly kind: string;

  private state: BehaviorStatus = 'pending';
  private reason: AbortReason | null = null;
  private retries = 0;

  get status(): BehaviorStatus { return this.state; }
  get abortReason(): AbortReason | null { return this.reason; }

  update(ctx: BehaviorContext): Action | null {
    if (isTerminal(this.state)) return null;
    if (this.state === 'pending') {
      this.state = 'active';
      this.start(ctx);
      if (isTerminal(this.state)) return null;
    }
    return this.next(ctx);
  }

  report(result: ActionResult, ctx: BehaviorContext): void {
    if (this.state !== 'active') return;
    switch (result.outcome) {
      case 'ok':
        this.retries = 0;
        this.onSuccess(result, ctx);
        break;
      case 'OutOfBounds':
        this.abort('OutOfBounds');
        break;
      case 'Blocked':
        this.retries++;
        if (this.retries > ctx.retryLimit) this.stall();
        break;
    }
  }

  cancel(): void {
    if (!isTerminal(this.state)) this.abort('Cancelled');
  }

  /** Runs once, on the pending → active transition */
  protected start(_ctx: BehaviorContext): void {}

  protected abstract next(ctx: BehaviorContext): Action | null;

  protected onSuccess(_result: ActionResult, _ctx: BehaviorContext): void {}

  protected complete(): void {
    this.state = 'completed';
  }

  protected abort(reason: AbortReason): void {
    this.state = 'aborted';
    this.reason = reason;
  }

  protected stall(): void {
    this.state = 'stalled';
  }

  /** Take over the failure of a sub-behavior */
  protected failWith(sub: Behavior): void {
    if (sub.status === 'stalled') this.stall();
    else this.abort(sub.abortReason ?? 'Cancelled');
  }
}

// ── Leaf behaviors ───────────────────────────────────────────

export class MoveSteps extends BaseBehavior {
  readonly kind = 'move_steps';
  readonly direction: Direction;
  private remaining: number;

  constructor(direction: Direction, count: number) {
    super();
    this.direction = direction;
    this.remaining = requireCount(count, 'Step count');
  }

  get stepsLeft(): number { return this.remaining; }

  protected next(): Action | null {
    if (this.remaining <= 0) {
      this.complete();
      return null;
    }
    return move(this.direction, this.remaining);
  }

  protected onSuccess(): void {
    this.remaining--;
    if (this.remaining === 0) this.complete();
  }
}

export class Wait extends BaseBehavior {
  readonly kind = 'wait';
  private remaining: number;

  constructor(ticks = 1) {
    super();
    this.remaining = requireCount(ticks, 'Wait ticks');
  }

  protected next(): Action | null {
    if (this.remaining <= 0) {
      this.complete();
      return null;
    }
    return wait();
  }

  protected onSuccess(): void {
    this.remaining--;
    if (this.remaining === 0) this.complete();
  }
}

/** One scan, then done */
export class Scan extends BaseBehavior {
  readonly kind = 'scan';

  protected next(): Action {
    return scan();
  }

  protected onSuccess(): void {
    this.complete();
  }
}

export class MoveToPosition extends BaseBehavior {
  readonly kind = 'move_to';
  readonly target: Cell;
  private path: Direction[] = [];
  private cursor = 0;
  private expected: Cell = { x: -1, y: -1 };

  constructor(target: Cell) {
    super();
    this.target = { x: target.x, y: target.y };
  }

  protected start(ctx: BehaviorContext): void {
    this.plan(ctx);
  }

  protected next(ctx: BehaviorContext): Action | null {
    const here = ctx.drone.position;
    if (sameCell(here, this.target)) {
      this.complete();
      return null;
    }
    // Off the planned route (or ran past its end): plan again from here
    if (this.cursor >= this.path.length || !sameCell(here, this.expected)) {
      if (!this.plan(ctx)) return null;
    }
    return move(this.path[this.cursor], this.path.length - this.cursor);
  }

  protected onSuccess(_result: ActionResult, ctx: BehaviorContext): void {
    this.cursor++;
    this.expected = { ...ctx.drone.position };
    if (sameCell(ctx.drone.position, this.target)) this.complete();
  }

  private plan(ctx: BehaviorContext): boolean {
    if (!ctx.grid.isInBounds(this.target)) {
      this.abort('OutOfBounds');
      return false;
    }
    const path = findPath(ctx.grid, ctx.drone.position, this.target);
    if (!path) {
      this.abort('NoPath');
      return false;
    }
    this.path = path;
    this.cursor = 0;
    this.expected = { ...ctx.drone.position };
    return true;
  }
}

export type ExploreMode = 'frontier' | 'seek';

export interface ExploreOptions {
  /** Moves between scans */
  scanEvery?: number;
  /** Stop after this many successful moves */
  maxSteps?: number;
  /** `seek` heads for the nearest unfound target instead of uncovered cells */
  mode?: ExploreMode;
}

/**
 * Scan, walk toward the closest cell no scan has covered yet, scan again.
 * Done when every target is found, nothing reachable is left uncovered,
 * or the step budget runs out.
 */
export class Explore extends BaseBehavior {
  readonly kind = 'explore';
  readonly mode: ExploreMode;
  private readonly scanEvery: number;
  private readonly maxSteps: number | null;
  private readonly covered = new Set<string>();
  private movesSinceScan = 0;
  private moves = 0;

  constructor(options: ExploreOptions = {}) {
    super();
    this.scanEvery = requireCount(options.scanEvery ?? 1, 'scanEvery', 1);
    this.maxSteps = options.maxSteps === undefined ? null : requireCount(options.maxSteps, 'maxSteps');
    this.mode = options.mode ?? 'frontier';
  }

  get coveredCells(): number { return this.covered.size; }

  protected start(): void {
    // Open with a scan of the starting area
    this.movesSinceScan = this.scanEvery;
  }

  protected next(ctx: BehaviorContext): Action | null {
    if (ctx.grid.unfoundTargetCount() === 0 || this.budgetSpent()) {
      this.complete();
      return null;
    }
    if (this.movesSinceScan >= this.scanEvery) return scan();

    const direction = this.chooseStep(ctx);
    if (!direction) {
      // Cover the cell we stopped on before giving up
      if (this.movesSinceScan > 0) return scan();
      this.complete();
      return null;
    }
    return move(direction, 1);
  }

  protected onSuccess(result: ActionResult, ctx: BehaviorContext): void {
    if (result.action.kind === 'scan') {
      this.cover(ctx);
      this.movesSinceScan = 0;
      if (ctx.grid.unfoundTargetCount() === 0) this.complete();
      return;
    }
    if (result.action.kind === 'move') {
      this.moves++;
      this.movesSinceScan++;
      if (this.budgetSpent()) this.complete();
    }
  }

  private budgetSpent(): boolean {
    return this.maxSteps !== null && this.moves >= this.maxSteps;
  }

  private cover(ctx: BehaviorContext): void {
    const { position, detectionRange: r } = ctx.drone;
    for (let dy = -r; dy <= r; dy++) {
      for (let dx = -r; dx <= r; dx++) {
        const cell = { x: position.x + dx, y: position.y + dy };
        if (ctx.grid.isInBounds(cell)) this.covered.add(cellKey(cell));
      }
    }
  }

  private chooseStep(ctx: BehaviorContext): Direction | null {
    if (this.mode === 'seek') {
      const target = nearestTarget(ctx.drone.position, ctx.grid.unfoundTargets());
      const path = target ? findPath(ctx.grid, ctx.drone.position, target.position) : null;
      if (path && path.length > 0) return path[0];
    }
    const step = firstStepToward(ctx.grid, ctx.drone.position, cell => !this.covered.has(cellKey(cell)));
    return step ? step.direction : null;
  }
}

function nearestTarget(from: Cell, targets: TargetState[]): TargetState | null {
  let best: TargetState | null = null;
  let bestDist = Infinity;
  for (const t of targets) {
    const d = manhattan(from, t.position);
    if (d < bestDist || (d === bestDist && best !== null && t.id < best.id)) {
      best = t;
      bestDist = d;
    }
  }
  return best;
}

// ── Composites ───────────────────────────────────────────────

/** Runs sub-behaviors in order; a failing one ends the chain */
export class Chain extends BaseBehavior {
  readonly kind = 'chain';
  private readonly steps: Behavior[];
  private cursor = 0;

  constructor(steps: Behavior[]) {
    super();
    this.steps = [...steps];
  }

  get current(): Behavior | null {
    return this.steps[this.cursor] ?? null;
  }

  protected next(ctx: BehaviorContext): Action | null {
    while (this.cursor < this.steps.length) {
      const head = this.steps[this.cursor];
      const action = head.update(ctx);
      if (action) return action;
      if (head.status === 'completed') {
        this.cursor++;
        continue;
      }
      if (isTerminal(head.status)) this.failWith(head);
      return null;
    }
    this.complete();
    return null;
  }

  report(result: ActionResult, ctx: BehaviorContext): void {
    const head = this.current;
    if (this.status !== 'active' || !head) return;
    head.report(result, ctx);
    if (head.status === 'completed') {
      this.cursor++;
      if (this.cursor >= this.steps.length) this.complete();
    } else if (isTerminal(head.status)) {
      this.failWith(head);
    }
  }

  cancel(): void {
    this.current?.cancel();
    super.cancel();
  }
}

/**
 * Walks leg by leg through the waypoints, wrapping around. Runs until
 * cancelled unless `loops` is given, in which case it completes after
 * returning to the first waypoint that many times.
 */
export class Patrol extends BaseBehavior {
  readonly kind = 'patrol';
  readonly waypoints: readonly Cell[];
  private readonly loops: number | null;
  private index = 0;
  private leg: MoveToPosition | null = null;
  private arrivals = 0;
  private cycles = 0;

  constructor(waypoints: Cell[], loops?: number) {
    super();
    if (waypoints.length === 0) {
      throw new SimulationError('InvalidCommand', 'Patrol needs at least one waypoint');
    }
    this.waypoints = waypoints.map(w => ({ x: w.x, y: w.y }));
    this.loops = loops === undefined ? null : requireCount(loops, 'Patrol loops', 1);
  }

  get completedLoops(): number { return this.cycles; }

  protected next(ctx: BehaviorContext): Action | null {
    // Waypoints already under the drone are skipped; if all of them are, hold position.
    // At most one lap per tick while holding.
    for (let tries = 0; tries < this.waypoints.length; tries++) {
      if (!this.leg) this.leg = new MoveToPosition(this.waypoints[this.index]);
      const action = this.leg.update(ctx);
      if (action) return action;
      if (this.leg.status !== 'completed') {
        this.failWith(this.leg);
        return null;
      }
      this.arrive();
      if (this.status !== 'active') return null;
    }
    return wait();
  }

  report(result: ActionResult, ctx: BehaviorContext): void {
    const leg = this.leg;
    if (this.status !== 'active' || !leg) return;
    leg.report(result, ctx);
    if (leg.status === 'completed') this.arrive();
    else if (isTerminal(leg.status)) this.failWith(leg);
  }

  cancel(): void {
    this.leg?.cancel();
    super.cancel();
  }

  private arrive(): void {
    if (this.index === 0 && this.arrivals > 0) {
      this.cycles++;
      if (this.loops !== null && this.cycles >= this.loops) {
        this.leg = null;
        this.complete();
        return;
      }
    }
    this.arrivals++;
    this.index = (this.index + 1) % this.waypoints.length;
    this.leg = null;
  }
}

/** `up=3 and down=2` as one queued unit of work */
export function chainFromLegs(legs: MoveLeg[]): Chain {
  return new Chain(legs.map(leg => new MoveSteps(leg.direction, leg.steps)));
}
