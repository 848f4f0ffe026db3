/* drone.ts — A drone: position, sensor range, behavior queue, one step per tick */

import { executeAction } from './actions';
import { type Behavior, type BehaviorContext, isTerminal } from './behaviors';
import type { EventSink } from './events';
import type { GridEnvironment } from './grid';
import type { ActionResult, Cell, DroneState, Occupant } from './types';

export interface StepContext {
  tick: number;
  grid: GridEnvironment;
  events: EventSink;
  retryLimit: number;
  /** Scan after every step that was not already a scan */
  passiveSensing: boolean;
}

export class Drone implements Occupant {
  readonly id: number;
  readonly name: string;
  readonly detectionRange: number;
  lastResult: ActionResult | null = null;

  /** Head is the active behavior; the rest wait their turn */
  private readonly queue: Behavior[] = [];
  private cell: Cell;
  /** Head whose behavior_started has gone out, even if it never got to act */
  private announced: Behavior | null = null;

  constructor(id: number, position: Cell, detectionRange: number) {
    this.id = id;
    this.name = `drone${id}`;
    this.cell = { x: position.x, y: position.y };
    this.detectionRange = detectionRange;
  }

  get position(): Cell {
    return { ...this.cell };
  }

  /** Called by the grid only, so its occupancy map stays in step */
  relocate(cell: Cell): void {
    this.cell = { x: cell.x, y: cell.y };
  }

  get activeBehavior(): Behavior | null {
    return this.queue[0] ?? null;
  }

  get queuedBehaviors(): number {
    return Math.max(0, this.queue.length - 1);
  }

  get idle(): boolean {
    return this.queue.length === 0;
  }

  enqueue(behavior: Behavior): void {
    this.queue.push(behavior);
  }

  /**
   * Cancel whatever is running and drop the queue.
   * Returns the behavior that was cancelled, if its start had been announced.
   */
  clear(): Behavior | null {
    const head = this.queue[0];
    this.queue.length = 0;
    if (!head) return null;
    if (head.status === 'pending' && head !== this.announced) return null;
    this.announced = null;
    head.cancel();
    return head;
  }

  step(ctx: StepContext): ActionResult | null {
    let result: ActionResult | null = null;
    const behavior = this.queue[0];

    if (behavior) {
      const bctx: BehaviorContext = {
        drone: this,
        grid: ctx.grid,
        tick: ctx.tick,
        retryLimit: ctx.retryLimit,
      };

      if (behavior.status === 'pending') {
        this.announced = behavior;
        ctx.events.emit('behavior_started', { droneId: this.id, behavior: behavior.kind });
      }

      // A behavior_started handler may have replaced it already
      const action = this.queue[0] === behavior ? behavior.update(bctx) : null;
      if (action) {
        result = executeAction(action, this, ctx.grid);
        this.lastResult = result;
        behavior.report(result, bctx);
      }

      // A handler may have replaced the queue while the action ran
      if (isTerminal(behavior.status) && this.queue[0] === behavior) {
        this.queue.shift();
        this.announceEnd(behavior, ctx.events);
      }
    }

    if (ctx.passiveSensing && result?.action.kind !== 'scan') {
      ctx.grid.scan(this);
    }
    return result;
  }

  getState(): DroneState {
    const active = this.activeBehavior;
    return {
      id: this.id,
      name: this.name,
      position: { ...this.position },
      detectionRange: this.detectionRange,
      behavior: active
        ? { kind: active.kind, status: active.status, abortReason: active.abortReason }
        : null,
      queued: this.queuedBehaviors,
      lastResult: this.lastResult,
    };
  }

  private announceEnd(behavior: Behavior, events: EventSink): void {
    const base = { droneId: this.id, behavior: behavior.kind };
    switch (behavior.status) {
      case 'completed':
        events.emit('behavior_completed', base);
        break;
      case 'stalled':
        events.emit('behavior_stalled', base);
        break;
      default:
        events.emit('behavior_aborted', { ...base, reason: behavior.abortReason ?? 'Cancelled' });
    }
  }
}
