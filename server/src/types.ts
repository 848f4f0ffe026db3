/* types.ts — Shared TypeScript types for the grid swarm simulation */

import type { HandlerFailure, SimEvent } from './events';

export type Direction = 'up' | 'down' | 'left' | 'right';
export type OccupancyPolicy = 'shared' | 'exclusive';
export type MoveError = 'OutOfBounds' | 'Blocked';

export type BehaviorStatus = 'pending' | 'active' | 'completed' | 'aborted' | 'stalled';
export type AbortReason = 'OutOfBounds' | 'NoPath' | 'Cancelled';

/** Integer grid cell. y grows downwards, so `up` is y - 1. */
export interface Cell {
  x: number;
  y: number;
}

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export const DIRECTION_VECTORS: Readonly<Record<Direction, Cell>> = {
  up:    { x: 0,  y: -1 },
  down:  { x: 0,  y: 1 },
  left:  { x: -1, y: 0 },
  right: { x: 1,  y: 0 },
};

export function offset(cell: Cell, direction: Direction): Cell {
  const v = DIRECTION_VECTORS[direction];
  return { x: cell.x + v.x, y: cell.y + v.y };
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function cellKey(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

/** Detection metric: range r covers a (2r+1)×(2r+1) square */
export function chebyshev(a: Cell, b: Cell): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

// ── Entities ─────────────────────────────────────────────────

/** What the grid needs to know about anything that occupies a cell */
export interface Occupant {
  readonly id: number;
  readonly position: Cell;
  readonly detectionRange: number;
  relocate(cell: Cell): void;
}

export interface TargetState {
  id: number;
  position: Cell;
  found: boolean;
  foundBy: number | null;
  foundAtTick: number | null;
}

// ── Actions ──────────────────────────────────────────────────

export interface MoveAction {
  kind: 'move';
  direction: Direction;
  /** Steps left in the current leg, this one included */
  remaining: number;
}

export interface WaitAction {
  kind: 'wait';
}

export interface ScanAction {
  kind: 'scan';
}

export type Action = MoveAction | WaitAction | ScanAction;

export interface ActionResult {
  action: Action;
  outcome: 'ok' | MoveError;
  /** Target ids found by a scan action */
  detected: number[];
}

// ── Snapshots ────────────────────────────────────────────────

export interface BehaviorInfo {
  kind: string;
  status: BehaviorStatus;
  abortReason: AbortReason | null;
}

export interface DroneState {
  id: number;
  name: string;
  position: Cell;
  detectionRange: number;
  behavior: BehaviorInfo | null;
  queued: number;
  lastResult: ActionResult | null;
}

export interface MoveLeg {
  direction: Direction;
  steps: number;
}

/** Everything a UI needs to draw one tick */
export interface TickSnapshot {
  tick: number;
  drones: DroneState[];
  targets: TargetState[];
  /** Events emitted during this tick, in emission order */
  events: SimEvent[];
  handlerFailures: HandlerFailure[];
  unfoundTargets: number;
}
