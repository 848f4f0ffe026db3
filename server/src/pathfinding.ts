/* pathfinding.ts — A* and frontier search over cardinal steps on the grid */

import type { GridEnvironment } from './grid';
import { type Cell, type Direction, DIRECTIONS, DIRECTION_VECTORS, manhattan } from './types';

/** Binary min-heap keyed by f-score for the A* open set; equal scores pop in push order */
class MinHeap {
  private readonly data: { key: number; f: number; seq: number }[] = [];
  private seq = 0;

  get size(): number { return this.data.length; }

  push(key: number, f: number): void {
    this.data.push({ key, f, seq: this.seq++ });
    this.bubbleUp(this.data.length - 1);
  }

  pop(): number | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (last && this.data.length > 0) {
      this.data[0] = last;
      this.sinkDown(0);
    }
    return top?.key;
  }

  private less(i: number, j: number): boolean {
    const a = this.data[i];
    const b = this.data[j];
    return a.f < b.f || (a.f === b.f && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    const tmp = this.data[i];
    this.data[i] = this.data[j];
    this.data[j] = tmp;
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parentIdx = (i - 1) >> 1;
      if (!this.less(i, parentIdx)) break;
      this.swap(i, parentIdx);
      i = parentIdx;
    }
  }

  private sinkDown(i: number): void {
    const length = this.data.length;
    while (true) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let smallest = i;

      if (left < length && this.less(left, smallest)) smallest = left;
      if (right < length && this.less(right, smallest)) smallest = right;
      if (smallest === i) break;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}

/** Walk the came-from chain back to the start and turn it into directions */
function reconstruct(cameFrom: Int32Array, via: Int8Array, startIdx: number, goalIdx: number): Direction[] {
  const steps: Direction[] = [];
  let idx = goalIdx;
  while (idx !== startIdx) {
    steps.push(DIRECTIONS[via[idx]]);
    idx = cameFrom[idx];
  }
  return steps.reverse();
}

/**
 * A* shortest path using cardinal steps only.
 * Returns the directions to walk (empty when start equals goal),
 * or null when the goal is impassable or unreachable.
 */
export function findPath(grid: GridEnvironment, start: Cell, goal: Cell): Direction[] | null {
  if (!grid.isPassable(goal) || !grid.isInBounds(start)) return null;
  if (start.x === goal.x && start.y === goal.y) return [];

  const w = grid.width;
  const total = grid.width * grid.height;
  const toIndex = (c: Cell): number => c.y * w + c.x;

  const gScore = new Int32Array(total).fill(-1);
  const cameFrom = new Int32Array(total).fill(-1);
  const via = new Int8Array(total).fill(-1);
  const closed = new Uint8Array(total);

  const startIdx = toIndex(start);
  const goalIdx = toIndex(goal);
  gScore[startIdx] = 0;

  const heap = new MinHeap();
  heap.push(startIdx, manhattan(start, goal));

  while (heap.size > 0) {
    const currentIdx = heap.pop();
    if (currentIdx === undefined) break;
    if (currentIdx === goalIdx) return reconstruct(cameFrom, via, startIdx, goalIdx);
    if (closed[currentIdx]) continue;
    closed[currentIdx] = 1;

    const cur = { x: currentIdx % w, y: Math.floor(currentIdx / w) };
    const curG = gScore[currentIdx];

    for (let d = 0; d < DIRECTIONS.length; d++) {
      const v = DIRECTION_VECTORS[DIRECTIONS[d]];
      const next = { x: cur.x + v.x, y: cur.y + v.y };
      if (!grid.isPassable(next)) continue;

      const nIdx = toIndex(next);
      if (closed[nIdx]) continue;

      const tentativeG = curG + 1;
      if (gScore[nIdx] === -1 || tentativeG < gScore[nIdx]) {
        gScore[nIdx] = tentativeG;
        cameFrom[nIdx] = currentIdx;
        via[nIdx] = d;
        heap.push(nIdx, tentativeG + manhattan(next, goal));
      }
    }
  }

  return null;
}

/**
 * Breadth-first search for the closest passable cell accepted by `wanted`.
 * Neighbours expand in up, down, left, right order, so ties resolve the same
 * way every run. Returns the first step toward that cell, or null if none
 * is reachable (the start cell itself is never returned).
 */
export function firstStepToward(
  grid: GridEnvironment,
  start: Cell,
  wanted: (cell: Cell) => boolean,
): { direction: Direction; goal: Cell } | null {
  const w = grid.width;
  const total = grid.width * grid.height;
  const seen = new Uint8Array(total);
  const firstDir = new Int8Array(total).fill(-1);

  const queue: Cell[] = [start];
  seen[start.y * w + start.x] = 1;

  for (let head = 0; head < queue.length; head++) {
    const cur = queue[head];
    const curFirst = firstDir[cur.y * w + cur.x];

    for (let d = 0; d < DIRECTIONS.length; d++) {
      const v = DIRECTION_VECTORS[DIRECTIONS[d]];
      const next = { x: cur.x + v.x, y: cur.y + v.y };
      if (!grid.isPassable(next)) continue;
      const nIdx = next.y * w + next.x;
      if (seen[nIdx]) continue;
      seen[nIdx] = 1;
      firstDir[nIdx] = curFirst === -1 ? d : curFirst;
      if (wanted(next)) return { direction: DIRECTIONS[firstDir[nIdx]], goal: next };
      queue.push(next);
    }
  }
  return null;
}
