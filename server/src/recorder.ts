/**
 * recorder.ts — Ring-buffer snapshot recorder for replay
 *
 * Keeps the last N tick snapshots for playback via the REST API.
 * The default holds ~5 minutes at 10Hz.
 */

import type { TickSnapshot } from './types';

export const DEFAULT_CAPACITY = 3000;

export interface RecorderInfo {
  totalRecorded: number;
  bufferedFrames: number;
  oldestTick: number;
  newestTick: number;
}

export class Recorder {
  private frames: TickSnapshot[] = [];
  private writeIndex = 0;
  private totalRecorded = 0;

  constructor(private readonly capacity = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Recorder capacity must be a positive integer, got ${capacity}`);
    }
  }

  record(snapshot: TickSnapshot): void {
    if (this.frames.length < this.capacity) {
      this.frames.push(snapshot);
    } else {
      this.frames[this.writeIndex] = snapshot;
    }

    this.writeIndex = (this.writeIndex + 1) % this.capacity;
    this.totalRecorded++;
  }

  getRange(fromTick: number, toTick: number): TickSnapshot[] {
    return this.frames
      .filter(f => f.tick >= fromTick && f.tick <= toTick)
      .sort((a, b) => a.tick - b.tick);
  }

  getRecent(count: number): TickSnapshot[] {
    if (count <= 0) return [];
    const sorted = [...this.frames].sort((a, b) => a.tick - b.tick);
    return sorted.slice(-count);
  }

  getInfo(): RecorderInfo {
    if (this.frames.length === 0) {
      return { totalRecorded: 0, bufferedFrames: 0, oldestTick: 0, newestTick: 0 };
    }
    const sorted = [...this.frames].sort((a, b) => a.tick - b.tick);
    return {
      totalRecorded: this.totalRecorded,
      bufferedFrames: this.frames.length,
      oldestTick: sorted[0].tick,
      newestTick: sorted[sorted.length - 1].tick,
    };
  }
}
