/* helpers.ts — Shared fixtures for the engine tests */

import {
  type EventPayloads,
  type EventSink,
  type EventType,
  makeEvent,
  type SimEvent,
} from '../src/events';
import type { Cell, Occupant } from '../src/types';

/** EventSink that just keeps what it is given */
export class RecordingSink implements EventSink {
  readonly events: SimEvent[] = [];
  tick = 0;

  emit<K extends EventType>(type: K, payload: EventPayloads[K]): void {
    this.events.push(makeEvent(type, this.tick, payload));
  }

  types(): EventType[] {
    return this.events.map(e => e.type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

class TestOccupant implements Occupant {
  position: Cell;

  constructor(readonly id: number, x: number, y: number, readonly detectionRange: number) {
    this.position = { x, y };
  }

  relocate(cell: Cell): void {
    this.position = { ...cell };
  }
}

export function occupant(id: number, x: number, y: number, detectionRange = 1): Occupant {
  return new TestOccupant(id, x, y, detectionRange);
}

/** Deterministic stand-in for a seeded rng */
export function sequenceRng(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}
