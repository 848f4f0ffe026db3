/* events.ts — Typed, synchronous event bus owned by one simulation instance */

import type { AbortReason, Cell, Direction, MoveError } from './types';

export interface EventPayloads {
  drone_spawned: { droneId: number; cell: Cell };
  move_completed: { droneId: number; from: Cell; to: Cell };
  move_failed: { droneId: number; direction: Direction; reason: MoveError; at: Cell };
  collision: { droneId: number; cell: Cell; others: number[] };
  target_detected: { droneId: number; targetId: number; target: Cell };
  scan_completed: { droneId: number; cell: Cell; found: number };
  behavior_started: { droneId: number; behavior: string };
  behavior_completed: { droneId: number; behavior: string };
  behavior_aborted: { droneId: number; behavior: string; reason: AbortReason };
  behavior_stalled: { droneId: number; behavior: string };
}

export type EventType = keyof EventPayloads;

type EventRecord<K extends EventType> = Readonly<{
  type: K;
  tick: number;
  payload: Readonly<EventPayloads[K]>;
}>;

type EventMap = { [K in EventType]: EventRecord<K> };

export type SimEvent = EventMap[EventType];
export type EventOf<K extends EventType> = EventMap[K];

export type EventHandler<K extends EventType> = (event: EventOf<K>) => void;

/** Anything that can turn a payload into an event stamped with the current tick */
export interface EventSink {
  emit<K extends EventType>(type: K, payload: EventPayloads[K]): void;
}

export interface HandlerFailure {
  type: EventType;
  tick: number;
  error: string;
}

export function isEventOf<K extends EventType>(event: SimEvent, type: K): event is EventOf<K> {
  return event.type === type;
}

export function makeEvent<K extends EventType>(type: K, tick: number, payload: EventPayloads[K]): EventOf<K> {
  const event: EventRecord<K> = Object.freeze({ type, tick, payload: Object.freeze({ ...payload }) });
  return event;
}

type Listener = (event: SimEvent) => void;

export class EventBus {
  private readonly listeners = new Map<EventType, Listener[]>();
  private readonly anyListeners: Listener[] = [];
  private readonly failures: HandlerFailure[] = [];

  /** Register a handler; registrations last until the returned function is called */
  on<K extends EventType>(type: K, handler: EventHandler<K>): () => void {
    const listener: Listener = (event) => {
      if (isEventOf(event, type)) handler(event);
    };
    const list = this.listeners.get(type) ?? [];
    list.push(listener);
    this.listeners.set(type, list);
    return () => {
      const idx = list.indexOf(listener);
      if (idx >= 0) list.splice(idx, 1);
    };
  }

  /** Handlers that see every event, after the type-specific ones */
  onAny(handler: (event: SimEvent) => void): () => void {
    this.anyListeners.push(handler);
    return () => {
      const idx = this.anyListeners.indexOf(handler);
      if (idx >= 0) this.anyListeners.splice(idx, 1);
    };
  }

  /**
   * Dispatch to every handler before returning.
   * A throwing handler is logged and recorded; the rest still run.
   */
  emit(event: SimEvent): void {
    // Snapshot so handlers registered mid-dispatch start with the next event
    const targets = [...(this.listeners.get(event.type) ?? []), ...this.anyListeners];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[EVENT] Handler for ${event.type} failed at tick ${event.tick}:`, err);
        this.failures.push({ type: event.type, tick: event.tick, error: message });
      }
    }
  }

  handlerCount(type: EventType): number {
    return this.listeners.get(type)?.length ?? 0;
  }

  /** Return and forget failures recorded since the last drain */
  drainFailures(): HandlerFailure[] {
    return this.failures.splice(0, this.failures.length);
  }
}
