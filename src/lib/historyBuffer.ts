import { InstrumentKey, PricedObservation } from '../types/markets';

export const DEFAULT_HISTORY_CAPACITY = 5;

export function instrumentKeyOf(obs: PricedObservation): InstrumentKey {
  return {
    eventId: obs.eventId,
    marketKey: obs.marketKey,
    selection: obs.selection,
    handicap: obs.handicap,
  };
}

// JSON array encoding keeps a null handicap distinct from any string value
function encodeKey(key: InstrumentKey): string {
  return JSON.stringify([key.eventId, key.marketKey, key.selection, key.handicap]);
}

/**
 * Fixed-capacity FIFO ring. Oldest entry is overwritten once full.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const end = (this.start + this.count) % this.capacity;
    this.slots[end] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

/**
 * Most recent priced observations per instrument.
 * Not safe to share between engines running concurrently: read-then-append is not atomic.
 */
export class HistoryBuffer {
  private readonly buffers = new Map<string, RingBuffer<PricedObservation>>();

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {}

  get instrumentCount(): number {
    return this.buffers.size;
  }

  history(key: InstrumentKey): readonly PricedObservation[] {
    const ring = this.buffers.get(encodeKey(key));
    return ring ? ring.toArray() : [];
  }

  append(obs: PricedObservation): void {
    const encoded = encodeKey(instrumentKeyOf(obs));
    let ring = this.buffers.get(encoded);
    if (!ring) {
      ring = new RingBuffer<PricedObservation>(this.capacity);
      this.buffers.set(encoded, ring);
    }
    ring.push(obs);
  }
}
