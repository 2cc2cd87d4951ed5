import type { ProcessRecord } from "./types";

export type QueueListener = (snapshot: readonly ProcessRecord[]) => void;

/** Session-owned source of sequence numbers. Never rewinds. */
export class SequenceCounter {
  private value = 0;

  next(): number {
    this.value += 1;
    return this.value;
  }

  get current(): number {
    return this.value;
  }
}

export function processId(sequenceNumber: number): string {
  return `P${sequenceNumber}`;
}

// Compact the backing array once at least this many heads have been consumed
// and they make up more than half of it.
const COMPACT_THRESHOLD = 32;

export class ProcessQueue {
  private items: ProcessRecord[] = [];
  private head = 0;
  private listeners = new Set<QueueListener>();

  constructor(private readonly counter: SequenceCounter) {}

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  enqueue(): ProcessRecord {
    const sequenceNumber = this.counter.next();
    const record: ProcessRecord = { id: processId(sequenceNumber), sequenceNumber };
    this.items.push(record);
    this.notify();
    return record;
  }

  dequeue(): ProcessRecord | undefined {
    if (this.head >= this.items.length) return undefined;

    const record = this.items[this.head];
    this.head += 1;
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    this.notify();
    return record;
  }

  peekAll(): readonly ProcessRecord[] {
    return this.items.slice(this.head).map((r) => ({ ...r }));
  }

  clear(): number {
    const removed = this.size;
    this.items = [];
    this.head = 0;
    if (removed > 0) this.notify();
    return removed;
  }

  subscribe(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify() {
    if (this.listeners.size === 0) return;
    const snapshot = this.peekAll();
    for (const listener of this.listeners) listener(snapshot);
  }
}
