import { describe, it, expect, vi } from "vitest";
import { ProcessQueue, SequenceCounter, processId } from "./processQueue";

function makeQueue() {
  return new ProcessQueue(new SequenceCounter());
}

describe("ProcessQueue", () => {
  it("returns records in enqueue order with increasing sequence numbers", () => {
    const queue = makeQueue();
    const created = [queue.enqueue(), queue.enqueue(), queue.enqueue()];

    expect(created).toEqual([
      { id: "P1", sequenceNumber: 1 },
      { id: "P2", sequenceNumber: 2 },
      { id: "P3", sequenceNumber: 3 },
    ]);
    expect(queue.peekAll().map((r) => r.id)).toEqual(["P1", "P2", "P3"]);
    expect(queue.size).toBe(3);
  });

  it("dequeues from the head", () => {
    const queue = makeQueue();
    queue.enqueue();
    queue.enqueue();

    expect(queue.dequeue()?.id).toBe("P1");
    expect(queue.peekAll().map((r) => r.id)).toEqual(["P2"]);
    expect(queue.dequeue()?.id).toBe("P2");
    expect(queue.isEmpty()).toBe(true);
  });

  it("treats dequeue on an empty queue as a no-op", () => {
    const queue = makeQueue();
    const listener = vi.fn();
    queue.subscribe(listener);

    expect(queue.dequeue()).toBeUndefined();
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.size).toBe(0);
    expect(listener).not.toHaveBeenCalled();
  });

  it("hands out snapshots that cannot reach the queue", () => {
    const queue = makeQueue();
    queue.enqueue();

    const snapshot = queue.peekAll();
    expect(queue.peekAll()).not.toBe(snapshot);
    expect(queue.peekAll()[0]).not.toBe(snapshot[0]);
    expect(queue.size).toBe(1);
  });

  it("notifies subscribers with the new contents after each change", () => {
    const queue = makeQueue();
    const seen: string[][] = [];
    const unsubscribe = queue.subscribe((snapshot) => seen.push(snapshot.map((r) => r.id)));

    queue.enqueue();
    queue.enqueue();
    queue.dequeue();
    unsubscribe();
    queue.enqueue();

    expect(seen).toEqual([["P1"], ["P1", "P2"], ["P2"]]);
  });

  it("keeps order across compaction of the backing array", () => {
    const queue = makeQueue();
    for (let i = 0; i < 100; i++) queue.enqueue();
    for (let i = 0; i < 70; i++) queue.dequeue();
    queue.enqueue();

    const ids = queue.peekAll().map((r) => r.id);
    expect(ids).toHaveLength(31);
    expect(ids[0]).toBe("P71");
    expect(ids[30]).toBe("P101");
    expect(queue.dequeue()?.sequenceNumber).toBe(71);
  });

  it("never reuses sequence numbers after clear", () => {
    const queue = makeQueue();
    queue.enqueue();
    queue.enqueue();

    expect(queue.clear()).toBe(2);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.enqueue()).toEqual({ id: "P3", sequenceNumber: 3 });
  });

  it("does not notify when clearing an empty queue", () => {
    const queue = makeQueue();
    const listener = vi.fn();
    queue.subscribe(listener);

    expect(queue.clear()).toBe(0);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("processId", () => {
  it("prefixes the sequence number", () => {
    expect(processId(12)).toBe("P12");
  });
});
