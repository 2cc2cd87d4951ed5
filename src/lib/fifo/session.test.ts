import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InMemorySink } from "@/lib/logging/logger";
import { SchedulerConfigError } from "./errors";
import { createSchedulerSession } from "./session";
import type { SchedulerConfigInput } from "./config";
import type { SchedulerDisplay } from "./types";

function setup(config?: SchedulerConfigInput) {
  const events: string[] = [];
  const display: SchedulerDisplay = {
    onQueueChanged: (snapshot) => events.push(`queue:[${snapshot.map((r) => r.id).join(",")}]`),
    onExecutionStarted: (record) => events.push(`exec:start:${record.id}`),
    onExecutionEnded: () => events.push("exec:end"),
    onSimulationStarted: () => events.push("sim:start"),
    onSimulationEnded: () => events.push("sim:end"),
  };
  const sink = new InMemorySink();
  const session = createSchedulerSession({ display, config, sinks: [sink] });
  return { events, sink, session };
}

describe("SchedulerSession", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("forwards every queue change to the display", () => {
    const { events, session } = setup();

    session.enqueue();
    session.enqueue();
    session.start();
    vi.runAllTimers();

    expect(events).toEqual([
      "queue:[P1]",
      "queue:[P1,P2]",
      "sim:start",
      "queue:[P2]",
      "exec:start:P1",
      "exec:end",
      "queue:[]",
      "exec:start:P2",
      "exec:end",
      "sim:end",
    ]);
  });

  it("logs enqueue, dequeue and completion", () => {
    const { sink, session } = setup();

    session.enqueue();
    session.start();
    vi.runAllTimers();

    expect(sink.messages()).toEqual([
      "ENQUEUE: added P1",
      "simulation started",
      "DEQUEUE: processing P1",
      "EXEC: P1 finished",
      "simulation finished: queue is empty",
    ]);
    expect(sink.read()[0]).toMatchObject({ namespace: "fifo", context: { queue: ["P1"] } });
    expect(sink.read()[2]).toMatchObject({ namespace: "fifo:cpu", context: { queue: [] } });
  });

  it("drops debug events below the configured level", () => {
    const { sink, session } = setup({ logLevel: "warn" });

    session.enqueue();
    session.setSpeed(2);
    session.start();
    session.start();

    expect(sink.messages()).toEqual(["start ignored: simulation is busy"]);
  });

  it("reports totals in the snapshot", () => {
    const { session } = setup();
    session.enqueue();
    session.enqueue();
    session.enqueue();
    session.start();
    vi.advanceTimersByTime(2000);

    expect(session.getSnapshot()).toEqual({
      state: "running",
      queue: [
        { id: "P2", sequenceNumber: 2 },
        { id: "P3", sequenceNumber: 3 },
      ],
      currentlyExecuting: null,
      enqueuedTotal: 3,
      completedTotal: 1,
    });

    vi.runAllTimers();
    expect(session.getSnapshot()).toMatchObject({ state: "idle", queue: [], completedTotal: 3 });
  });

  it("reset cancels the run and empties the queue but keeps counting", () => {
    const { events, session } = setup();
    session.enqueue();
    session.enqueue();
    session.start();
    events.length = 0;

    session.reset();

    expect(events).toEqual(["exec:end", "sim:end", "queue:[]"]);
    expect(session.getSnapshot()).toMatchObject({ state: "idle", queue: [], enqueuedTotal: 2 });
    expect(session.enqueue()).toEqual({ id: "P3", sequenceNumber: 3 });
  });

  it("stops forwarding queue changes after dispose", () => {
    const { events, session } = setup();
    session.enqueue();
    session.dispose();
    events.length = 0;

    session.enqueue();

    expect(events).toEqual([]);
  });

  it("refuses an invalid config", () => {
    expect(() => setup({ executionMs: 0 })).toThrow(SchedulerConfigError);
  });
});
