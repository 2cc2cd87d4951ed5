import { describe, it, expect, vi } from "vitest";
import { CallbackSink, ConsoleSink, InMemorySink, Logger, type LogEvent } from "./logger";

describe("Logger", () => {
  it("fans events out to every sink", () => {
    const memory = new InMemorySink();
    const received: LogEvent[] = [];
    const logger = new Logger("fifo", [memory]).withSink(new CallbackSink((e) => received.push(e)));

    logger.info("ENQUEUE: added P1", { queue: ["P1"] });

    expect(memory.read()).toHaveLength(1);
    expect(received[0]).toMatchObject({
      level: "info",
      namespace: "fifo",
      message: "ENQUEUE: added P1",
      context: { queue: ["P1"] },
    });
  });

  it("skips events below the minimum level", () => {
    const memory = new InMemorySink();
    const logger = new Logger("fifo", [memory], "warn");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d", new Error("boom"));

    expect(memory.messages()).toEqual(["c", "d"]);
    expect(memory.read()[1].error?.message).toBe("boom");
  });

  it("prefixes child namespaces and shares sinks", () => {
    const memory = new InMemorySink();
    const child = new Logger("fifo", [memory]).child("cpu");

    child.info("hello");

    expect(memory.read()[0].namespace).toBe("fifo:cpu");
  });

  it("gives every event a distinct id", () => {
    const memory = new InMemorySink();
    const logger = new Logger("fifo", [memory]);

    logger.info("one");
    logger.info("two");

    const [first, second] = memory.read();
    expect(second.id).toBeGreaterThan(first.id);
  });

  it("clears the in-memory sink", () => {
    const memory = new InMemorySink();
    new Logger("fifo", [memory]).info("x");

    memory.clear();

    expect(memory.read()).toEqual([]);
  });
});

describe("ConsoleSink", () => {
  it("routes by level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = new Logger("fifo", [new ConsoleSink()]);

    logger.warn("start ignored: simulation is busy");
    logger.info("simulation started", { queued: 2 });

    expect(warn).toHaveBeenCalledWith("[fifo] start ignored: simulation is busy");
    expect(info).toHaveBeenCalledWith("[fifo] simulation started", { queued: 2 });
  });
});
