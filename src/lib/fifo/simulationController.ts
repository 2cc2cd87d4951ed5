import type { Logger } from "@/lib/logging/logger";
import { parseSpeed } from "./config";
import type { ProcessQueue } from "./processQueue";
import type { ProcessRecord, SchedulerDisplay, SimulationState } from "./types";

export interface SimulationTimings {
  executionMs: number;
  pauseMs: number;
  speed: number;
}

/**
 * Step-driven FIFO executor.
 *
 * A run is a chain of timers: dequeue → hold on CPU for `executionMs` →
 * release → wait `pauseMs` → dequeue again, until the queue is empty. Every
 * timer carries the generation it was scheduled under, and `cancel()` bumps
 * the generation, so a callback that outlives its run does nothing.
 *
 * State and the next timer are settled before the display hears about a
 * transition, so a display that throws cannot stall the run.
 */
export class SimulationController {
  private state: SimulationState = "idle";
  private current: ProcessRecord | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;
  private completed = 0;
  private executionMs: number;
  private pauseMs: number;
  private speed: number;

  constructor(
    private readonly queue: ProcessQueue,
    private readonly display: SchedulerDisplay,
    private readonly logger: Logger,
    timings: SimulationTimings,
  ) {
    this.executionMs = timings.executionMs;
    this.pauseMs = timings.pauseMs;
    this.speed = parseSpeed(timings.speed);
  }

  getState(): SimulationState {
    return this.state;
  }

  getCurrentlyExecuting(): ProcessRecord | null {
    return this.current;
  }

  getCompletedCount(): number {
    return this.completed;
  }

  getSpeed(): number {
    return this.speed;
  }

  /** Takes effect for every interval scheduled after the call. */
  setSpeed(speed: number): void {
    this.speed = parseSpeed(speed);
    this.logger.debug(`speed set to ${this.speed}x`);
  }

  start(): boolean {
    if (this.state !== "idle") {
      this.logger.warn(`start ignored: simulation is ${this.state}`);
      return false;
    }

    this.generation += 1;
    this.state = "running";
    this.logger.info("simulation started", { queued: this.queue.size });
    const generation = this.generation;
    try {
      this.display.onSimulationStarted();
    } finally {
      this.stepOnce(generation);
    }
    return true;
  }

  cancel(): boolean {
    if (this.state === "idle") return false;

    this.clearTimer();
    this.generation += 1;
    const dropped = this.current;
    this.current = null;
    this.state = "idle";
    this.logger.info("simulation cancelled", { dropped: dropped?.id ?? null });
    try {
      if (dropped) this.display.onExecutionEnded(dropped, "cancelled");
    } finally {
      this.display.onSimulationEnded();
    }
    return true;
  }

  private stepOnce(generation: number): void {
    if (generation !== this.generation) return;
    this.timer = null;

    const record = this.queue.dequeue();
    if (!record) {
      this.state = "idle";
      this.logger.info("simulation finished: queue is empty", { completed: this.completed });
      this.display.onSimulationEnded();
      return;
    }

    this.state = "busy";
    this.current = record;
    this.logger.info(`DEQUEUE: processing ${record.id}`, {
      queue: this.queue.peekAll().map((r) => r.id),
    });
    this.schedule(() => this.finishExecution(generation), this.executionMs);
    this.display.onExecutionStarted(record);
  }

  private finishExecution(generation: number): void {
    if (generation !== this.generation) return;
    this.timer = null;

    const finished = this.current;
    this.current = null;
    this.state = "running";
    this.schedule(() => this.stepOnce(generation), this.pauseMs);
    if (!finished) return;

    this.completed += 1;
    this.logger.info(`EXEC: ${finished.id} finished`);
    this.display.onExecutionEnded(finished, "finished");
  }

  private schedule(callback: () => void, baseMs: number): void {
    this.timer = setTimeout(callback, Math.round(baseMs / this.speed));
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
