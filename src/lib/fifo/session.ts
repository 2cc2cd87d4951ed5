import { ConsoleSink, Logger, type LoggerSink } from "@/lib/logging/logger";
import { loadSchedulerConfig, type SchedulerConfig, type SchedulerConfigInput } from "./config";
import { ProcessQueue, SequenceCounter, processId } from "./processQueue";
import { SimulationController } from "./simulationController";
import type { ProcessRecord, SchedulerDisplay, SessionSnapshot } from "./types";

export interface SchedulerSessionOptions {
  display: SchedulerDisplay;
  config?: SchedulerConfigInput;
  /** Defaults to a single console sink. */
  sinks?: LoggerSink[];
}

/**
 * One visualization session: counter, queue and controller wired together.
 * The UI talks only to this object.
 */
export class SchedulerSession {
  readonly config: SchedulerConfig;
  readonly queue: ProcessQueue;
  readonly controller: SimulationController;
  private readonly counter = new SequenceCounter();
  private readonly logger: Logger;
  private readonly unsubscribe: () => void;

  constructor({ display, config, sinks = [new ConsoleSink()] }: SchedulerSessionOptions) {
    this.config = loadSchedulerConfig(config);
    this.logger = new Logger("fifo", sinks, this.config.logLevel);
    this.queue = new ProcessQueue(this.counter);
    this.unsubscribe = this.queue.subscribe((snapshot) => display.onQueueChanged(snapshot));
    this.controller = new SimulationController(this.queue, display, this.logger.child("cpu"), {
      executionMs: this.config.executionMs,
      pauseMs: this.config.pauseMs,
      speed: this.config.speed,
    });
  }

  enqueue(): ProcessRecord {
    const record = this.queue.enqueue();
    this.logger.info(`ENQUEUE: added ${record.id}`, {
      queue: this.queue.peekAll().map((r) => r.id),
    });
    return record;
  }

  start(): boolean {
    return this.controller.start();
  }

  cancel(): boolean {
    return this.controller.cancel();
  }

  setSpeed(speed: number): void {
    this.controller.setSpeed(speed);
  }

  reset(): void {
    this.controller.cancel();
    const removed = this.queue.clear();
    this.logger.info("session reset", { removed, nextId: processId(this.counter.current + 1) });
  }

  getSnapshot(): SessionSnapshot {
    return {
      state: this.controller.getState(),
      queue: this.queue.peekAll(),
      currentlyExecuting: this.controller.getCurrentlyExecuting(),
      enqueuedTotal: this.counter.current,
      completedTotal: this.controller.getCompletedCount(),
    };
  }

  dispose(): void {
    this.controller.cancel();
    this.unsubscribe();
  }
}

export function createSchedulerSession(options: SchedulerSessionOptions): SchedulerSession {
  return new SchedulerSession(options);
}
