export interface ProcessRecord {
  id: string;
  sequenceNumber: number;
}

// idle: not simulating · running: between steps · busy: a record is on the CPU
export type SimulationState = "idle" | "running" | "busy";

// finished: held for the full execution interval · cancelled: dropped by cancel()
export type ExecutionOutcome = "finished" | "cancelled";

/** Observer the core notifies; the page implements it with React state. */
export interface SchedulerDisplay {
  onQueueChanged(snapshot: readonly ProcessRecord[]): void;
  onExecutionStarted(record: ProcessRecord): void;
  onExecutionEnded(record: ProcessRecord, outcome: ExecutionOutcome): void;
  onSimulationStarted(): void;
  onSimulationEnded(): void;
}

export interface SessionSnapshot {
  state: SimulationState;
  queue: readonly ProcessRecord[];
  currentlyExecuting: ProcessRecord | null;
  enqueuedTotal: number;
  completedTotal: number;
}
