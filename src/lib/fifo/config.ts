import { z } from "zod";
import { SchedulerConfigError } from "./errors";

export const MIN_SPEED = 0.5;
export const MAX_SPEED = 8;

export const speedSchema = z.number().min(MIN_SPEED).max(MAX_SPEED);

export const schedulerConfigSchema = z.object({
  /** How long a dequeued process stays on the CPU. */
  executionMs: z.number().int().positive().default(2000),
  /** Gap between one process finishing and the next dequeue. */
  pauseMs: z.number().int().nonnegative().default(500),
  speed: speedSchema.default(1),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof schedulerConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function loadSchedulerConfig(input: SchedulerConfigInput = {}): SchedulerConfig {
  const parsed = schedulerConfigSchema.safeParse(input);
  if (!parsed.success) throw new SchedulerConfigError(formatIssues(parsed.error));
  return parsed.data;
}

export function parseSpeed(speed: number): number {
  const parsed = speedSchema.safeParse(speed);
  if (!parsed.success) {
    throw new SchedulerConfigError(formatIssues(parsed.error).map((msg) => `speed: ${msg}`));
  }
  return parsed.data;
}
