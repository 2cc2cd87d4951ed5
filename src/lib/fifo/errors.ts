export class SchedulerConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scheduler config: ${issues.join("; ")}`);
    this.name = "SchedulerConfigError";
    this.issues = issues;
  }
}
