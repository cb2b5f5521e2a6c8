export type MigrationStep = "roadmap_tasks" | "team_members" | "platform_settings";

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Raised when a database call inside one migration step fails. The driver
 * error is kept as `cause`.
 */
export class MigrationStepError extends Error {
  constructor(
    readonly step: MigrationStep,
    cause: unknown,
  ) {
    super(`${step} step failed: ${describeError(cause)}`, { cause });
    this.name = "MigrationStepError";
  }
}
