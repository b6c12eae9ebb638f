/**
 * Raised at startup for missing or malformed configuration (environment,
 * CLI flags or the presets file). Fatal: the process reports it and exits.
 */
export class ConfigError extends Error {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.source = source;
    this.issues = issues;
  }
}
