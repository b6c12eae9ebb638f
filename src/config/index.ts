export { loadConfig, loadDotEnv, envSchema, formatIssues, GENERATION_PROVIDERS } from "./config.js";
export { parseCliOptions } from "./cli-options.js";
export type { CliOptions } from "./cli-options.js";
export type { AppConfig, ConfigOverrides, GenerationProvider } from "./config.js";
export { ConfigError } from "./errors.js";
