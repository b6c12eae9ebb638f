import { z } from "zod";
import { formatIssues } from "./config.js";
import type { ConfigOverrides } from "./config.js";
import { ConfigError } from "./errors.js";

// ============================================
// COMMAND LINE OPTIONS
// ============================================

// cac hands numeric-looking values over as numbers, so text flags coerce back
const textFlag = z.coerce.string().optional();

const cliOptionsSchema = z.object({
  preset: textFlag,
  provider: textFlag,
  model: textFlag,
  host: textFlag,
  timeout: z.coerce.number().optional(),
  presets: textFlag,
  help: z.boolean().optional(),
  version: z.boolean().optional(),
});

export interface CliOptions {
  preset: string | undefined;
  /** --help or --version was given; cac has already printed the output. */
  infoOnly: boolean;
  overrides: ConfigOverrides;
}

/**
 * Turn the flags cac parsed into config overrides. Malformed values raise
 * ConfigError, like a bad environment variable.
 */
export function parseCliOptions(raw: Record<string, unknown>): CliOptions {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("command line", formatIssues(parsed.error));
  }

  const options = parsed.data;
  return {
    preset: options.preset,
    infoOnly: options.help === true || options.version === true,
    overrides: {
      provider: options.provider,
      modelName: options.model,
      ollamaHostUrl: options.host,
      requestTimeoutMs: options.timeout,
      presetsPath: options.presets,
    },
  };
}
