import { loadEnvFile } from "node:process";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LogLevel } from "../logger/index.js";

// ============================================
// PROCESS CONFIGURATION
// ============================================

export const GENERATION_PROVIDERS = ["ollama", "mock"] as const;
export type GenerationProvider = (typeof GENERATION_PROVIDERS)[number];

export interface AppConfig {
  provider: GenerationProvider;
  ollamaHostUrl: string;
  modelName: string;
  requestTimeoutMs: number;
  contextWindowSize: number;
  presetsPath: string;
  fallbackSeed: number;
  logLevel: LogLevel;
  logDir: string;
  logToFile: boolean;
  logToConsole: boolean;
}

/** Raw values from the command line, validated like the environment; they win over it. */
export interface ConfigOverrides {
  provider?: string | undefined;
  ollamaHostUrl?: string | undefined;
  modelName?: string | undefined;
  requestTimeoutMs?: number | undefined;
  presetsPath?: string | undefined;
}

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === "true" || value === "1"));

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

// Empty strings count as unset, the way a blank line in .env reads
const blankToUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

export const envSchema = z.object({
  GENERATION_PROVIDER: z.preprocess(blankToUndefined, z.enum(GENERATION_PROVIDERS).default("ollama")),
  OLLAMA_HOST_URL: z.preprocess(blankToUndefined, z.string().url().default("http://localhost:11434")),
  MODEL_NAME: z.preprocess(blankToUndefined, z.string().min(1).default("phi3:mini")),
  REQUEST_TIMEOUT_MS: z.preprocess(blankToUndefined, positiveInt(30_000)),
  CONTEXT_WINDOW_SIZE: z.preprocess(blankToUndefined, positiveInt(8)),
  PRESETS_PATH: z.preprocess(blankToUndefined, z.string().min(1).default("config/default_presets.json")),
  FALLBACK_SEED: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(0)),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.nativeEnum(LogLevel).default(LogLevel.INFO)),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().min(1).default("logs")),
  LOG_TO_FILE: z.preprocess(blankToUndefined, booleanFlag(true)),
  LOG_TO_CONSOLE: z.preprocess(blankToUndefined, booleanFlag(false)),
});

const overridesSchema = z.object({
  provider: z.enum(GENERATION_PROVIDERS).optional(),
  ollamaHostUrl: z.string().url().optional(),
  modelName: z.string().min(1).optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  presetsPath: z.string().min(1).optional(),
});

/**
 * Load a `.env` file into `process.env` if one exists. Returns false when
 * there is no file; any other read error propagates.
 */
export function loadDotEnv(path: string = resolve(process.cwd(), ".env")): boolean {
  try {
    loadEnvFile(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Build the frozen process configuration from environment variables and CLI
 * overrides. Read once at startup; nothing mutates it afterwards.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): Readonly<AppConfig> {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError("environment", formatIssues(parsedEnv.error));
  }

  const parsedOverrides = overridesSchema.safeParse(overrides);
  if (!parsedOverrides.success) {
    throw new ConfigError("command line", formatIssues(parsedOverrides.error));
  }

  const vars = parsedEnv.data;
  const cli = parsedOverrides.data;

  return Object.freeze({
    provider: cli.provider ?? vars.GENERATION_PROVIDER,
    ollamaHostUrl: (cli.ollamaHostUrl ?? vars.OLLAMA_HOST_URL).replace(/\/+$/, ""),
    modelName: cli.modelName ?? vars.MODEL_NAME,
    requestTimeoutMs: cli.requestTimeoutMs ?? vars.REQUEST_TIMEOUT_MS,
    contextWindowSize: vars.CONTEXT_WINDOW_SIZE,
    presetsPath: cli.presetsPath ?? vars.PRESETS_PATH,
    fallbackSeed: vars.FALLBACK_SEED,
    logLevel: vars.LOG_LEVEL,
    logDir: vars.LOG_DIR,
    logToFile: vars.LOG_TO_FILE,
    logToConsole: vars.LOG_TO_CONSOLE,
  });
}
