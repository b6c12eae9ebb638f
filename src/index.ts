#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { cac } from "cac";
import { z } from "zod";
import { ConfigError, loadConfig, loadDotEnv, parseCliOptions } from "./config/index.js";
import { createLogger, setDefaultLogger } from "./logger/index.js";
import type { AppLogger } from "./logger/index.js";
import { createGenerationClient } from "./llm/index.js";
import { FallbackResponder } from "./fallback/index.js";
import { ChatSession } from "./conversation/index.js";
import { DEFAULT_PROFILE, loadPresets } from "./personality/index.js";
import { ChatShell } from "./shell/index.js";

// ============================================
// MAIN FUNCTION
// ============================================
let logger: AppLogger | null = null;

/**
 * Flush and close the logger.
 */
async function cleanup(): Promise<void> {
  if (logger) {
    await logger.close();
  }
}

async function shutdown(code: number): Promise<never> {
  try {
    await cleanup();
  } catch (cleanupError) {
    console.error("Error during cleanup:", cleanupError);
  }
  process.exit(code);
}

process.on("unhandledRejection", (reason) => {
  console.error("[Unhandled Rejection]", reason);
  void shutdown(1);
});

process.on("uncaughtException", (error) => {
  console.error("[Uncaught Exception]", error);
  void shutdown(1);
});

process.on("SIGINT", () => {
  console.log("\n[Shutdown] Received SIGINT, cleaning up...");
  void shutdown(0);
});

process.on("SIGTERM", () => {
  console.log("\n[Shutdown] Received SIGTERM, cleaning up...");
  void shutdown(0);
});

function readVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
  const packageJson = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, "utf-8")));
  return packageJson.version;
}

/**
 * Parse flags, load configuration and presets, wire the session and run the
 * shell until the user quits.
 */
async function main(): Promise<void> {
  const cli = cac("personality-designer");
  cli
    .option("--preset <name>", "Start with this preset instead of the default profile")
    .option("--provider <provider>", "Generation backend: ollama or mock")
    .option("--model <name>", "Model name, e.g. phi3:mini")
    .option("--host <url>", "Ollama base URL, e.g. http://localhost:11434")
    .option("--timeout <ms>", "Request timeout in milliseconds")
    .option("--presets <path>", "Path to the presets JSON file");
  cli.help();
  cli.version(readVersion());

  const parsed = cli.parse();
  const options = parseCliOptions(parsed.options);
  if (options.infoOnly) {
    return;
  }

  // ============================================
  // CONFIGURATION
  // ============================================
  if (!loadDotEnv()) {
    console.warn("No .env file found, using system environment variables");
  }
  const config = loadConfig(process.env, options.overrides);

  // ============================================
  // INITIALIZE LOGGER
  // ============================================
  logger = createLogger({
    logDir: config.logDir,
    level: config.logLevel,
    enableConsole: config.logToConsole,
    enableFile: config.logToFile,
  });
  await logger.initialize();
  setDefaultLogger(logger);

  logger.info("Application starting", {
    provider: config.provider,
    modelName: config.modelName,
    ollamaHostUrl: config.ollamaHostUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  // ============================================
  // PRESETS, CLIENT, SESSION
  // ============================================
  const presets = await loadPresets(config.presetsPath, logger.child("presets"));

  const session = new ChatSession({
    client: createGenerationClient(config),
    fallback: new FallbackResponder({ seed: config.fallbackSeed }),
    profile: DEFAULT_PROFILE,
    contextWindow: config.contextWindowSize,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child("session"),
  });

  if (options.preset !== undefined) {
    session.applyPreset(presets, options.preset);
  }

  const shell = new ChatShell({ session, presets, logger: logger.child("shell") });
  await shell.run();

  logger.info("Application shutting down gracefully");
  await cleanup();
}

// ============================================
// ENTRY POINT
// ============================================
main().catch(async (error: unknown) => {
  if (error instanceof ConfigError || error instanceof RangeError) {
    console.error(`\n[FATAL] ${error.message}`);
  } else {
    console.error("\n[FATAL] Unhandled error in main():");
    console.error(error);
    if (logger) {
      logger.error("Fatal error", error instanceof Error ? error : new Error(String(error)));
    }
  }
  await shutdown(1);
});
