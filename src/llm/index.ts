import { OllamaClient } from "./ollama-client.js";
import { MockGenerationClient } from "./mock-client.js";
import type { GenerationClient } from "./types.js";
import type { AppConfig } from "../config/index.js";
import { getDefaultLogger } from "../logger/index.js";

// ============================================
// LLM CLIENT EXPORTS
// ============================================
export { OllamaClient, DEFAULT_OLLAMA_URL, DEFAULT_OLLAMA_MODEL, DEFAULT_TIMEOUT_MS } from "./ollama-client.js";
export { MockGenerationClient } from "./mock-client.js";
export { GenerationError, ConnectivityError, ProtocolError, TimeoutError, isGenerationError } from "./errors.js";
export type { GenerationErrorKind } from "./errors.js";
export type {
  ChatRole,
  GenerateOptions,
  GenerationClient,
  GenerationRequestPayload,
  LLMMessage,
  SamplingParameters,
} from "./types.js";

/**
 * Pick the backend named by configuration. Callers only ever see the
 * GenerationClient interface.
 */
export function createGenerationClient(
  config: Pick<AppConfig, "provider" | "ollamaHostUrl" | "modelName" | "requestTimeoutMs">
): GenerationClient {
  switch (config.provider) {
    case "ollama":
      return new OllamaClient(
        config.ollamaHostUrl,
        config.modelName,
        config.requestTimeoutMs,
        getDefaultLogger().child("ollama")
      );
    case "mock":
      return new MockGenerationClient();
  }
}
