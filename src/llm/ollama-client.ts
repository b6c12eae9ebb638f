import { z } from "zod";
import { ConnectivityError, ProtocolError, TimeoutError } from "./errors.js";
import type {
  GenerateOptions,
  GenerationClient,
  GenerationRequestPayload,
} from "./types.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_OLLAMA_MODEL = "phi3:mini";
export const DEFAULT_TIMEOUT_MS = 30_000;

// Fields we read from a non-streaming /api/chat reply; the rest is ignored
const ollamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
  options: { temperature: number; num_predict: number };
  stream: false;
}

// ============================================
// OLLAMA CLIENT IMPLEMENTATION
// ============================================
export class OllamaClient implements GenerationClient {
  readonly provider = "ollama";
  private baseUrl: string;
  private modelName: string;
  private defaultTimeoutMs: number;
  private logger: Logger;

  constructor(
    baseUrl: string = DEFAULT_OLLAMA_URL,
    modelName: string = DEFAULT_OLLAMA_MODEL,
    defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS,
    logger: Logger = getDefaultLogger().child("ollama")
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.modelName = modelName;
    this.defaultTimeoutMs = defaultTimeoutMs;
    this.logger = logger;
  }

  get model(): string {
    return this.modelName;
  }

  get chatUrl(): string {
    return `${this.baseUrl}/api/chat`;
  }

  /**
   * Send one chat request and return the reply text. A single attempt:
   * refused connections, bad statuses, malformed or blank bodies and
   * timeouts all reject with a typed error.
   */
  async generate(payload: GenerationRequestPayload, options: GenerateOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const url = this.chatUrl;
    const requestBody = this.buildRequestBody(payload);

    this.logger.debug("Sending chat request", {
      url,
      model: this.modelName,
      messages: requestBody.messages.length,
      timeoutMs,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
          },
          body: JSON.stringify(requestBody),
          signal: controller.signal,
        });
      } catch (fetchError) {
        if (controller.signal.aborted) {
          throw this.timeoutError(timeoutMs);
        }
        throw new ConnectivityError(
          `Failed to connect to Ollama at ${url}: ${describeFetchError(fetchError)}. Is it running?`,
          { cause: fetchError }
        );
      }

      if (!response.ok) {
        const errorText = await readErrorBody(response);
        if (controller.signal.aborted) {
          throw this.timeoutError(timeoutMs);
        }
        throw new ProtocolError(
          `Ollama API error: ${response.status} ${response.statusText}${errorText ? ` - ${errorText}` : ""}`,
          { status: response.status }
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (jsonError) {
        if (controller.signal.aborted) {
          throw this.timeoutError(timeoutMs);
        }
        throw new ProtocolError(
          `Ollama response is not valid JSON: ${jsonError instanceof Error ? jsonError.message : String(jsonError)}`,
          { cause: jsonError, status: response.status }
        );
      }

      return this.extractContent(data, response.status);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timeoutError(timeoutMs: number): TimeoutError {
    return new TimeoutError(
      `Ollama request timed out after ${timeoutMs}ms (model "${this.modelName}", URL ${this.chatUrl})`,
      timeoutMs
    );
  }

  /**
   * Ollama takes the system prompt as the first message and the sampling
   * settings under `options`.
   */
  buildRequestBody(payload: GenerationRequestPayload): OllamaChatRequest {
    return {
      model: this.modelName,
      messages: [
        { role: "system", content: payload.systemInstructions },
        ...payload.messages.map((msg) => ({ role: msg.role, content: msg.content })),
      ],
      options: {
        temperature: payload.sampling.temperature,
        num_predict: payload.sampling.maxTokens, // Ollama uses num_predict instead of max_tokens
      },
      stream: false,
    };
  }

  private extractContent(data: unknown, status: number): string {
    const parsed = ollamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolError("Invalid response format from Ollama: 'message.content' not found", {
        cause: parsed.error,
        status,
      });
    }

    const content = parsed.data.message.content.trim();
    if (content === "") {
      throw new ProtocolError("Ollama returned an empty reply", { status });
    }

    this.logger.debug("Received chat response", {
      model: this.modelName,
      done: parsed.data.done,
      promptTokens: parsed.data.prompt_eval_count,
      completionTokens: parsed.data.eval_count,
    });

    return content;
  }
}

function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici reports the socket error (ECONNREFUSED etc.) as the cause of "fetch failed"
  const cause = error.cause;
  if (cause instanceof Error) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).trim();
  } catch (error) {
    return `could not read error response: ${error instanceof Error ? error.message : String(error)}`;
  }
}
