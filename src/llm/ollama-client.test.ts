import { describe, it, expect, vi } from "vitest";
import { OllamaClient } from "./ollama-client.js";
import { ConnectivityError, GenerationError, ProtocolError, TimeoutError } from "./errors.js";
import type { GenerationRequestPayload } from "./types.js";
import { createLogger } from "../logger/index.js";

const silentLogger = createLogger({ enableConsole: false, enableFile: false });

const payload: GenerationRequestPayload = {
  systemInstructions: "Be nice.",
  messages: [
    { role: "user", content: "hi" },
    { role: "assistant", content: "hello" },
    { role: "user", content: "how are you?" },
  ],
  sampling: { temperature: 0.65, maxTokens: 125 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function client(timeoutMs = 1_000): OllamaClient {
  return new OllamaClient("http://localhost:11434", "phi3:mini", timeoutMs, silentLogger);
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("OllamaClient", () => {
  it("returns the trimmed reply text", async () => {
    stubFetch(async () => jsonResponse({ model: "phi3:mini", message: { role: "assistant", content: " OK \n" }, done: true }));

    await expect(client().generate(payload)).resolves.toBe("OK");
  });

  it("posts a non-streaming chat request with the system prompt first", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ message: { role: "assistant", content: "OK" } }));

    await client().generate(payload);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/api/chat");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "phi3:mini",
      messages: [
        { role: "system", content: "Be nice." },
        { role: "user", content: "hi" },
        { role: "assistant", content: "hello" },
        { role: "user", content: "how are you?" },
      ],
      options: { temperature: 0.65, num_predict: 125 },
      stream: false,
    });
  });

  it("strips trailing slashes from the base URL", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ message: { content: "OK" } }));

    await new OllamaClient("http://gpu-box:11434/", "llama3", 1_000, silentLogger).generate(payload);

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://gpu-box:11434/api/chat");
  });

  it("maps a refused connection to ConnectivityError", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:11434") });
    });

    const error = await captureError(client().generate(payload));

    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toBeInstanceOf(GenerationError);
    expect(error instanceof Error ? error.message : "").toContain("ECONNREFUSED");
  });

  it("maps a non-2xx status to ProtocolError with the status", async () => {
    stubFetch(async () => new Response("model 'phi3:mini' not found", { status: 404, statusText: "Not Found" }));

    const error = await captureError(client().generate(payload));

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error instanceof ProtocolError ? error.status : undefined).toBe(404);
    expect(error instanceof Error ? error.message : "").toBe(
      "Ollama API error: 404 Not Found - model 'phi3:mini' not found"
    );
  });

  it("rejects a body that is not JSON", async () => {
    stubFetch(async () => new Response("<html>proxy error</html>", { status: 200 }));

    await expect(client().generate(payload)).rejects.toBeInstanceOf(ProtocolError);
  });

  it("rejects a body without message content", async () => {
    stubFetch(async () => jsonResponse({ done: true }));

    await expect(client().generate(payload)).rejects.toThrow(ProtocolError);
  });

  it("never returns a blank reply", async () => {
    stubFetch(async () => jsonResponse({ message: { role: "assistant", content: "   " }, done: true }));

    await expect(client().generate(payload)).rejects.toThrow("Ollama returned an empty reply");
  });

  it("gives up with TimeoutError once the timeout passes", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
        })
    );

    const error = await captureError(client(5_000).generate(payload, { timeoutMs: 20 }));

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError ? error.timeoutMs : undefined).toBe(20);
  });

  it("reports a timeout that fires while reading an error body", async () => {
    stubFetch(async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(stream) {
          init?.signal?.addEventListener("abort", () => stream.error(new Error("This operation was aborted")));
        },
      });
      return new Response(body, { status: 500, statusText: "Internal Server Error" });
    });

    const error = await captureError(client(5_000).generate(payload, { timeoutMs: 20 }));

    expect(error).toBeInstanceOf(TimeoutError);
  });

  it("makes exactly one attempt per call", async () => {
    const fetchMock = stubFetch(async () => new Response("busy", { status: 503 }));

    await expect(client().generate(payload)).rejects.toBeInstanceOf(ProtocolError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
