import { ProtocolError } from "./errors.js";
import type { GenerateOptions, GenerationClient, GenerationRequestPayload } from "./types.js";

// ============================================
// MOCK CLIENT
// ============================================

/**
 * Offline stand-in for a real backend. Plays scripted replies in rotation,
 * or echoes the latest user message when nothing is scripted.
 */
export class MockGenerationClient implements GenerationClient {
  readonly provider = "mock";
  private replies: readonly string[];
  private nextIndex = 0;
  readonly requests: GenerationRequestPayload[] = [];

  constructor(replies: readonly string[] = []) {
    this.replies = replies;
  }

  async generate(payload: GenerationRequestPayload, _options?: GenerateOptions): Promise<string> {
    this.requests.push(payload);

    const scripted = this.replies[this.nextIndex % Math.max(1, this.replies.length)];
    if (scripted !== undefined) {
      this.nextIndex++;
      if (scripted.trim() === "") {
        throw new ProtocolError("Mock reply is blank");
      }
      return scripted;
    }

    const lastUser = [...payload.messages].reverse().find((msg) => msg.role === "user");
    return `(mock) You said: ${lastUser?.content ?? ""}`;
  }
}
