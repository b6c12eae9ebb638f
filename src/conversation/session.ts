import { ConversationStore } from "./store.js";
import type { ConnectionState, ConversationTurn, TurnOutcome } from "./types.js";
import { composePrompt, DEFAULT_CONTEXT_WINDOW } from "../personality/prompt-builder.js";
import { DEFAULT_PROFILE } from "../personality/profile.js";
import type { PresetCatalog } from "../personality/presets.js";
import type { PersonalityProfile } from "../personality/types.js";
import { isGenerationError } from "../llm/errors.js";
import type { GenerationError } from "../llm/errors.js";
import type { GenerationClient, GenerationRequestPayload } from "../llm/types.js";
import type { FallbackResponder } from "../fallback/responder.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

// ============================================
// SESSION CONFIGURATION
// ============================================
export interface ChatSessionConfig {
  client: GenerationClient;
  fallback: FallbackResponder;
  profile?: PersonalityProfile;
  contextWindow?: number;
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

// ============================================
// CHAT SESSION
// ============================================

/**
 * One user's conversation: owns the transcript and the current profile, and
 * runs each turn through the client or, when that fails, the fallback.
 */
export class ChatSession {
  private client: GenerationClient;
  private fallback: FallbackResponder;
  private store: ConversationStore;
  private currentProfile: PersonalityProfile;
  private contextWindow: number;
  private timeoutMs: number | undefined;
  private connection: ConnectionState = "connected";
  private lastError: GenerationError | undefined;
  private logger: Logger;
  private now: () => Date;

  constructor(config: ChatSessionConfig) {
    this.client = config.client;
    this.fallback = config.fallback;
    this.currentProfile = config.profile ?? DEFAULT_PROFILE;
    this.contextWindow = config.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? getDefaultLogger().child("session");
    this.now = config.now ?? (() => new Date());
    this.store = new ConversationStore(this.now);
  }

  get profile(): PersonalityProfile {
    return this.currentProfile;
  }

  get state(): ConnectionState {
    return this.connection;
  }

  /** The failure that put the session into fallback, if any. */
  get failure(): GenerationError | undefined {
    return this.lastError;
  }

  get provider(): string {
    return this.client.provider;
  }

  transcript(): readonly ConversationTurn[] {
    return this.store.all();
  }

  setProfile(profile: PersonalityProfile): void {
    this.currentProfile = profile;
    this.logger.debug("Profile changed", { preset: profile.name ?? "Custom" });
  }

  /**
   * Switch to a named preset. Throws a RangeError for an unknown name.
   */
  applyPreset(catalog: PresetCatalog, name: string): PersonalityProfile {
    const preset = catalog.get(name);
    if (!preset) {
      throw new RangeError(`Unknown preset "${name}". Available: ${[...catalog.keys()].join(", ")}`);
    }
    this.setProfile(preset);
    this.logger.info("Applied preset", { preset: name });
    return preset;
  }

  /**
   * The request the next turn would send for `message`.
   */
  previewPrompt(message: string): GenerationRequestPayload {
    return composePrompt(this.currentProfile, this.store.all(), message, {
      contextWindow: this.contextWindow,
    });
  }

  /**
   * Run one turn. Generation failures never escape: the fallback answers and
   * the assistant turn is marked degraded.
   */
  async sendMessage(text: string): Promise<TurnOutcome> {
    const message = text.trim();
    if (message === "") {
      throw new RangeError("Message must not be empty");
    }

    // The profile is captured once so a change mid-call can't split the turn
    const profile = this.currentProfile;
    const payload = composePrompt(profile, this.store.all(), message, {
      contextWindow: this.contextWindow,
    });

    if (this.connection === "connected") {
      try {
        const reply = await this.client.generate(
          payload,
          this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}
        );
        return { turn: this.recordTurn(message, reply, false), degraded: false };
      } catch (error) {
        if (!isGenerationError(error)) {
          throw error;
        }
        this.enterFallback(error);
        const turn = this.recordTurn(message, this.fallback.generate(profile, message), true);
        return { turn, degraded: true, error };
      }
    }

    return { turn: this.recordTurn(message, this.fallback.generate(profile, message), true), degraded: true };
  }

  // User and assistant turns are only ever appended as a pair
  private recordTurn(message: string, reply: string, degraded: boolean): ConversationTurn {
    this.store.append({ role: "user", text: message });
    return this.store.append({ role: "assistant", text: reply, degraded });
  }

  /**
   * Try the generation service again on the next turn.
   */
  reconnect(): void {
    this.connection = "connected";
    this.lastError = undefined;
    this.logger.info("Reconnecting to generation service", { provider: this.client.provider });
  }

  /**
   * Start a fresh transcript, keeping the profile.
   */
  reset(): void {
    this.store = new ConversationStore(this.now);
    this.connection = "connected";
    this.lastError = undefined;
    this.logger.info("Conversation reset", { preset: this.currentProfile.name ?? "Custom" });
  }

  private enterFallback(error: GenerationError): void {
    this.connection = "fallback";
    this.lastError = error;
    this.logger.error("Generation failed, switching to fallback replies", error, {
      provider: this.client.provider,
      kind: error.kind,
    });
  }
}
