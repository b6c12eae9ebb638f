import type { ChatRole } from "../llm/types.js";
import type { GenerationError } from "../llm/errors.js";

// ============================================
// CONVERSATION TYPES
// ============================================

export interface ConversationTurn {
  readonly role: ChatRole;
  readonly text: string;
  readonly degraded: boolean; // True only for fallback replies
  readonly createdAt: Date;
}

export interface NewTurn {
  role: ChatRole;
  text: string;
  degraded?: boolean;
}

/** "fallback" once the generation service has failed, until reconnect/reset. */
export type ConnectionState = "connected" | "fallback";

export interface TurnOutcome {
  turn: ConversationTurn;
  degraded: boolean;
  error?: GenerationError; // The failure that triggered the fallback, if this turn caused it
}
