// ============================================
// CONVERSATION MODULE EXPORTS
// ============================================
export { ConversationStore } from "./store.js";
export { ChatSession } from "./session.js";
export type { ChatSessionConfig } from "./session.js";
export type { ConnectionState, ConversationTurn, NewTurn, TurnOutcome } from "./types.js";
