import type { ConversationTurn, NewTurn } from "./types.js";

// ============================================
// IN-MEMORY CONVERSATION STORE
// ============================================

/**
 * Append-only transcript for one session. Turns are frozen on the way in and
 * readers get snapshot copies, so nothing outside the store can reorder it.
 */
export class ConversationStore {
  private turns: ConversationTurn[] = [];
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  append(turn: NewTurn): ConversationTurn {
    if (turn.degraded && turn.role !== "assistant") {
      throw new RangeError("Only assistant turns can be marked degraded");
    }

    const stored: ConversationTurn = Object.freeze({
      role: turn.role,
      text: turn.text,
      degraded: turn.degraded ?? false,
      createdAt: this.now(),
    });
    this.turns.push(stored);
    return stored;
  }

  get size(): number {
    return this.turns.length;
  }

  all(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  /** Last `count` turns, oldest first. */
  recent(count: number): readonly ConversationTurn[] {
    if (count <= 0) return [];
    return this.turns.slice(-count);
  }

  last(): ConversationTurn | undefined {
    return this.turns[this.turns.length - 1];
  }
}
