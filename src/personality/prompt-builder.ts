import { traitLevel } from "./profile.js";
import { TRAIT_NAMES } from "./types.js";
import type { PersonalityProfile, TraitLevel, TraitName } from "./types.js";
import type { ConversationTurn } from "../conversation/types.js";
import type { GenerationRequestPayload, LLMMessage, SamplingParameters } from "../llm/types.js";

// ============================================
// TRAIT DIRECTIVES
// ============================================

// One phrase per level, weakest first. Each phrase is unique across the table.
export const TRAIT_DIRECTIVES: Readonly<Record<TraitName, Readonly<Record<TraitLevel, string>>>> = {
  creativity: {
    minimal: "strictly literal and factual, with no embellishment",
    low: "factual and straightforward",
    moderate: "open to the occasional fresh angle",
    high: "creative, with vivid examples",
    very_high: "highly creative and imaginative, full of unexpected metaphors",
  },
  professionalism: {
    minimal: "completely casual, like chatting with a close friend",
    low: "casual and informal",
    moderate: "conversational but tidy",
    high: "professional and polished",
    very_high: "highly professional and formal",
  },
  friendliness: {
    minimal: "cool and detached",
    low: "somewhat reserved and direct",
    moderate: "polite and approachable",
    high: "warm and friendly",
    very_high: "extremely friendly and warm, openly enthusiastic",
  },
  sarcasm: {
    minimal: "sincere, never sarcastic",
    low: "mostly sincere with a rare dry remark",
    moderate: "slightly sarcastic",
    high: "noticeably sarcastic and witty",
    very_high: "relentlessly sarcastic, dripping with irony",
  },
  verbosity: {
    minimal: "as brief as possible, a sentence or two at most",
    low: "concise",
    moderate: "moderately detailed",
    high: "detailed and thorough",
    very_high: "exhaustively detailed, covering every angle",
  },
};

const RESPONSE_RULES = [
  "Provide only your final response; do not show your reasoning process.",
  'Do not use phrases like "Let me think..." or "Here\'s my reasoning...".',
  "Do not add any text before or after your actual response.",
  "Your personality changes how you say things, never what is true: keep facts, numbers and instructions accurate.",
];

// ============================================
// SAMPLING
// ============================================
export const MIN_TEMPERATURE = 0.3;
export const MAX_TEMPERATURE = 1.0;
export const MIN_TOKENS = 50;
export const MAX_TOKENS = 200;
export const DEFAULT_CONTEXT_WINDOW = 8;

/**
 * Creativity drives temperature; verbosity drives the token budget.
 */
export function samplingFor(profile: PersonalityProfile): SamplingParameters {
  return {
    temperature: MIN_TEMPERATURE + profile.creativity * (MAX_TEMPERATURE - MIN_TEMPERATURE),
    maxTokens: Math.floor(MIN_TOKENS + profile.verbosity * (MAX_TOKENS - MIN_TOKENS)),
  };
}

// ============================================
// SYSTEM INSTRUCTIONS
// ============================================
export function traitDirective(trait: TraitName, value: number): string {
  return TRAIT_DIRECTIVES[trait][traitLevel(value)];
}

/**
 * The one-line personality description: "creative, with vivid examples; casual and informal; ..."
 */
export function describeProfile(profile: PersonalityProfile): string {
  return TRAIT_NAMES.map((trait) => `${trait}: ${traitDirective(trait, profile[trait])}`).join("; ");
}

export function buildSystemInstructions(profile: PersonalityProfile): string {
  const sections = [
    `You are a chatbot with the following personality. ${describeProfile(profile)}.`,
  ];

  if (profile.modifiers.length > 0) {
    sections.push(`Additional style notes:\n${formatAsList(profile.modifiers)}`);
  }

  sections.push(`IMPORTANT INSTRUCTIONS:\n${formatAsList(RESPONSE_RULES)}`);
  sections.push("Respond directly, the way your configured personality would.");

  return sections.join("\n\n");
}

// ============================================
// FULL PAYLOAD
// ============================================
export interface ComposeOptions {
  contextWindow?: number; // Most recent history turns to send
}

/**
 * Build the request for one turn: system instructions, the most recent
 * `contextWindow` turns of history, then the new user message.
 */
export function composePrompt(
  profile: PersonalityProfile,
  history: readonly ConversationTurn[],
  newMessage: string,
  options: ComposeOptions = {}
): GenerationRequestPayload {
  const contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
  if (!Number.isInteger(contextWindow) || contextWindow < 0) {
    throw new RangeError(`contextWindow must be a non-negative integer, got ${contextWindow}`);
  }

  const window = contextWindow === 0 ? [] : history.slice(-contextWindow);
  const messages: LLMMessage[] = window.map((turn) => Object.freeze({ role: turn.role, content: turn.text }));
  messages.push(Object.freeze({ role: "user", content: newMessage }));

  return Object.freeze({
    systemInstructions: buildSystemInstructions(profile),
    messages: Object.freeze(messages),
    sampling: Object.freeze(samplingFor(profile)),
  });
}

// ============================================
// HELPERS
// ============================================
function formatAsList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}
