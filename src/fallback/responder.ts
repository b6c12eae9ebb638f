import { FALLBACK_TEMPLATES } from "./templates.js";
import type { FallbackPool } from "./templates.js";
import type { PersonalityProfile, TraitName } from "../personality/types.js";

/** Prefix on every fallback reply, so the text reads as degraded even outside the shell. */
export const FALLBACK_NOTICE = "[offline fallback]";

/** A trait must exceed this to pick its own pool. */
export const DOMINANCE_THRESHOLD = 0.6;

// Verbosity shapes length, not tone, so it never picks a pool. Earlier wins ties.
const POOL_TRAITS: ReadonlyArray<readonly [TraitName, FallbackPool]> = [
  ["creativity", "creative"],
  ["professionalism", "professional"],
  ["friendliness", "friendly"],
  ["sarcasm", "sarcastic"],
];

export interface FallbackResponderOptions {
  seed?: number;
  templates?: Readonly<Record<FallbackPool, readonly string[]>>;
}

// ============================================
// FALLBACK RESPONDER
// ============================================
export class FallbackResponder {
  private seed: number;
  private templates: Readonly<Record<FallbackPool, readonly string[]>>;

  constructor(options: FallbackResponderOptions = {}) {
    this.seed = options.seed ?? 0;
    this.templates = options.templates ?? FALLBACK_TEMPLATES;
  }

  /**
   * In-character canned reply, prefixed with FALLBACK_NOTICE. Never throws;
   * the same profile, message and seed always give the same text.
   */
  generate(profile: PersonalityProfile, newMessage: string): string {
    const pool = selectPool(profile);
    const candidates = this.templates[pool].length > 0 ? this.templates[pool] : this.templates.neutral;
    const key = [
      this.seed,
      newMessage,
      profile.creativity,
      profile.professionalism,
      profile.friendliness,
      profile.sarcasm,
      profile.verbosity,
    ].join("|");
    const template = candidates[fnv1a(key) % Math.max(1, candidates.length)];

    return `${FALLBACK_NOTICE} ${template ?? "The model is unavailable right now."}`;
  }
}

export function dominantTrait(profile: PersonalityProfile): TraitName {
  let best: TraitName = "creativity";
  for (const [trait] of POOL_TRAITS) {
    if (profile[trait] > profile[best]) best = trait;
  }
  return best;
}

export function selectPool(profile: PersonalityProfile): FallbackPool {
  const trait = dominantTrait(profile);
  if (profile[trait] <= DOMINANCE_THRESHOLD) return "neutral";
  return POOL_TRAITS.find(([name]) => name === trait)?.[1] ?? "neutral";
}

// 32-bit FNV-1a
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
