// ============================================
// PERSONALITY PROFILE
// ============================================

export const TRAIT_NAMES = [
  "creativity",
  "professionalism",
  "friendliness",
  "sarcasm",
  "verbosity",
] as const;

export type TraitName = (typeof TRAIT_NAMES)[number];

/** Every trait on the [0, 1] scale. */
export type TraitValues = Record<TraitName, number>;

export interface PersonalityProfile extends Readonly<TraitValues> {
  readonly name?: string;               // Preset label; absent for custom profiles
  readonly modifiers: readonly string[]; // Free-text style notes, e.g. "uses nautical slang"
}

export interface ProfileInput extends Partial<TraitValues> {
  name?: string;
  modifiers?: readonly string[];
}

// ============================================
// TRAIT INTENSITY
// ============================================

/** Ordered weakest to strongest. */
export const TRAIT_LEVELS = ["minimal", "low", "moderate", "high", "very_high"] as const;

export type TraitLevel = (typeof TRAIT_LEVELS)[number];
