import { TRAIT_LEVELS, TRAIT_NAMES } from "./types.js";
import type { PersonalityProfile, ProfileInput, TraitLevel, TraitName, TraitValues } from "./types.js";

export const TRAIT_MIN = 0;
export const TRAIT_MAX = 1;
export const NEUTRAL_TRAIT_VALUE = 0.5;

// Lower bounds of "low", "moderate", "high", "very_high"
const LEVEL_THRESHOLDS = [0.2, 0.4, 0.6, 0.8] as const;

/**
 * Check a trait value, throwing a RangeError that names the trait.
 */
export function assertTraitValue(trait: string, value: number): void {
  if (!Number.isFinite(value) || value < TRAIT_MIN || value > TRAIT_MAX) {
    throw new RangeError(
      `Personality trait '${trait}' must be between ${TRAIT_MIN} and ${TRAIT_MAX}, got ${value}`
    );
  }
}

function resolveTrait(input: ProfileInput, trait: TraitName): number {
  const value = input[trait] ?? NEUTRAL_TRAIT_VALUE;
  assertTraitValue(trait, value);
  return value;
}

/**
 * Build a frozen profile. Missing traits take the neutral midpoint.
 */
export function createProfile(input: ProfileInput = {}): PersonalityProfile {
  const traits: TraitValues = {
    creativity: resolveTrait(input, "creativity"),
    professionalism: resolveTrait(input, "professionalism"),
    friendliness: resolveTrait(input, "friendliness"),
    sarcasm: resolveTrait(input, "sarcasm"),
    verbosity: resolveTrait(input, "verbosity"),
  };

  return Object.freeze({
    ...traits,
    ...(input.name !== undefined ? { name: input.name } : {}),
    modifiers: Object.freeze([...(input.modifiers ?? [])]),
  });
}

/** Starting point of a session before any preset is chosen. */
export const DEFAULT_PROFILE: PersonalityProfile = createProfile({
  creativity: 0.5,
  professionalism: 0.5,
  friendliness: 0.5,
  sarcasm: 0,
  verbosity: 0.5,
});

/**
 * New profile with one trait changed. The result is a custom profile, so the
 * preset name is dropped.
 */
export function withTrait(
  profile: PersonalityProfile,
  trait: TraitName,
  value: number
): PersonalityProfile {
  return createProfile({ ...traitValues(profile), modifiers: profile.modifiers, [trait]: value });
}

export function withModifiers(
  profile: PersonalityProfile,
  modifiers: readonly string[]
): PersonalityProfile {
  return createProfile({ ...traitValues(profile), modifiers });
}

export function traitValues(profile: PersonalityProfile): TraitValues {
  return {
    creativity: profile.creativity,
    professionalism: profile.professionalism,
    friendliness: profile.friendliness,
    sarcasm: profile.sarcasm,
    verbosity: profile.verbosity,
  };
}

/**
 * Map a trait value to its intensity band. Monotonic: a larger value never
 * yields an earlier level.
 */
export function traitLevel(value: number): TraitLevel {
  let index = 0;
  for (const threshold of LEVEL_THRESHOLDS) {
    if (value >= threshold) index++;
  }
  return TRAIT_LEVELS[index] ?? "very_high";
}

export function isTraitName(value: string): value is TraitName {
  return TRAIT_NAMES.some((name) => name === value);
}
