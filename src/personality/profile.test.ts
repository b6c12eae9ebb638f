import { describe, it, expect } from "vitest";
import {
  createProfile,
  DEFAULT_PROFILE,
  isTraitName,
  NEUTRAL_TRAIT_VALUE,
  traitLevel,
  withModifiers,
  withTrait,
} from "./profile.js";

describe("createProfile", () => {
  it("fills every missing trait with the neutral midpoint", () => {
    const profile = createProfile();

    expect(profile).toEqual({
      creativity: NEUTRAL_TRAIT_VALUE,
      professionalism: NEUTRAL_TRAIT_VALUE,
      friendliness: NEUTRAL_TRAIT_VALUE,
      sarcasm: NEUTRAL_TRAIT_VALUE,
      verbosity: NEUTRAL_TRAIT_VALUE,
      modifiers: [],
    });
  });

  it("keeps given traits and defaults the rest", () => {
    const profile = createProfile({ sarcasm: 0.9, name: "Snarky" });

    expect(profile.sarcasm).toBe(0.9);
    expect(profile.creativity).toBe(0.5);
    expect(profile.name).toBe("Snarky");
  });

  it("returns a frozen profile with frozen modifiers", () => {
    const profile = createProfile({ modifiers: ["uses emoji"] });

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.modifiers)).toBe(true);
  });

  it("accepts both ends of the scale", () => {
    expect(() => createProfile({ sarcasm: 0, verbosity: 1 })).not.toThrow();
  });

  it("rejects values above the scale", () => {
    expect(() => createProfile({ sarcasm: 1.5 })).toThrow(
      new RangeError("Personality trait 'sarcasm' must be between 0 and 1, got 1.5")
    );
  });

  it("rejects negative and non-finite values", () => {
    expect(() => createProfile({ creativity: -0.1 })).toThrow(RangeError);
    expect(() => createProfile({ verbosity: Number.NaN })).toThrow(RangeError);
  });
});

describe("DEFAULT_PROFILE", () => {
  it("starts with no sarcasm and neutral everything else", () => {
    expect(DEFAULT_PROFILE.sarcasm).toBe(0);
    expect(DEFAULT_PROFILE.creativity).toBe(0.5);
    expect(DEFAULT_PROFILE.name).toBeUndefined();
  });
});

describe("withTrait", () => {
  const preset = createProfile({ name: "Friendly", friendliness: 0.9, modifiers: ["says hi"] });

  it("returns a new profile and leaves the original untouched", () => {
    const updated = withTrait(preset, "sarcasm", 0.7);

    expect(updated).not.toBe(preset);
    expect(updated.sarcasm).toBe(0.7);
    expect(preset.sarcasm).toBe(0.5);
  });

  it("drops the preset name and keeps the modifiers", () => {
    const updated = withTrait(preset, "sarcasm", 0.7);

    expect(updated.name).toBeUndefined();
    expect(updated.friendliness).toBe(0.9);
    expect(updated.modifiers).toEqual(["says hi"]);
  });

  it("validates the new value", () => {
    expect(() => withTrait(preset, "verbosity", 2)).toThrow(RangeError);
  });
});

describe("withModifiers", () => {
  it("replaces the modifiers", () => {
    const updated = withModifiers(DEFAULT_PROFILE, ["rhymes"]);

    expect(updated.modifiers).toEqual(["rhymes"]);
    expect(DEFAULT_PROFILE.modifiers).toEqual([]);
  });
});

describe("traitLevel", () => {
  it.each([
    { value: 0, level: "minimal" },
    { value: 0.19, level: "minimal" },
    { value: 0.2, level: "low" },
    { value: 0.39, level: "low" },
    { value: 0.4, level: "moderate" },
    { value: 0.6, level: "high" },
    { value: 0.79, level: "high" },
    { value: 0.8, level: "very_high" },
    { value: 1, level: "very_high" },
  ])("maps $value to $level", ({ value, level }) => {
    expect(traitLevel(value)).toBe(level);
  });
});

describe("isTraitName", () => {
  it("recognises the five traits only", () => {
    expect(isTraitName("sarcasm")).toBe(true);
    expect(isTraitName("humour")).toBe(false);
  });
});
