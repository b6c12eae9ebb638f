import { describe, it, expect } from "vitest";
import { dominantTrait, FALLBACK_NOTICE, FallbackResponder, selectPool } from "./responder.js";
import { FALLBACK_TEMPLATES } from "./templates.js";
import { createProfile, DEFAULT_PROFILE } from "../personality/profile.js";

function stripNotice(reply: string): string {
  return reply.slice(FALLBACK_NOTICE.length + 1);
}

describe("FallbackResponder", () => {
  it("marks every reply as a fallback", () => {
    const reply = new FallbackResponder().generate(DEFAULT_PROFILE, "hello");

    expect(reply.startsWith(`${FALLBACK_NOTICE} `)).toBe(true);
  });

  it("gives the same reply for the same profile, message and seed", () => {
    const profile = createProfile({ sarcasm: 0.9 });

    const first = new FallbackResponder({ seed: 7 }).generate(profile, "what time is it?");
    const second = new FallbackResponder({ seed: 7 }).generate(profile, "what time is it?");

    expect(second).toBe(first);
  });

  it("varies the reply across seeds", () => {
    const replies = new Set(
      Array.from({ length: 20 }, (_, seed) => new FallbackResponder({ seed }).generate(DEFAULT_PROFILE, "hello"))
    );

    expect(replies.size).toBeGreaterThan(1);
  });

  it("answers sarcastically when sarcasm dominates", () => {
    const reply = new FallbackResponder().generate(createProfile({ sarcasm: 0.9 }), "help me");

    expect(FALLBACK_TEMPLATES.sarcastic).toContain(stripNotice(reply));
  });

  it("answers neutrally when no trait is above the threshold", () => {
    const reply = new FallbackResponder().generate(DEFAULT_PROFILE, "help me");

    expect(FALLBACK_TEMPLATES.neutral).toContain(stripNotice(reply));
  });

  it("uses the neutral pool when a custom pool is empty", () => {
    const responder = new FallbackResponder({ templates: { ...FALLBACK_TEMPLATES, sarcastic: [] } });

    const reply = responder.generate(createProfile({ sarcasm: 0.9 }), "help me");

    expect(FALLBACK_TEMPLATES.neutral).toContain(stripNotice(reply));
  });

  it("handles an empty message", () => {
    expect(() => new FallbackResponder().generate(DEFAULT_PROFILE, "")).not.toThrow();
  });
});

describe("selectPool", () => {
  it.each([
    { traits: { creativity: 0.9 }, pool: "creative" },
    { traits: { professionalism: 0.9 }, pool: "professional" },
    { traits: { friendliness: 0.9 }, pool: "friendly" },
    { traits: { sarcasm: 0.9 }, pool: "sarcastic" },
  ])("picks $pool for $traits", ({ traits, pool }) => {
    expect(selectPool(createProfile(traits))).toBe(pool);
  });

  it("needs the dominant trait to exceed 0.6", () => {
    expect(selectPool(createProfile({ sarcasm: 0.6, creativity: 0.1, professionalism: 0.1, friendliness: 0.1 }))).toBe(
      "neutral"
    );
  });

  it("ignores verbosity", () => {
    expect(selectPool(createProfile({ verbosity: 1 }))).toBe("neutral");
  });
});

describe("dominantTrait", () => {
  it("breaks ties in favour of the earlier trait", () => {
    expect(dominantTrait(createProfile({ creativity: 0.8, sarcasm: 0.8 }))).toBe("creativity");
    expect(dominantTrait(createProfile({ friendliness: 0.8, sarcasm: 0.8 }))).toBe("friendliness");
  });
});
