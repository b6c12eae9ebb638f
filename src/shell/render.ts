import type { ChalkInstance } from "chalk";
import { traitLevel } from "../personality/profile.js";
import { TRAIT_NAMES } from "../personality/types.js";
import type { PersonalityProfile } from "../personality/types.js";
import type { PresetCatalog } from "../personality/presets.js";
import { CUSTOM_PRESET_NAME } from "../personality/presets.js";
import type { GenerationRequestPayload } from "../llm/types.js";
import type { ConnectionState, TurnOutcome } from "../conversation/types.js";

// ============================================
// TERMINAL RENDERING
// ============================================

export const FALLBACK_BANNER =
  "Local model unavailable: this is a fallback reply. Make sure Ollama is running, then type /reconnect.";

export function renderReply(outcome: TurnOutcome, c: ChalkInstance): string[] {
  const lines: string[] = [];
  if (outcome.error) {
    lines.push(c.red(`Connection failed: ${outcome.error.message}`));
  }
  if (outcome.degraded) {
    lines.push(c.yellow(`! ${FALLBACK_BANNER}`));
    lines.push(c.yellow(`bot> ${outcome.turn.text}`));
  } else {
    lines.push(`${c.cyan("bot>")} ${outcome.turn.text}`);
  }
  return lines;
}

export function renderProfile(profile: PersonalityProfile, c: ChalkInstance): string[] {
  const lines = [c.bold(`Personality: ${profile.name ?? CUSTOM_PRESET_NAME}`)];
  for (const trait of TRAIT_NAMES) {
    const value = profile[trait];
    lines.push(`  ${trait.padEnd(16)}${value.toFixed(2)}  ${c.dim(traitLevel(value))}`);
  }
  for (const modifier of profile.modifiers) {
    lines.push(`  + ${modifier}`);
  }
  return lines;
}

export function renderPresets(catalog: PresetCatalog, current: PersonalityProfile, c: ChalkInstance): string[] {
  const activeName = current.name ?? CUSTOM_PRESET_NAME;
  const names = [...catalog.keys(), CUSTOM_PRESET_NAME];
  return names.map((name) => (name === activeName ? c.green(`* ${name}`) : `  ${name}`));
}

export function renderPrompt(payload: GenerationRequestPayload, c: ChalkInstance): string[] {
  return [
    c.bold("System instructions:"),
    payload.systemInstructions,
    c.bold(`Messages (${payload.messages.length}):`),
    ...payload.messages.map((msg) => `  [${msg.role}] ${msg.content}`),
    c.bold("Sampling:"),
    `  temperature ${payload.sampling.temperature.toFixed(2)}, max tokens ${payload.sampling.maxTokens}`,
  ];
}

export function promptLabel(state: ConnectionState, c: ChalkInstance): string {
  return state === "fallback" ? `${c.yellow("[fallback]")} you> ` : "you> ";
}
