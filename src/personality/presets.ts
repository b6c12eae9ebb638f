import { readFile } from "node:fs/promises";
import { z } from "zod";
import { createProfile, TRAIT_MAX, TRAIT_MIN } from "./profile.js";
import type { PersonalityProfile, ProfileInput } from "./types.js";
import { ConfigError } from "../config/errors.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

/** Shell label for a hand-tuned profile; no preset may take it. */
export const CUSTOM_PRESET_NAME = "Custom";

export type PresetCatalog = ReadonlyMap<string, PersonalityProfile>;

// ============================================
// PRESET FILE SCHEMA
// ============================================
const traitValueSchema = z.number().min(TRAIT_MIN).max(TRAIT_MAX);

export const presetEntrySchema = z
  .object({
    creativity: traitValueSchema.optional(),
    professionalism: traitValueSchema.optional(),
    friendliness: traitValueSchema.optional(),
    sarcasm: traitValueSchema.optional(),
    verbosity: traitValueSchema.optional(),
    modifiers: z.array(z.string().trim().min(1)).optional(),
  })
  .strict();

export const presetFileSchema = z
  .record(z.string().trim().min(1), presetEntrySchema)
  .refine((presets) => !Object.hasOwn(presets, CUSTOM_PRESET_NAME), {
    message: `"${CUSTOM_PRESET_NAME}" is reserved and cannot be used as a preset name`,
  });

export type PresetFile = z.infer<typeof presetFileSchema>;

// ============================================
// BUILT-IN PRESETS
// ============================================
export const BUILT_IN_PRESETS: PresetFile = {
  Professional: { creativity: 0.3, professionalism: 0.9, friendliness: 0.6, sarcasm: 0.0, verbosity: 0.7 },
  Friendly: { creativity: 0.5, professionalism: 0.4, friendliness: 0.9, sarcasm: 0.1, verbosity: 0.8 },
  Creative: { creativity: 0.9, professionalism: 0.3, friendliness: 0.7, sarcasm: 0.3, verbosity: 0.9 },
  Sarcastic: { creativity: 0.7, professionalism: 0.2, friendliness: 0.4, sarcasm: 0.9, verbosity: 0.6 },
};

// ============================================
// PARSING & LOADING
// ============================================

/**
 * Validate parsed preset JSON and build the catalog, in file order.
 * Any bad entry fails the whole load with a ConfigError naming its path.
 */
export function parsePresets(raw: unknown, source: string): PresetCatalog {
  const result = presetFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }

  return buildCatalog(result.data);
}

function buildCatalog(presets: PresetFile): PresetCatalog {
  const catalog = new Map<string, PersonalityProfile>();
  for (const [name, entry] of Object.entries(presets)) {
    const input: ProfileInput = { ...entry, name };
    catalog.set(name, createProfile(input));
  }
  return catalog;
}

export function builtInPresets(): PresetCatalog {
  return buildCatalog(BUILT_IN_PRESETS);
}

/**
 * Read the presets file. A missing file falls back to the built-in presets;
 * unreadable or malformed content is a ConfigError.
 */
export async function loadPresets(
  filePath: string,
  logger: Logger = getDefaultLogger().child("presets")
): Promise<PresetCatalog> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.warn("Presets file not found, using built-in presets", { filePath });
      return builtInPresets();
    }
    throw new ConfigError(filePath, [
      `could not read file: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(filePath, [
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const catalog = parsePresets(raw, filePath);
  logger.info("Loaded presets", { filePath, count: catalog.size });
  return catalog;
}
