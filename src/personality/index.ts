// ============================================
// PERSONALITY MODULE EXPORTS
// ============================================
export { TRAIT_NAMES, TRAIT_LEVELS } from "./types.js";
export type { PersonalityProfile, ProfileInput, TraitLevel, TraitName, TraitValues } from "./types.js";
export {
  createProfile,
  withTrait,
  withModifiers,
  traitValues,
  traitLevel,
  isTraitName,
  assertTraitValue,
  DEFAULT_PROFILE,
  NEUTRAL_TRAIT_VALUE,
  TRAIT_MIN,
  TRAIT_MAX,
} from "./profile.js";
export {
  composePrompt,
  buildSystemInstructions,
  describeProfile,
  samplingFor,
  traitDirective,
  TRAIT_DIRECTIVES,
  DEFAULT_CONTEXT_WINDOW,
} from "./prompt-builder.js";
export type { ComposeOptions } from "./prompt-builder.js";
export {
  loadPresets,
  parsePresets,
  builtInPresets,
  BUILT_IN_PRESETS,
  CUSTOM_PRESET_NAME,
} from "./presets.js";
export type { PresetCatalog, PresetFile } from "./presets.js";
