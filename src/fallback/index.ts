export { FallbackResponder, FALLBACK_NOTICE, DOMINANCE_THRESHOLD, dominantTrait, selectPool } from "./responder.js";
export type { FallbackResponderOptions } from "./responder.js";
export { FALLBACK_TEMPLATES } from "./templates.js";
export type { FallbackPool } from "./templates.js";
