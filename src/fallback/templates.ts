// ============================================
// FALLBACK TEMPLATE LIBRARY
// ============================================

export type FallbackPool = "sarcastic" | "friendly" | "professional" | "creative" | "neutral";

export const FALLBACK_TEMPLATES: Readonly<Record<FallbackPool, readonly string[]>> = {
  sarcastic: [
    "Oh, wonderful, another message. I can barely contain my excitement.",
    "Fascinating. Truly. I'll get right on that once the model wakes up.",
    "Let me guess: you wanted a helpful answer? Bold of you.",
    "I'd love to help, but I'm busy contemplating the depth of your request.",
    "Sure, I'll answer that. Not like I have anything better to do.",
  ],
  friendly: [
    "I'd be absolutely delighted to help with that!",
    "What a lovely question! I wish I could give it the full answer it deserves.",
    "I'm so glad you asked! Let's pick this up properly in a moment.",
    "Thanks for sharing that with me! I'm happy to dig in as soon as I can.",
    "Great question! I'll have a proper answer for you shortly.",
  ],
  professional: [
    "Thank you for your inquiry. A complete response will follow once the service is restored.",
    "Your request has been noted and will be addressed in full shortly.",
    "I have recorded your question and will provide a detailed answer when possible.",
    "Acknowledged. I will return with a thorough response as soon as I am able.",
    "I appreciate your patience while I prepare a comprehensive answer.",
  ],
  creative: [
    "If answers were clouds, yours is still drifting in from the horizon.",
    "Picture a painting half finished: that's my reply, waiting for its last brushstroke.",
    "Let's approach this from a new angle once my imagination reconnects!",
    "Somewhere a brilliant answer is tying its shoelaces. It'll be here soon.",
    "Prepare for a journey of insight, departing as soon as the engines start.",
  ],
  neutral: [
    "I understand your question. I'll have a full answer once I'm back online.",
    "Thanks for your message. Let me help with that as soon as I can.",
    "I've received your question and will respond properly shortly.",
    "That's an interesting question. I'll come back to it in a moment.",
    "Noted. I'll address that for you as soon as possible.",
  ],
};
