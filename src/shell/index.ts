export { ChatShell } from "./chat-shell.js";
export type { ChatShellOptions, ShellResult } from "./chat-shell.js";
export { parseShellCommand, HELP_LINES } from "./commands.js";
export type { ShellCommand } from "./commands.js";
export { renderReply, renderProfile, renderPresets, renderPrompt, promptLabel, FALLBACK_BANNER } from "./render.js";
