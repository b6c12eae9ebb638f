import { isTraitName } from "../personality/profile.js";
import { TRAIT_NAMES } from "../personality/types.js";
import type { TraitName } from "../personality/types.js";

// ============================================
// SHELL COMMANDS
// ============================================
export type ShellCommand =
  | { kind: "empty" }
  | { kind: "message"; text: string }
  | { kind: "help" }
  | { kind: "presets" }
  | { kind: "preset"; name: string }
  | { kind: "set"; trait: TraitName; value: number }
  | { kind: "profile" }
  | { kind: "prompt"; message?: string }
  | { kind: "reset" }
  | { kind: "reconnect" }
  | { kind: "quit" }
  | { kind: "invalid"; reason: string };

export const HELP_LINES: readonly string[] = [
  "/help                  show this list",
  "/presets               list the available presets",
  "/preset <name>         switch to a preset",
  "/set <trait> <value>   set one trait (0 to 1)",
  "/profile               show the current personality",
  "/prompt [message]      show the request the next message would send",
  "/reset                 clear the conversation, keep the personality",
  "/reconnect             retry the model after a failure",
  "/quit                  say goodbye and exit",
];

/**
 * Turn one input line into a command. Lines not starting with "/" are chat
 * messages.
 */
export function parseShellCommand(line: string): ShellCommand {
  const trimmed = line.trim();
  if (trimmed === "") return { kind: "empty" };
  if (!trimmed.startsWith("/")) return { kind: "message", text: trimmed };

  const [head = "", ...rest] = trimmed.split(/\s+/);
  const argText = trimmed.slice(head.length).trim();

  switch (head.toLowerCase()) {
    case "/help":
      return { kind: "help" };
    case "/presets":
      return { kind: "presets" };
    case "/preset":
      return argText ? { kind: "preset", name: argText } : { kind: "invalid", reason: "Usage: /preset <name>" };
    case "/set":
      return parseSet(rest);
    case "/profile":
      return { kind: "profile" };
    case "/prompt":
      return argText ? { kind: "prompt", message: argText } : { kind: "prompt" };
    case "/reset":
      return { kind: "reset" };
    case "/reconnect":
      return { kind: "reconnect" };
    case "/quit":
    case "/exit":
      return { kind: "quit" };
    default:
      return { kind: "invalid", reason: `Unknown command "${head}". Type /help for the list.` };
  }
}

function parseSet(args: readonly string[]): ShellCommand {
  const [traitArg, valueArg] = args;
  if (traitArg === undefined || valueArg === undefined || args.length > 2) {
    return { kind: "invalid", reason: "Usage: /set <trait> <value>" };
  }

  const trait = traitArg.toLowerCase();
  if (!isTraitName(trait)) {
    return { kind: "invalid", reason: `Unknown trait "${traitArg}". Traits: ${TRAIT_NAMES.join(", ")}` };
  }

  const value = Number(valueArg);
  if (Number.isNaN(value)) {
    return { kind: "invalid", reason: `"${valueArg}" is not a number` };
  }

  return { kind: "set", trait, value };
}
