import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { HELP_LINES, parseShellCommand } from "./commands.js";
import type { ShellCommand } from "./commands.js";
import { promptLabel, renderPresets, renderProfile, renderPrompt, renderReply } from "./render.js";
import type { ChatSession } from "../conversation/session.js";
import type { PresetCatalog } from "../personality/presets.js";
import { withTrait } from "../personality/profile.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";

export type ShellResult = "continue" | "quit";

export interface ChatShellOptions {
  session: ChatSession;
  presets: PresetCatalog;
  print?: (line: string) => void;
  colors?: ChalkInstance;
  logger?: Logger;
}

// ============================================
// INTERACTIVE CHAT SHELL
// ============================================

/**
 * Terminal front end: reads lines, runs slash commands against the session,
 * sends everything else as a chat message and prints the reply.
 */
export class ChatShell {
  private session: ChatSession;
  private presets: PresetCatalog;
  private print: (line: string) => void;
  private c: ChalkInstance;
  private logger: Logger;

  constructor(options: ChatShellOptions) {
    this.session = options.session;
    this.presets = options.presets;
    this.print = options.print ?? ((line) => console.log(line));
    this.c = options.colors ?? chalk;
    this.logger = options.logger ?? getDefaultLogger().child("shell");
  }

  /**
   * Handle one input line. User mistakes are printed, never thrown.
   */
  async handleLine(line: string): Promise<ShellResult> {
    const command = parseShellCommand(line);
    try {
      return await this.execute(command);
    } catch (error) {
      if (error instanceof RangeError) {
        this.print(this.c.red(error.message));
        return "continue";
      }
      throw error;
    }
  }

  private async execute(command: ShellCommand): Promise<ShellResult> {
    switch (command.kind) {
      case "empty":
        return "continue";
      case "message": {
        const outcome = await this.session.sendMessage(command.text);
        this.printLines(renderReply(outcome, this.c));
        return "continue";
      }
      case "help":
        this.printLines(HELP_LINES);
        return "continue";
      case "presets":
        this.printLines(renderPresets(this.presets, this.session.profile, this.c));
        return "continue";
      case "preset": {
        const profile = this.session.applyPreset(this.presets, command.name);
        this.print(this.c.green(`Applied '${command.name}' preset!`));
        this.printLines(renderProfile(profile, this.c));
        return "continue";
      }
      case "set": {
        const profile = withTrait(this.session.profile, command.trait, command.value);
        this.session.setProfile(profile);
        this.print(`${command.trait} set to ${command.value.toFixed(2)}`);
        return "continue";
      }
      case "profile":
        this.printLines(renderProfile(this.session.profile, this.c));
        return "continue";
      case "prompt":
        this.printLines(renderPrompt(this.session.previewPrompt(command.message ?? "(your next message)"), this.c));
        return "continue";
      case "reset":
        this.session.reset();
        this.print(this.c.green("Conversation reset! Personality settings retained."));
        return "continue";
      case "reconnect":
        this.session.reconnect();
        this.print(`Will try ${this.session.provider} again on the next message.`);
        return "continue";
      case "quit":
        this.print("Thank you for chatting! Goodbye.");
        return "quit";
      case "invalid":
        this.print(this.c.red(command.reason));
        return "continue";
    }
  }

  /**
   * Read-eval-print loop until /quit or end of input.
   */
  async run(input: Readable = process.stdin, output: Writable = process.stdout): Promise<void> {
    const rl = createInterface({ input, output, terminal: input === process.stdin && process.stdin.isTTY });
    this.print(this.c.bold(`Chatbot Personality Designer (${this.session.provider})`));
    this.print("Type a message to chat, or /help for commands.");
    this.logger.info("Shell started", { provider: this.session.provider, presets: this.presets.size });

    try {
      rl.setPrompt(promptLabel(this.session.state, this.c));
      rl.prompt();
      for await (const line of rl) {
        if ((await this.handleLine(line)) === "quit") break;
        rl.setPrompt(promptLabel(this.session.state, this.c));
        rl.prompt();
      }
    } finally {
      rl.close();
      this.logger.info("Shell stopped", { turns: this.session.transcript().length });
    }
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) this.print(line);
  }
}
