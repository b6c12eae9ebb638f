import { PassThrough, Readable } from "node:stream";
import { Chalk } from "chalk";
import { describe, it, expect } from "vitest";
import { ChatShell } from "./chat-shell.js";
import { FALLBACK_BANNER } from "./render.js";
import { ChatSession } from "../conversation/session.js";
import { FallbackResponder, FALLBACK_NOTICE } from "../fallback/responder.js";
import { ConnectivityError } from "../llm/errors.js";
import { MockGenerationClient } from "../llm/mock-client.js";
import type { GenerationClient } from "../llm/types.js";
import { builtInPresets } from "../personality/presets.js";
import { createLogger } from "../logger/index.js";

const silentLogger = createLogger({ enableConsole: false, enableFile: false });
const plain = new Chalk({ level: 0 });

function setup(client: GenerationClient = new MockGenerationClient(["Hi there"])) {
  const lines: string[] = [];
  const session = new ChatSession({ client, fallback: new FallbackResponder(), logger: silentLogger });
  const shell = new ChatShell({
    session,
    presets: builtInPresets(),
    print: (line) => lines.push(line),
    colors: plain,
    logger: silentLogger,
  });
  return { shell, session, lines };
}

const downClient: GenerationClient = {
  provider: "stub",
  generate: async () => {
    throw new ConnectivityError("connection refused");
  },
};

describe("ChatShell.handleLine", () => {
  it("prints the live reply", async () => {
    const { shell, lines } = setup();

    await expect(shell.handleLine("hello")).resolves.toBe("continue");

    expect(lines).toEqual(["bot> Hi there"]);
  });

  it("flags a fallback reply with the failure and a warning banner", async () => {
    const { shell, lines } = setup(downClient);

    await shell.handleLine("hello");

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("Connection failed: connection refused");
    expect(lines[1]).toBe(`! ${FALLBACK_BANNER}`);
    expect(lines[2]?.startsWith(`bot> ${FALLBACK_NOTICE} `)).toBe(true);
  });

  it("changes one trait with /set", async () => {
    const { shell, session, lines } = setup();

    await shell.handleLine("/set sarcasm 0.9");

    expect(session.profile.sarcasm).toBe(0.9);
    expect(lines).toEqual(["sarcasm set to 0.90"]);
  });

  it("prints out-of-range values instead of throwing", async () => {
    const { shell, session, lines } = setup();

    await expect(shell.handleLine("/set sarcasm 1.5")).resolves.toBe("continue");

    expect(lines).toEqual(["Personality trait 'sarcasm' must be between 0 and 1, got 1.5"]);
    expect(session.profile.sarcasm).toBe(0);
  });

  it("applies a preset and shows it", async () => {
    const { shell, session, lines } = setup();

    await shell.handleLine("/preset Friendly");

    expect(session.profile.name).toBe("Friendly");
    expect(lines[0]).toBe("Applied 'Friendly' preset!");
    expect(lines[1]).toBe("Personality: Friendly");
    expect(lines[4]).toBe("  friendliness    0.90  very_high");
  });

  it("reports an unknown preset", async () => {
    const { shell, lines } = setup();

    await shell.handleLine("/preset Grumpy");

    expect(lines).toEqual(['Unknown preset "Grumpy". Available: Professional, Friendly, Creative, Sarcastic']);
  });

  it("marks the active preset in the list", async () => {
    const { shell, lines } = setup();

    await shell.handleLine("/presets");

    expect(lines).toEqual(["  Professional", "  Friendly", "  Creative", "  Sarcastic", "* Custom"]);
  });

  it("shows the request the next message would send", async () => {
    const { shell, lines } = setup();

    await shell.handleLine("/prompt tell me a joke");

    expect(lines[0]).toBe("System instructions:");
    expect(lines).toContain("Messages (1):");
    expect(lines).toContain("  [user] tell me a joke");
    expect(lines[lines.length - 1]).toBe("  temperature 0.65, max tokens 125");
  });

  it("resets the conversation", async () => {
    const { shell, session } = setup();
    await shell.handleLine("hello");

    await shell.handleLine("/reset");

    expect(session.transcript()).toEqual([]);
  });

  it("says goodbye on /quit", async () => {
    const { shell, lines } = setup();

    await expect(shell.handleLine("/quit")).resolves.toBe("quit");
    expect(lines).toEqual(["Thank you for chatting! Goodbye."]);
  });
});

describe("ChatShell.run", () => {
  it("chats until /quit", async () => {
    const client = new MockGenerationClient(["Hi there"]);
    const { shell, lines } = setup(client);

    await shell.run(Readable.from(["hello\n/quit\nignored\n"]), new PassThrough());

    expect(lines).toContain("bot> Hi there");
    expect(lines[lines.length - 1]).toBe("Thank you for chatting! Goodbye.");
    expect(client.requests).toHaveLength(1);
  });

  it("stops at the end of input", async () => {
    const { shell, session } = setup();

    await shell.run(Readable.from(["hello\n"]), new PassThrough());

    expect(session.transcript()).toHaveLength(2);
  });
});
