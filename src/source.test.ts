import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { RawMessage } from "./conversation.js";
import type { ChannelClient } from "./discord.js";
import { createLogger } from "./logger.js";
import { ChannelHistorySource, DebugFileSource } from "./source.js";

const silent = createLogger("test", () => {});

function historyChannel(
  history: RawMessage[] | null,
): ChannelClient & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    async fetchHistory(channelId: string) {
      fetched.push(channelId);
      return history;
    },
    async postMessage() {
      return true;
    },
    async uploadFile() {
      return true;
    },
  };
}

describe("ChannelHistorySource", () => {
  it("formats the fetched messages", async () => {
    const timestamp = new Date(2025, 1, 28, 7, 57, 11).getTime() / 1000;
    const channel = historyChannel([
      { speakerId: "42", text: "hello there", timestamp },
      { text: "system notice", timestamp },
    ]);

    const text = await new ChannelHistorySource(channel, "111", silent).load();

    assert.equal(text, "42: hello there (timestamp: 2025-02-28 07:57:11)");
    assert.deepEqual(channel.fetched, ["111"]);
  });

  it("yields null when the fetch fails", async () => {
    const source = new ChannelHistorySource(historyChannel(null), "111", silent);
    assert.equal(await source.load(), null);
  });

  it("yields null for an empty history", async () => {
    const source = new ChannelHistorySource(historyChannel([]), "111", silent);
    assert.equal(await source.load(), null);
  });
});

describe("DebugFileSource", () => {
  let dir = "";

  beforeEach(() => {
    dir = join(
      tmpdir(),
      `mood-digest-source-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
    );
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    try {
      rmSync(dir, { recursive: true });
    } catch {
      // ignore
    }
  });

  it("reads the file as text", async () => {
    const path = join(dir, "conversation_history.txt");
    writeFileSync(path, "U01: hi (timestamp: 2025-02-28 08:00:00)\n", "utf-8");
    assert.equal(
      await new DebugFileSource(path, silent).load(),
      "U01: hi (timestamp: 2025-02-28 08:00:00)\n",
    );
  });

  it("yields null for a missing file", async () => {
    const source = new DebugFileSource(join(dir, "missing.txt"), silent);
    assert.equal(await source.load(), null);
  });

  it("yields null for an empty file", async () => {
    const path = join(dir, "empty.txt");
    writeFileSync(path, "", "utf-8");
    assert.equal(await new DebugFileSource(path, silent).load(), null);
  });
});
