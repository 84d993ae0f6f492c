import { readFile } from "node:fs/promises";
import { formatMessages, type RawMessage } from "./conversation.js";
import type { ChannelClient } from "./discord.js";
import type { Logger } from "./logger.js";

/** Produces conversation text in the `SPEAKER: body (timestamp: …)` format. */
export interface ConversationSource {
  load(): Promise<string | null>;
}

export class ChannelHistorySource implements ConversationSource {
  constructor(
    private readonly channel: ChannelClient,
    private readonly channelId: string,
    private readonly logger: Logger,
  ) {}

  fetch(): Promise<RawMessage[] | null> {
    return this.channel.fetchHistory(this.channelId);
  }

  async load(): Promise<string | null> {
    const messages = await this.fetch();
    if (!messages || messages.length === 0) {
      this.logger.warn(`No messages retrieved from channel ${this.channelId}`);
      return null;
    }
    return formatMessages(messages);
  }
}

export class DebugFileSource implements ConversationSource {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<string | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (err) {
      this.logger.error(
        `Error reading conversation history from ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return null;
    }
    return text || null;
  }
}
