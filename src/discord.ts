import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { REST, Routes } from "discord.js";
import type { RawMessage } from "./conversation.js";
import type { Logger } from "./logger.js";

const DISCORD_MAX_LENGTH = 2000;
const HISTORY_LIMIT = 100;

export function splitMessage(text: string): string[] {
  if (text.length <= DISCORD_MAX_LENGTH) return [text];

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > 0) {
    if (remaining.length <= DISCORD_MAX_LENGTH) {
      chunks.push(remaining);
      break;
    }
    let splitAt = remaining.lastIndexOf("\n", DISCORD_MAX_LENGTH);
    if (splitAt <= 0) {
      splitAt = remaining.lastIndexOf(" ", DISCORD_MAX_LENGTH);
    }
    if (splitAt <= 0) {
      splitAt = DISCORD_MAX_LENGTH;
    }
    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt).trimStart();
  }
  return chunks;
}

/** The parts of a Discord message object the history mapping reads. */
export interface HistoryRecord {
  author?: { id?: string };
  content?: string;
  timestamp?: string;
}

export function toRawMessages(records: HistoryRecord[]): RawMessage[] {
  return records.map((record) => {
    const millis =
      record.timestamp !== undefined ? Date.parse(record.timestamp) : NaN;
    return {
      speakerId: record.author?.id,
      text: record.content,
      timestamp: Number.isNaN(millis) ? undefined : millis / 1000,
    };
  });
}

export interface ChannelClient {
  fetchHistory(channelId: string): Promise<RawMessage[] | null>;
  postMessage(channelId: string, text: string): Promise<boolean>;
  uploadFile(
    channelId: string,
    filePath: string,
    title: string,
    comment: string,
  ): Promise<boolean>;
}

export type RestTransport = Pick<REST, "get" | "post">;

export class DiscordChannelClient implements ChannelClient {
  constructor(
    private readonly rest: RestTransport,
    private readonly logger: Logger,
  ) {}

  static fromToken(token: string, logger: Logger): DiscordChannelClient {
    return new DiscordChannelClient(
      new REST({ version: "10" }).setToken(token),
      logger,
    );
  }

  async fetchHistory(channelId: string): Promise<RawMessage[] | null> {
    try {
      const result = await this.rest.get(Routes.channelMessages(channelId), {
        query: new URLSearchParams({ limit: String(HISTORY_LIMIT) }),
      });
      if (!Array.isArray(result)) {
        this.logger.error(`Unexpected history payload for channel ${channelId}`);
        return null;
      }
      const records: HistoryRecord[] = result;
      this.logger.info(`${records.length} messages found in ${channelId}`);
      return toRawMessages(records);
    } catch (err) {
      this.logger.error(
        `Error fetching history from channel ${channelId}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return null;
    }
  }

  async postMessage(channelId: string, text: string): Promise<boolean> {
    try {
      for (const chunk of splitMessage(text)) {
        await this.rest.post(Routes.channelMessages(channelId), {
          body: { content: chunk },
        });
      }
      this.logger.info(`Message posted to channel ${channelId}`);
      return true;
    } catch (err) {
      this.logger.error(
        `Error posting message to channel ${channelId}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    }
  }

  async uploadFile(
    channelId: string,
    filePath: string,
    title: string,
    comment: string,
  ): Promise<boolean> {
    try {
      const name = basename(filePath);
      const data = await readFile(filePath);
      await this.rest.post(Routes.channelMessages(channelId), {
        body: {
          content: comment,
          attachments: [{ id: 0, filename: name, title }],
        },
        files: [{ name, data }],
      });
      this.logger.info(`File uploaded to channel ${channelId}`);
      return true;
    } catch (err) {
      this.logger.error(
        `Error uploading file to channel ${channelId}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    }
  }
}
