import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { DateBucket } from "./conversation.js";
import type { ChannelClient } from "./discord.js";
import type { Logger } from "./logger.js";
import { sortedDates, type SummaryReport } from "./summarizer.js";

export const REPORT_HEADER = "=== 日付ごとの感情分析 ===";
export const RAW_HEADER = "=== 日付ごとの会話データ ===";
export const TREND_HEADER = "=== 感情の傾向 ===";

export function renderReport(report: SummaryReport, trend?: string): string {
  let content = `${REPORT_HEADER}\n`;
  for (const date of sortedDates(report)) {
    content += `\nDate: ${date}\n${report.get(date) ?? ""}\n`;
  }
  if (trend !== undefined) {
    content += `\n${TREND_HEADER}\n${trend}\n`;
  }
  return content;
}

/** Used when no summarizer is configured: the grouped lines themselves. */
export function renderRawConversations(bucket: DateBucket): string {
  let content = `${RAW_HEADER}\n`;
  for (const date of sortedDates(bucket)) {
    content += `\nDate: ${date}\n${(bucket.get(date) ?? []).join("\n")}\n`;
  }
  return content;
}

export interface ReportSink {
  readonly description: string;
  deliver(text: string): Promise<boolean>;
}

export class FileSink implements ReportSink {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  get description(): string {
    return `file ${this.filePath}`;
  }

  async deliver(text: string): Promise<boolean> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, text, "utf-8");
      return true;
    } catch (err) {
      this.logger.error(
        `Error saving results to ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    }
  }
}

export class ChannelMessageSink implements ReportSink {
  constructor(
    private readonly channel: ChannelClient,
    private readonly channelId: string,
  ) {}

  get description(): string {
    return `channel ${this.channelId}`;
  }

  deliver(text: string): Promise<boolean> {
    return this.channel.postMessage(this.channelId, text);
  }
}

export interface AttachmentOptions {
  fileName: string;
  title: string;
  comment: string;
}

export const DEFAULT_ATTACHMENT: AttachmentOptions = {
  fileName: "analysis_results.txt",
  title: "感情分析結果",
  comment: "チャット履歴の感情分析結果:",
};

export class ChannelAttachmentSink implements ReportSink {
  constructor(
    private readonly channel: ChannelClient,
    private readonly channelId: string,
    private readonly logger: Logger,
    private readonly options: AttachmentOptions = DEFAULT_ATTACHMENT,
    private readonly tempRoot: string = tmpdir(),
  ) {}

  get description(): string {
    return `channel ${this.channelId} (attachment)`;
  }

  async deliver(text: string): Promise<boolean> {
    let dir: string | undefined;
    try {
      dir = await mkdtemp(join(this.tempRoot, "mood-digest-"));
      const filePath = join(dir, this.options.fileName);
      await writeFile(filePath, text, "utf-8");
      return await this.channel.uploadFile(
        this.channelId,
        filePath,
        this.options.title,
        this.options.comment,
      );
    } catch (err) {
      this.logger.error(
        `Error posting results file to channel ${this.channelId}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return false;
    } finally {
      if (dir) await rm(dir, { recursive: true, force: true });
    }
  }
}
