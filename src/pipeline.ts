import { countLines, parseByDate } from "./conversation.js";
import { selectMode, type AppConfig, type RunMode } from "./config.js";
import { DiscordChannelClient } from "./discord.js";
import { createLogger, type Logger } from "./logger.js";
import {
  ChannelAttachmentSink,
  ChannelMessageSink,
  FileSink,
  renderRawConversations,
  renderReport,
  type ReportSink,
} from "./report.js";
import {
  ChannelHistorySource,
  DebugFileSource,
  type ConversationSource,
} from "./source.js";
import {
  EmotionSummarizer,
  OpenRouterCompletionClient,
} from "./summarizer.js";

export type RunResult =
  | { ok: true; outcome: "report" | "raw-dump" }
  | {
      ok: false;
      reason: "no-data" | "no-summarizer" | "sink-failed" | "error";
    };

export interface PipelineParts {
  mode: RunMode;
  source: ConversationSource;
  /** Absent when no LLM key is configured. */
  summarizer: EmotionSummarizer | null;
  sink: ReportSink;
  includeTrend: boolean;
  logger: Logger;
}

export class Pipeline {
  constructor(private readonly parts: PipelineParts) {}

  get mode(): RunMode {
    return this.parts.mode;
  }

  async run(): Promise<RunResult> {
    const { mode, source, summarizer, sink, includeTrend, logger } =
      this.parts;
    try {
      const text = await source.load();
      const bucket = parseByDate(text ?? "");
      if (bucket.size === 0) {
        logger.error("No conversation data to analyze");
        return { ok: false, reason: "no-data" };
      }
      logger.info(
        `Parsed ${countLines(bucket)} message(s) across ${bucket.size} date(s)`,
      );

      if (!summarizer) {
        if (mode.kind !== "debug") {
          logger.error("No summarizer available");
          return { ok: false, reason: "no-summarizer" };
        }
        logger.warn("No summarizer available, writing grouped conversations");
        const delivered = await sink.deliver(renderRawConversations(bucket));
        if (!delivered) return { ok: false, reason: "sink-failed" };
        logger.info(`Conversation data written to ${sink.description}`);
        return { ok: true, outcome: "raw-dump" };
      }

      const report = await summarizer.summarize(bucket);
      const trend = includeTrend
        ? await summarizer.analyzeTrend(report)
        : undefined;

      const delivered = await sink.deliver(renderReport(report, trend));
      if (!delivered) return { ok: false, reason: "sink-failed" };
      logger.info(`Emotion analysis delivered to ${sink.description}`);
      return { ok: true, outcome: "report" };
    } catch (err) {
      const stack =
        err instanceof Error ? (err.stack ?? err.message) : String(err);
      logger.error(`Error running chat analysis: ${stack}`);
      return { ok: false, reason: "error" };
    }
  }
}

export function createPipeline(
  config: AppConfig,
  logger: Logger = createLogger("pipeline"),
): Pipeline {
  const mode = selectMode(config);
  const summarizer = config.openrouterApiKey
    ? new EmotionSummarizer(
        OpenRouterCompletionClient.fromApiKey(
          config.openrouterApiKey,
          config.openrouterModel,
        ),
        createLogger("summarizer"),
      )
    : null;

  switch (mode.kind) {
    case "live": {
      const channel = DiscordChannelClient.fromToken(
        mode.botToken,
        createLogger("discord"),
      );
      return new Pipeline({
        mode,
        source: new ChannelHistorySource(
          channel,
          mode.sourceChannelId,
          createLogger("source"),
        ),
        summarizer,
        sink:
          config.delivery === "file"
            ? new ChannelAttachmentSink(
                channel,
                mode.targetChannelId,
                createLogger("sink"),
              )
            : new ChannelMessageSink(channel, mode.targetChannelId),
        includeTrend: config.includeTrend,
        logger,
      });
    }
    case "debug":
      logger.info(
        `Debug mode (missing ${mode.missing.join(", ")}): reading ${mode.inputPath}`,
      );
      return new Pipeline({
        mode,
        source: new DebugFileSource(mode.inputPath, createLogger("source")),
        summarizer,
        sink: new FileSink(mode.outputPath, createLogger("sink")),
        includeTrend: config.includeTrend,
        logger,
      });
  }
}
