import { OpenRouter } from "@openrouter/sdk";
import type { DateBucket } from "./conversation.js";
import type { Logger } from "./logger.js";
import { SYSTEM_PROMPT, buildEmotionPrompt, buildTrendPrompt } from "./prompts.js";

export type SummaryReport = Map<string, string>;

export const DEFAULT_MODEL = "openai/gpt-4o-mini";

export interface CompletionClient {
  complete(systemPrompt: string, userMessage: string): Promise<string>;
}

export class OpenRouterCompletionClient implements CompletionClient {
  constructor(
    private readonly client: OpenRouter,
    private readonly model: string = DEFAULT_MODEL,
  ) {}

  static fromApiKey(apiKey: string, model?: string): OpenRouterCompletionClient {
    return new OpenRouterCompletionClient(new OpenRouter({ apiKey }), model);
  }

  async complete(systemPrompt: string, userMessage: string): Promise<string> {
    const completion = await this.client.chat.send({
      chatGenerationParams: {
        model: this.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userMessage },
        ],
      },
    });

    const content = completion.choices?.[0]?.message?.content;
    if (typeof content !== "string" || !content) {
      throw new Error(`No response content from model ${this.model}`);
    }
    return content;
  }
}

export function analysisErrorMarker(err: unknown): string {
  return `分析エラー: ${err instanceof Error ? err.message : String(err)}`;
}

export function sortedDates<V>(entries: Map<string, V>): string[] {
  return [...entries.keys()].sort();
}

export interface PromptBuilders {
  emotion(date: string, messages: string): string;
  trend(analyses: string): string;
}

const TEMPLATE_PROMPTS: PromptBuilders = {
  emotion: buildEmotionPrompt,
  trend: buildTrendPrompt,
};

export class EmotionSummarizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: Logger,
    private readonly prompts: PromptBuilders = TEMPLATE_PROMPTS,
  ) {}

  async summarize(bucket: DateBucket): Promise<SummaryReport> {
    const report: SummaryReport = new Map();

    for (const [date, lines] of bucket) {
      const startTime = Date.now();
      try {
        const prompt = this.prompts.emotion(date, lines.join("\n"));
        report.set(date, await this.client.complete(SYSTEM_PROMPT, prompt));
        this.logger.info(
          `Analyzed emotions for ${date} (${Date.now() - startTime}ms)`,
        );
      } catch (err) {
        this.logger.error(
          `Emotion analysis failed for ${date}: ${err instanceof Error ? err.message : String(err)}`,
        );
        report.set(date, analysisErrorMarker(err));
      }
    }

    return report;
  }

  /** One extra completion comparing the per-date summaries over time. */
  async analyzeTrend(report: SummaryReport): Promise<string> {
    const analyses = sortedDates(report)
      .map((date) => `Date: ${date}\n${report.get(date) ?? ""}`)
      .join("\n\n");
    try {
      const trend = await this.client.complete(
        SYSTEM_PROMPT,
        this.prompts.trend(analyses),
      );
      this.logger.info(`Analyzed emotion trend across ${report.size} date(s)`);
      return trend;
    } catch (err) {
      this.logger.error(
        `Trend analysis failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return analysisErrorMarker(err);
    }
  }
}
