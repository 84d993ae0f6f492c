import { readFileSync } from "node:fs";

export const SYSTEM_PROMPT = "You are a helpful assistant.";

const templates = new Map<string, string>();

function loadTemplate(name: string): string {
  let template = templates.get(name);
  if (template === undefined) {
    template = readFileSync(
      new URL(`../prompts/${name}.md`, import.meta.url),
      "utf-8",
    );
    templates.set(name, template);
  }
  return template;
}

/**
 * Substitute `{key}` placeholders in one pass, so placeholder-like text inside
 * the values is left alone. Unknown keys are kept verbatim.
 */
export function fillTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.hasOwn(values, key) ? values[key] : placeholder,
  );
}

export function buildEmotionPrompt(date: string, messages: string): string {
  return fillTemplate(loadTemplate("emotion-analysis"), { date, messages });
}

export function buildTrendPrompt(analyses: string): string {
  return fillTemplate(loadTemplate("trend-analysis"), { analyses });
}
