/**
 * Turns a chat-completion reply into the text the farmer sees.
 *
 * Reasoning models sometimes return an empty `content` and put the answer in
 * `message.reasoning`; the rules below pull the useful part out of it. Rules
 * are tried in order and the first marker found wins, so new markers only need
 * a new entry.
 */

import type { AdviceVariant } from "./variants";
import type { AdviceResponse, ChatCompletionReply } from "./types";

export const MAX_RESPONSE_CHARS = 1500;
export const GENERIC_GUARD_MAX_CHARS = 200;
export const REASONING_PREFIX_CHARS = 1000;
export const TRUNCATION_MARKER = "...";

export type ReasoningRule = {
  marker: string;
  leadIn: string;
  /** Receives the text after the marker; null/empty means "rule does not apply". */
  extract: (afterMarker: string) => string | null;
};

const ANALYSIS_ACTION_MARKERS = ["Solution:", "Actions:", "Recommendations:", "Steps:", "What to do:"];

/** Markers that introduce paragraphs worth keeping when a reply is too long. */
export const ACTION_MARKERS = ["Actionable steps:", "Immediate Actions:", ...ANALYSIS_ACTION_MARKERS];

export const REASONING_LEAD_IN = "Here is my assessment based on your farm conditions:";

export const REASONING_RULES: ReasoningRule[] = [
  {
    marker: "Actionable steps:",
    leadIn: "Here are the recommended actions for your farm:",
    extract: (rest) => rest.trim() || null,
  },
  {
    marker: "Analysis:",
    leadIn: "Based on an analysis of your current conditions:",
    extract: (rest) => {
      for (const nested of ANALYSIS_ACTION_MARKERS) {
        const at = indexOfIgnoreCase(rest, nested);
        if (at >= 0) return rest.slice(at).trim() || null;
      }
      return rest.trim().slice(0, REASONING_PREFIX_CHARS) || null;
    },
  },
];

export const GENERIC_PHRASES = [
  "monitor your crops closely",
  "provide more details",
  "for more specific advice",
  "i need more information",
  "provide details about your crop",
];

function indexOfIgnoreCase(haystack: string, needle: string): number {
  return haystack.toLowerCase().indexOf(needle.toLowerCase());
}

export function answerFromReasoning(reasoning: string, rules: ReasoningRule[] = REASONING_RULES): string {
  const text = reasoning.trim();
  if (!text) return "";
  for (const rule of rules) {
    const at = indexOfIgnoreCase(text, rule.marker);
    if (at < 0) continue;
    const extracted = rule.extract(text.slice(at + rule.marker.length));
    if (extracted) return `${rule.leadIn}\n\n${extracted}`;
  }
  return `${REASONING_LEAD_IN}\n\n${text.slice(0, REASONING_PREFIX_CHARS)}`;
}

function hardTruncate(text: string): string {
  return `${text.slice(0, MAX_RESPONSE_CHARS)}${TRUNCATION_MARKER}`;
}

export function extractActionSections(text: string): string | null {
  const sections = text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p && ACTION_MARKERS.some((m) => indexOfIgnoreCase(p, m) >= 0));
  return sections.length ? sections.join("\n\n") : null;
}

export function limitLength(text: string): string {
  if (text.length <= MAX_RESPONSE_CHARS) return text;
  const sections = extractActionSections(text);
  if (!sections) return hardTruncate(text);
  return sections.length > MAX_RESPONSE_CHARS ? hardTruncate(sections) : sections;
}

export function isTooGeneric(text: string): boolean {
  if (text.length >= GENERIC_GUARD_MAX_CHARS) return false;
  const lower = text.toLowerCase();
  return GENERIC_PHRASES.some((phrase) => lower.includes(phrase));
}

export function normalizeAdviceReply(reply: ChatCompletionReply, variant: AdviceVariant): AdviceResponse {
  const canned: AdviceResponse = { response: variant.cannedAnswer, usedFallback: true };
  try {
    const message = reply.choices[0]?.message;
    let content = message?.content?.trim() ?? "";
    if (!content && message?.reasoning) {
      content = answerFromReasoning(message.reasoning);
    }
    if (!content) return canned;

    content = limitLength(content);
    if (isTooGeneric(content)) return canned;

    return { response: content, usedFallback: false };
  } catch (error) {
    console.error("Normalize reply error:", error);
    return canned;
  }
}
