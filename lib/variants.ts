/**
 * Deployment variants of the advice pipeline. Each front-end picks one; the
 * pipeline itself is the same everywhere.
 */

import type { PromptStyle } from "./advice-prompt";
import { GENERAL_FIELD_ADVICE, QUICK_FIELD_ADVICE, SMS_FIELD_ADVICE } from "./canned-advice";
import type { AdviceErrorKind, SamplingParams } from "./types";

export type VariantName = "console" | "web" | "fast" | "api" | "sms";

/** `unauthorized` is optional: variants without it report a 401 as `http_error`. */
export type ErrorMessages = Omit<Record<AdviceErrorKind, string>, "unauthorized"> & {
  unauthorized?: string;
};

export type AdviceVariant = {
  name: VariantName;
  style: PromptStyle;
  historyTurns: number;
  historyCharBudget: number;
  includeExamples: boolean;
  timeoutMs: number;
  sampling?: SamplingParams;
  /** Append the HTTP status and body to `http_error` messages. */
  echoErrorDetails: boolean;
  cannedAnswer: string;
  messages: ErrorMessages;
};

const PROCESSING_ERROR = "Error processing your request. Please try again later.";
const LIMIT_MESSAGE = "Daily API limit exceeded (50/50 requests used)";

const SERVICE_MESSAGES: ErrorMessages = {
  missing_credential: "The advice service is not configured yet. Please try again later.",
  rate_limited: "Our system is experiencing high demand. Please try again in a few hours.",
  http_error: PROCESSING_ERROR,
  connection_failure: "We could not reach the advice service. Please try again later.",
  timeout: "The advice service is taking too long to respond. Please try again later.",
  malformed_reply: PROCESSING_ERROR,
  empty_question: "No question provided",
  limit_exceeded: LIMIT_MESSAGE,
};

export const VARIANTS: Record<VariantName, AdviceVariant> = {
  console: {
    name: "console",
    style: "verbose",
    historyTurns: 4,
    historyCharBudget: 1000,
    includeExamples: true,
    timeoutMs: 60_000,
    echoErrorDetails: true,
    cannedAnswer: GENERAL_FIELD_ADVICE,
    messages: {
      missing_credential: "Error: No API key provided. Please set OPENROUTER_API_KEY and try again.",
      rate_limited: "Error: API rate limit exceeded. Please try again later.",
      unauthorized: "Error: Invalid API key. Please check your OpenRouter API key and try again.",
      http_error: "Error: HTTP error occurred.",
      connection_failure: "Error: Failed to connect to the API service. Please check your internet connection.",
      timeout: "Error: Request timed out. The AI service is taking too long to respond.",
      malformed_reply: "Error: Unexpected response format from the AI service.",
      empty_question: "Please type a question.",
      limit_exceeded: LIMIT_MESSAGE,
    },
  },
  web: {
    name: "web",
    style: "verbose",
    historyTurns: 4,
    historyCharBudget: 1000,
    includeExamples: true,
    timeoutMs: 30_000,
    echoErrorDetails: false,
    cannedAnswer: GENERAL_FIELD_ADVICE,
    messages: {
      ...SERVICE_MESSAGES,
      rate_limited: "Daily quota exceeded. Please try again tomorrow.",
      timeout: `The AI service is experiencing high demand. Here's some general advice based on your conditions:\n\n${GENERAL_FIELD_ADVICE}`,
    },
  },
  fast: {
    name: "fast",
    style: "terse",
    historyTurns: 2,
    historyCharBudget: 300,
    includeExamples: false,
    timeoutMs: 120_000,
    sampling: {
      max_tokens: 600,
      temperature: 0.3,
      top_p: 0.9,
      frequency_penalty: 0,
      presence_penalty: 0,
    },
    echoErrorDetails: false,
    cannedAnswer: QUICK_FIELD_ADVICE,
    messages: {
      ...SERVICE_MESSAGES,
      rate_limited: "Daily quota exceeded. Please try again tomorrow.",
    },
  },
  api: {
    name: "api",
    style: "concise",
    historyTurns: 0,
    historyCharBudget: 0,
    includeExamples: false,
    timeoutMs: 30_000,
    echoErrorDetails: false,
    cannedAnswer: GENERAL_FIELD_ADVICE,
    messages: SERVICE_MESSAGES,
  },
  sms: {
    name: "sms",
    style: "sms",
    historyTurns: 0,
    historyCharBudget: 0,
    includeExamples: false,
    timeoutMs: 30_000,
    echoErrorDetails: false,
    cannedAnswer: SMS_FIELD_ADVICE,
    messages: SERVICE_MESSAGES,
  },
};

export function errorMessage(variant: AdviceVariant, kind: AdviceErrorKind, detail?: string): string {
  if (kind === "unauthorized") {
    if (variant.messages.unauthorized) return variant.messages.unauthorized;
    return errorMessage(variant, "http_error", detail);
  }
  const base = variant.messages[kind];
  if (kind === "http_error" && variant.echoErrorDetails && detail) return `${base} ${detail}`;
  return base;
}
