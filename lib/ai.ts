/**
 * OpenRouter chat-completions client. One POST per advice request; every
 * failure comes back as a value so callers always have something to say.
 */

import { z } from "zod";
import type { AppConfig } from "./config";
import type { RequestCounter } from "./request-counter";
import type { AdviceErrorKind, ChatCompletionReply, SamplingParams } from "./types";

export type ModelErrorKind = Exclude<AdviceErrorKind, "empty_question" | "limit_exceeded">;

export type CompletionError = {
  kind: ModelErrorKind;
  status?: number;
  /** Provider detail for logs and the console variant; never shown to SMS/web users. */
  detail?: string;
};

export type CompletionOutcome = { ok: true; reply: ChatCompletionReply } | { ok: false; error: CompletionError };

export type CompletionParams = {
  systemPrompt: string;
  userPrompt: string;
  timeoutMs: number;
  sampling?: SamplingParams;
};

export type CompletionDeps = {
  config: Pick<AppConfig, "apiKey" | "apiUrl" | "model" | "appUrl" | "appTitle">;
  counter: RequestCounter;
  fetch?: typeof fetch;
};

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          reasoning: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

function fail(kind: ModelErrorKind, status?: number, detail?: string): CompletionOutcome {
  return { ok: false, error: { kind, status, detail } };
}

function providerErrorMessage(body: unknown, text: string): string {
  const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(body);
  if (parsed.success && parsed.data.error.message.trim()) return parsed.data.error.message;
  return text.trim().slice(0, 300) || "Provider request failed";
}

function statusErrorKind(status: number): ModelErrorKind {
  if (status === 429) return "rate_limited";
  if (status === 401) return "unauthorized";
  return "http_error";
}

export async function requestCompletion(params: CompletionParams, deps: CompletionDeps): Promise<CompletionOutcome> {
  const { config, counter } = deps;
  const fetchImpl = deps.fetch ?? fetch;

  if (!config.apiKey) {
    return fail("missing_credential");
  }

  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
    "Content-Type": "application/json",
  };
  if (config.appUrl) headers["HTTP-Referer"] = config.appUrl;
  if (config.appTitle) headers["X-Title"] = config.appTitle;

  const payload = {
    model: config.model,
    messages: [
      { role: "system", content: params.systemPrompt },
      { role: "user", content: params.userPrompt },
    ],
    ...params.sampling,
  };

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, params.timeoutMs);

  let status: number;
  let ok: boolean;
  let text: string;
  try {
    const res = await fetchImpl(config.apiUrl, {
      method: "POST",
      headers,
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    status = res.status;
    ok = res.ok;
    text = await res.text();
  } catch (error) {
    if (timedOut) {
      console.error("OpenRouter timeout error:", `no reply within ${params.timeoutMs}ms`);
      return fail("timeout");
    }
    console.error("OpenRouter connection error:", error);
    return fail("connection_failure");
  } finally {
    clearTimeout(timer);
  }

  let body: unknown;
  let parsed = false;
  try {
    body = JSON.parse(text);
    parsed = true;
  } catch {
    body = null;
  }

  // Any reply the provider answered with a JSON body counts against the quota.
  if (parsed) counter.increment();

  if (!ok) {
    const detail = `${status} ${providerErrorMessage(body, text)}`;
    console.error("OpenRouter HTTP error:", detail);
    return fail(statusErrorKind(status), status, detail);
  }

  if (!parsed) {
    console.error("OpenRouter reply error:", `unparseable body (${text.slice(0, 120)})`);
    return fail("malformed_reply", status);
  }

  const reply = chatCompletionSchema.safeParse(body);
  if (!reply.success) {
    console.error("OpenRouter reply error:", reply.error.message);
    return fail("malformed_reply", status);
  }
  return { ok: true, reply: reply.data };
}
