/**
 * The advice pipeline: prompt → model call → normalized answer.
 * Gating (request ceiling) happens in the front-ends before `ask` is called.
 */

import { buildAdvicePrompt } from "./advice-prompt";
import { normalizeAdviceReply } from "./advice-response";
import { requestCompletion, type CompletionDeps } from "./ai";
import type { AdviceRequest, AdviceResponse } from "./types";
import { errorMessage, type AdviceVariant } from "./variants";

export type AdvisorDeps = CompletionDeps & {
  variant: AdviceVariant;
  now?: () => Date;
};

export type Advisor = {
  variant: AdviceVariant;
  ask(request: AdviceRequest): Promise<AdviceResponse>;
};

export function createAdvisor(deps: AdvisorDeps): Advisor {
  const { variant } = deps;

  async function ask(request: AdviceRequest): Promise<AdviceResponse> {
    const question = request.question.trim();
    if (!question) {
      return { response: errorMessage(variant, "empty_question"), usedFallback: false, error: "empty_question" };
    }

    const prompt = buildAdvicePrompt(
      { question, sensor: request.sensor, farmer: request.farmer, history: request.history },
      {
        style: variant.style,
        historyTurns: variant.historyTurns,
        historyCharBudget: variant.historyCharBudget,
        includeExamples: variant.includeExamples,
        now: deps.now?.(),
      }
    );

    const outcome = await requestCompletion(
      {
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        timeoutMs: variant.timeoutMs,
        sampling: variant.sampling,
      },
      deps
    );

    if (!outcome.ok) {
      const { kind, detail } = outcome.error;
      return { response: errorMessage(variant, kind, detail), usedFallback: false, error: kind };
    }
    return normalizeAdviceReply(outcome.reply, variant);
  }

  return { variant, ask };
}
