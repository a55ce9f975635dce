import { NextResponse, type NextRequest } from "next/server";
import { truncateHistory } from "../advice-prompt";
import { recordInteraction } from "../farmer-store";
import { checkRequestGate } from "../request-counter";
import type { ServerContext } from "../server-context";
import { resolveSession, SESSION_COOKIE } from "../session";
import type { ConversationTurn } from "../types";
import { askBodySchema, mergeFarmerContext, toFarmerContext, userIdOf, type AskBody } from "./request-bodies";
import { withSessionCookie } from "./session";

/**
 * POST /api/ask { question, sensor_data?, crop_info?, user_id? }
 * → { success, response, request_count, sensor_data, used_fallback }
 */
export async function handleAsk(req: NextRequest, ctx: ServerContext): Promise<NextResponse> {
  const gate = checkRequestGate(ctx.counter);
  if (!gate.allowed) {
    return NextResponse.json({ success: false, message: gate.message }, { status: 429 });
  }

  try {
    const parsed = askBodySchema.safeParse(await req.json().catch(() => null));
    const body: AskBody = parsed.success ? parsed.data : { question: "" };
    const question = body.question.trim();

    if (!question) {
      return NextResponse.json({ success: false, message: "No question provided" }, { status: 400 });
    }

    const userId = userIdOf(body.user_id);
    const session = resolveSession(ctx.sessions, req.cookies.get(SESSION_COOKIE)?.value);
    const sensorData = body.sensor_data ?? (await ctx.sensors.getReading(userId ?? undefined));

    const cropInfo = body.crop_info ? toFarmerContext(body.crop_info) : session.state.cropInfo;
    const stored = userId ? await ctx.farmers.get(userId) : null;
    const farmer = mergeFarmerContext(stored, cropInfo);

    const advisor = userId ? ctx.apiAdvisor : ctx.webAdvisor;
    const maxTurns = advisor.variant.historyTurns;
    const result = await advisor.ask({
      question,
      sensor: sensorData,
      farmer,
      history: truncateHistory(session.state.history, maxTurns),
    });

    const turns: ConversationTurn[] = [
      ...session.state.history,
      { role: "user", content: question },
      { role: "assistant", content: result.response },
    ];
    ctx.sessions.save(session.id, { cropInfo, history: truncateHistory(turns, maxTurns) });

    if (userId) await recordInteraction(ctx.farmers, userId, question, result.response);

    const res = NextResponse.json({
      success: true,
      response: result.response,
      request_count: ctx.counter.value,
      sensor_data: sensorData,
      used_fallback: result.usedFallback,
    });
    return session.created ? withSessionCookie(res, session.id) : res;
  } catch (error) {
    console.error("Ask error:", error);
    return NextResponse.json(
      { success: false, message: "An error occurred processing your request" },
      { status: 500 }
    );
  }
}
