import { NextResponse } from "next/server";
import { recordInteraction } from "../farmer-store";
import { checkRequestGate } from "../request-counter";
import type { ServerContext } from "../server-context";
import { parseInboundSms, TEST_PHONE } from "../sms";

/**
 * POST /api/sms: inbound SMS (SNS notification, form webhook or JSON).
 * The answer goes back to the sender over the SMS provider and is echoed in
 * the HTTP response for testing.
 */
export async function handleSms(req: Request, ctx: ServerContext): Promise<NextResponse> {
  try {
    const inbound = parseInboundSms(await req.text(), req.headers.get("content-type"));

    let reply: string;
    const gate = checkRequestGate(ctx.counter);
    if (!gate.allowed) {
      reply = gate.message;
    } else {
      const farmer = await ctx.farmers.get(inbound.from);
      const sensor = await ctx.sensors.getReading(inbound.from);
      const advice = await ctx.smsAdvisor.ask({ question: inbound.text, sensor, farmer });
      reply = advice.response;
      await recordInteraction(ctx.farmers, inbound.from, inbound.text, reply);
    }

    if (inbound.from !== TEST_PHONE) {
      const sent = await ctx.sms.send(inbound.from, reply);
      if (!sent.success) console.error("SMS reply error:", sent.error);
    }

    return NextResponse.json({ message: "Success", response: reply });
  } catch (error) {
    console.error("SMS handler error:", error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return NextResponse.json({ message: `Error: ${message}` }, { status: 500 });
  }
}
