/**
 * SMS gateway plumbing: parsing inbound messages and sending replies.
 *
 * Inbound messages arrive as an SNS notification (two-way SMS), a
 * form-encoded webhook (`From`/`Body`), or plain JSON with the same fields.
 */

import { z } from "zod";
import type { AppConfig } from "./config";

export const TEST_PHONE = "test_phone";

export type InboundSms = {
  from: string;
  text: string;
};

const snsEnvelopeSchema = z.object({
  Records: z
    .array(
      z.object({
        EventSource: z.literal("aws:sns"),
        Sns: z.object({ Message: z.string() }),
      })
    )
    .min(1),
});

const snsMessageSchema = z.object({
  originationNumber: z.string().min(1),
  messageBody: z.string(),
});

const webhookSchema = z.object({
  From: z.string().optional(),
  Body: z.string().optional(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function parseInboundSms(rawBody: string, contentType: string | null): InboundSms {
  const json = parseJson(rawBody);

  const envelope = snsEnvelopeSchema.safeParse(json);
  if (envelope.success) {
    const message = snsMessageSchema.safeParse(parseJson(envelope.data.Records[0].Sns.Message));
    if (message.success) {
      return { from: message.data.originationNumber, text: message.data.messageBody };
    }
  }

  const isForm =
    (contentType ?? "").includes("application/x-www-form-urlencoded") || (json === null && rawBody.includes("="));
  const fields = isForm ? Object.fromEntries(new URLSearchParams(rawBody)) : json;
  const webhook = webhookSchema.safeParse(fields);
  const data: z.infer<typeof webhookSchema> = webhook.success ? webhook.data : {};
  return { from: data.From?.trim() || TEST_PHONE, text: data.Body ?? "Hello" };
}

export type SmsSendResult = { success: true } | { success: false; error: string };

export interface SmsSender {
  send(to: string, message: string): Promise<SmsSendResult>;
}

/** MSG91 transactional SMS over its HTTP API. */
export class Msg91SmsSender implements SmsSender {
  constructor(
    private readonly config: Required<Pick<AppConfig, "msg91AuthKey" | "msg91SenderId" | "msg91Route">>,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async send(to: string, message: string): Promise<SmsSendResult> {
    // MSG91 wants digits only (e.g. +919876543210 -> 919876543210)
    const mobile = to.replace(/\D/g, "");
    const params = new URLSearchParams({
      authkey: this.config.msg91AuthKey,
      mobiles: mobile,
      message,
      sender: this.config.msg91SenderId,
      route: this.config.msg91Route,
    });

    try {
      const res = await this.fetchImpl(`https://api.msg91.com/api/sendhttp.php?${params.toString()}`, {
        method: "GET",
      });
      if (!res.ok) {
        const body = await res.text().catch(() => "");
        console.error("MSG91 error:", res.status, body);
        return { success: false, error: `HTTP ${res.status}` };
      }
      return { success: true };
    } catch (err) {
      console.error("MSG91 request failed:", err);
      return { success: false, error: String(err) };
    }
  }
}

/** Stand-in when no SMS provider is configured: logs instead of sending. */
export class ConsoleSmsSender implements SmsSender {
  async send(to: string, message: string): Promise<SmsSendResult> {
    console.info(`SMS to ${to}: ${message}`);
    return { success: true };
  }
}
