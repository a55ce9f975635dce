import { afterEach, describe, expect, it, vi } from "vitest";
import { SYSTEM_PROMPTS } from "@/lib/advice-prompt";
import { SMS_FIELD_ADVICE } from "@/lib/canned-advice";
import { handleSms } from "@/lib/handlers/sms";
import { testContext } from "../helpers/context";
import { completionBody, jsonResponse, queuedFetch } from "../helpers/fixtures";
import { sentPrompt } from "../helpers/requests";

function inbound(body: string, contentType = "application/json"): Request {
  return new Request("http://localhost/api/sms", { method: "POST", headers: { "Content-Type": contentType }, body });
}

describe("POST /api/sms", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers the sender by SMS and records the exchange", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(completionBody("Plant after the next rain.")));
    const ctx = testContext(fetch);
    ctx.farmers.profiles.set("+254700000001", { crops: "sorghum", growthStage: "1" });

    const res = await handleSms(inbound(JSON.stringify({ From: "+254700000001", Body: "When to plant?" })), ctx);

    expect(await res.json()).toEqual({ message: "Success", response: "Plant after the next rain." });
    expect(ctx.sms.sent).toEqual([{ to: "+254700000001", message: "Plant after the next rain." }]);
    expect(ctx.farmers.interactions).toEqual([
      { identifier: "+254700000001", question: "When to plant?", answer: "Plant after the next rain." },
    ]);
    const prompt = sentPrompt(calls[0].init);
    expect(prompt.system).toBe(SYSTEM_PROMPTS.sms);
    expect(prompt.user).toContain("- Main crops: sorghum\n- Growth stage: Planting/Seeding");
  });

  it("accepts form-encoded webhooks", async () => {
    const { fetch } = queuedFetch(jsonResponse(completionBody("Yes.")));
    const ctx = testContext(fetch);

    await handleSms(inbound("From=%2B15550001&Body=Rain+soon%3F", "application/x-www-form-urlencoded"), ctx);

    expect(ctx.farmers.interactions[0]).toEqual({ identifier: "+15550001", question: "Rain soon?", answer: "Yes." });
  });

  it("does not send SMS to the test phone", async () => {
    const { fetch } = queuedFetch(jsonResponse(completionBody("Monitor your crops closely.")));
    const ctx = testContext(fetch);

    const res = await handleSms(inbound(JSON.stringify({ Body: "Help" })), ctx);

    expect(await res.json()).toEqual({ message: "Success", response: SMS_FIELD_ADVICE });
    expect(ctx.sms.sent).toEqual([]);
  });

  it("replies with the limit message once the daily limit is used up", async () => {
    const { fetch, calls } = queuedFetch();
    const ctx = testContext(fetch);
    for (let i = 0; i < 50; i++) ctx.counter.increment();

    const res = await handleSms(inbound(JSON.stringify({ From: "+254700000001", Body: "Pests?" })), ctx);

    expect(await res.json()).toEqual({ message: "Success", response: "Daily API limit exceeded (50/50 requests used)" });
    expect(calls).toHaveLength(0);
    expect(ctx.sms.sent).toEqual([
      { to: "+254700000001", message: "Daily API limit exceeded (50/50 requests used)" },
    ]);
  });

  it("logs a failed send and still reports success", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { fetch } = queuedFetch(jsonResponse(completionBody("Irrigate tonight.")));
    const ctx = testContext(fetch);
    ctx.sms.result = { success: false, error: "HTTP 401" };

    const res = await handleSms(inbound(JSON.stringify({ From: "+254700000001", Body: "Dry soil" })), ctx);

    expect(res.status).toBe(200);
    expect(errorLog).toHaveBeenCalledWith("SMS reply error:", "HTTP 401");
  });
});
