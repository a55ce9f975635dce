import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleSmsSender, Msg91SmsSender, parseInboundSms, TEST_PHONE } from "@/lib/sms";
import { queuedFetch } from "../helpers/fixtures";

describe("parseInboundSms", () => {
  it("reads an SNS two-way SMS notification", () => {
    const body = JSON.stringify({
      Records: [
        {
          EventSource: "aws:sns",
          Sns: { Message: JSON.stringify({ originationNumber: "+254700000001", messageBody: "Maize leaves yellow" }) },
        },
      ],
    });
    expect(parseInboundSms(body, "application/json")).toEqual({ from: "+254700000001", text: "Maize leaves yellow" });
  });

  it("reads a form-encoded webhook", () => {
    expect(parseInboundSms("From=%2B254700000002&Body=When+to+plant%3F", "application/x-www-form-urlencoded")).toEqual({
      from: "+254700000002",
      text: "When to plant?",
    });
  });

  it("treats key=value bodies as a form without a content type", () => {
    expect(parseInboundSms("From=555&Body=hi", null)).toEqual({ from: "555", text: "hi" });
  });

  it("reads plain JSON fields", () => {
    expect(parseInboundSms(JSON.stringify({ From: " 777 ", Body: "Rain soon?" }), "application/json")).toEqual({
      from: "777",
      text: "Rain soon?",
    });
  });

  it("falls back to the test phone and a greeting", () => {
    expect(parseInboundSms("{}", "application/json")).toEqual({ from: TEST_PHONE, text: "Hello" });
    expect(parseInboundSms("", null)).toEqual({ from: TEST_PHONE, text: "Hello" });
  });

  it("keeps an empty body as an empty question", () => {
    expect(parseInboundSms(JSON.stringify({ From: "777", Body: "" }), "application/json")).toEqual({
      from: "777",
      text: "",
    });
  });
});

describe("Msg91SmsSender", () => {
  const config = { msg91AuthKey: "test-secret", msg91SenderId: "SMSIND", msg91Route: "4" };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends digits-only numbers through the HTTP API", async () => {
    const { fetch, calls } = queuedFetch(() => new Response("ok", { status: 200 }));
    const result = await new Msg91SmsSender(config, fetch).send("+91 98765-43210", "Water at dawn");

    expect(result).toEqual({ success: true });
    const url = new URL(calls[0].url);
    expect(url.origin + url.pathname).toBe("https://api.msg91.com/api/sendhttp.php");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      authkey: "test-secret",
      mobiles: "919876543210",
      message: "Water at dawn",
      sender: "SMSIND",
      route: "4",
    });
  });

  it("reports a failed send", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { fetch } = queuedFetch(() => new Response("bad key", { status: 401 }));
    expect(await new Msg91SmsSender(config, fetch).send("123", "x")).toEqual({ success: false, error: "HTTP 401" });
  });
});

describe("ConsoleSmsSender", () => {
  it("logs the message instead of sending it", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    expect(await new ConsoleSmsSender().send("123", "hello")).toEqual({ success: true });
    expect(info).toHaveBeenCalledWith("SMS to 123: hello");
    info.mockRestore();
  });
});
