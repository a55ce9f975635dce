import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { requestCompletion, type CompletionParams } from "@/lib/ai";
import { RequestCounter } from "@/lib/request-counter";
import { completionBody, jsonResponse, queuedFetch, TEST_CONFIG } from "../helpers/fixtures";

const PARAMS: CompletionParams = { systemPrompt: "system text", userPrompt: "user text", timeoutMs: 1000 };

describe("requestCompletion", () => {
  let counter: RequestCounter;

  beforeEach(() => {
    counter = new RequestCounter();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports a missing key without calling the provider", async () => {
    const { fetch, calls } = queuedFetch();
    const outcome = await requestCompletion(PARAMS, { config: { ...TEST_CONFIG, apiKey: undefined }, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "missing_credential" } });
    expect(calls).toHaveLength(0);
    expect(counter.value).toBe(0);
  });

  it("posts the system and user messages with auth headers", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(completionBody("Water at dawn.")));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({
      ok: true,
      reply: { choices: [{ message: { content: "Water at dawn." } }] },
    });
    expect(counter.value).toBe(1);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe(TEST_CONFIG.apiUrl);
    expect(calls[0].init?.method).toBe("POST");
    const headers = new Headers(calls[0].init?.headers);
    expect(headers.get("Authorization")).toBe("Bearer test-secret");
    expect(headers.get("Content-Type")).toBe("application/json");
    expect(headers.get("X-Title")).toBe("CropTalk");
    expect(headers.get("HTTP-Referer")).toBeNull();
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      model: "test/model",
      messages: [
        { role: "system", content: "system text" },
        { role: "user", content: "user text" },
      ],
    });
  });

  it("sends the referer when an app URL is configured", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(completionBody("ok")));
    await requestCompletion(PARAMS, { config: { ...TEST_CONFIG, appUrl: "https://croptalk.test" }, counter, fetch });
    expect(new Headers(calls[0].init?.headers).get("HTTP-Referer")).toBe("https://croptalk.test");
  });

  it("merges sampling parameters into the payload", async () => {
    const { fetch, calls } = queuedFetch(jsonResponse(completionBody("ok")));
    const sampling = { max_tokens: 600, temperature: 0.3, top_p: 0.9, frequency_penalty: 0, presence_penalty: 0 };
    await requestCompletion({ ...PARAMS, sampling }, { config: TEST_CONFIG, counter, fetch });

    expect(JSON.parse(String(calls[0].init?.body))).toMatchObject(sampling);
  });

  it("maps 429 to rate_limited and still counts the reply", async () => {
    const { fetch } = queuedFetch(jsonResponse(JSON.stringify({ error: { message: "Rate limit" } }), 429));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "rate_limited", status: 429, detail: "429 Rate limit" } });
    expect(counter.value).toBe(1);
  });

  it("maps 401 to unauthorized", async () => {
    const { fetch } = queuedFetch(jsonResponse(JSON.stringify({ error: { message: "No auth" } }), 401));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "unauthorized", status: 401, detail: "401 No auth" } });
  });

  it("maps other statuses to http_error without counting an unparseable body", async () => {
    const { fetch } = queuedFetch(() => new Response("Internal oops", { status: 500 }));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "http_error", status: 500, detail: "500 Internal oops" } });
    expect(counter.value).toBe(0);
  });

  it("reports an unparseable success body as malformed", async () => {
    const { fetch } = queuedFetch(() => new Response("<html>gateway</html>", { status: 200 }));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "malformed_reply", status: 200 } });
    expect(counter.value).toBe(0);
  });

  it("reports JSON without choices as malformed but counts it", async () => {
    const { fetch } = queuedFetch(jsonResponse(JSON.stringify({ choices: [] })));
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch });

    expect(outcome).toEqual({ ok: false, error: { kind: "malformed_reply", status: 200 } });
    expect(counter.value).toBe(1);
  });

  it("reports a transport failure as connection_failure", async () => {
    const failing: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const outcome = await requestCompletion(PARAMS, { config: TEST_CONFIG, counter, fetch: failing });

    expect(outcome).toEqual({ ok: false, error: { kind: "connection_failure" } });
    expect(counter.value).toBe(0);
  });

  it("aborts and reports a timeout when the provider does not answer in time", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
      });
    const outcome = await requestCompletion({ ...PARAMS, timeoutMs: 10 }, { config: TEST_CONFIG, counter, fetch: hanging });

    expect(outcome).toEqual({ ok: false, error: { kind: "timeout" } });
    expect(counter.value).toBe(0);
  });
});
