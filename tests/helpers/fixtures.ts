import type { SensorReading } from "@/lib/types";

export const SENSOR: SensorReading = {
  temperature: 32.5,
  humidity: 45,
  soil_moisture: 22.4,
  light_level: 8000,
  rainfall_last_24h: 0,
  timestamp: "2024-06-14 09:30:00",
};

export const TEST_CONFIG = {
  apiKey: "test-secret",
  apiUrl: "https://openrouter.test/api/v1/chat/completions",
  model: "test/model",
  appUrl: undefined,
  appTitle: "CropTalk",
};

export function completionBody(content: string | null, reasoning?: string): string {
  return JSON.stringify({ choices: [{ message: { content, reasoning } }] });
}

export type RecordedCall = { url: string; init: RequestInit | undefined };

/** A fetch stand-in that answers every call with the next queued response. */
export function queuedFetch(...responses: Array<() => Response>): { fetch: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const queue = [...responses];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: typeof input === "string" ? input : input instanceof URL ? input.href : input.url, init });
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    return next();
  };
  return { fetch: fetchImpl, calls };
}

export function jsonResponse(body: string, status = 200): () => Response {
  return () => new Response(body, { status, headers: { "Content-Type": "application/json" } });
}
