import { createAdvisor } from "@/lib/advice";
import { loadConfig } from "@/lib/config";
import type { FarmerContextStore, StoreResult } from "@/lib/farmer-store";
import { RequestCounter } from "@/lib/request-counter";
import type { SensorProvider } from "@/lib/sensors";
import type { ServerContext } from "@/lib/server-context";
import { MemorySessionStore } from "@/lib/session";
import type { SmsSender, SmsSendResult } from "@/lib/sms";
import type { FarmerContext, SensorReading } from "@/lib/types";
import { VARIANTS } from "@/lib/variants";
import { SENSOR } from "./fixtures";

export class MemoryFarmerStore implements FarmerContextStore {
  readonly profiles = new Map<string, FarmerContext>();
  readonly interactions: Array<{ identifier: string; question: string; answer: string }> = [];
  failWrites = false;

  async get(identifier: string): Promise<FarmerContext | null> {
    return this.profiles.get(identifier) ?? null;
  }

  async saveProfile(identifier: string, context: FarmerContext): Promise<StoreResult> {
    if (this.failWrites) return { ok: false, error: new Error("write failed") };
    this.profiles.set(identifier, context);
    return { ok: true };
  }

  async appendInteraction(identifier: string, question: string, answer: string): Promise<StoreResult> {
    if (this.failWrites) return { ok: false, error: new Error("write failed") };
    this.interactions.push({ identifier, question, answer });
    return { ok: true };
  }
}

export class FixedSensorProvider implements SensorProvider {
  readonly requested: Array<string | undefined> = [];

  constructor(private readonly reading: SensorReading = SENSOR) {}

  async getReading(identifier?: string): Promise<SensorReading> {
    this.requested.push(identifier);
    return this.reading;
  }
}

export class RecordingSmsSender implements SmsSender {
  readonly sent: Array<{ to: string; message: string }> = [];
  result: SmsSendResult = { success: true };

  async send(to: string, message: string): Promise<SmsSendResult> {
    this.sent.push({ to, message });
    return this.result;
  }
}

export type TestContext = ServerContext & {
  farmers: MemoryFarmerStore;
  sensors: FixedSensorProvider;
  sms: RecordingSmsSender;
};

export function testContext(fetchImpl: typeof fetch): TestContext {
  const config = { ...loadConfig({}), apiKey: "test-secret" };
  const counter = new RequestCounter();
  const advisor = (name: keyof typeof VARIANTS) =>
    createAdvisor({ variant: VARIANTS[name], config, counter, fetch: fetchImpl });
  return {
    config,
    counter,
    sessions: new MemorySessionStore(),
    farmers: new MemoryFarmerStore(),
    sensors: new FixedSensorProvider(),
    sms: new RecordingSmsSender(),
    webAdvisor: advisor("web"),
    apiAdvisor: advisor("api"),
    smsAdvisor: advisor("sms"),
  };
}
