/**
 * Process-wide composition root for the Next.js route handlers. The request
 * counter, session store and advisors live here for the life of the server.
 */

import { createAdvisor, type Advisor } from "./advice";
import { loadConfig, type AppConfig } from "./config";
import { createQuery } from "./db";
import { NoopFarmerContextStore, PgFarmerContextStore, type FarmerContextStore } from "./farmer-store";
import { RequestCounter } from "./request-counter";
import { SimulatedSensorProvider, type SensorProvider } from "./sensors";
import { MemorySessionStore, type SessionStore } from "./session";
import { ConsoleSmsSender, Msg91SmsSender, type SmsSender } from "./sms";
import { VARIANTS } from "./variants";

export type ServerContext = {
  config: AppConfig;
  counter: RequestCounter;
  sessions: SessionStore;
  farmers: FarmerContextStore;
  sensors: SensorProvider;
  sms: SmsSender;
  /** Web chat (`web` or `fast`, from ADVICE_VARIANT). */
  webAdvisor: Advisor;
  /** JSON API callers identified by user_id. */
  apiAdvisor: Advisor;
  smsAdvisor: Advisor;
};

export function createServerContext(config: AppConfig, fetchImpl?: typeof fetch): ServerContext {
  const counter = new RequestCounter();

  let farmers: FarmerContextStore;
  if (config.databaseUrl) {
    farmers = new PgFarmerContextStore(createQuery(config.databaseUrl));
  } else {
    console.warn("DATABASE_URL not set - farmer profiles and interaction history are disabled");
    farmers = new NoopFarmerContextStore();
  }

  const sms: SmsSender = config.msg91AuthKey
    ? new Msg91SmsSender(
        {
          msg91AuthKey: config.msg91AuthKey,
          msg91SenderId: config.msg91SenderId,
          msg91Route: config.msg91Route,
        },
        fetchImpl
      )
    : new ConsoleSmsSender();

  const advisorFor = (name: keyof typeof VARIANTS) =>
    createAdvisor({ variant: VARIANTS[name], config, counter, fetch: fetchImpl });

  return {
    config,
    counter,
    sessions: new MemorySessionStore(),
    farmers,
    sensors: new SimulatedSensorProvider(),
    sms,
    webAdvisor: advisorFor(config.webVariant),
    apiAdvisor: advisorFor("api"),
    smsAdvisor: advisorFor("sms"),
  };
}

let context: ServerContext | null = null;

export function getServerContext(): ServerContext {
  if (context) return context;
  context = createServerContext(loadConfig());
  return context;
}
