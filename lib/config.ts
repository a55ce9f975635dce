import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_API_URL: z.string().url().default("https://openrouter.ai/api/v1/chat/completions"),
  OPENROUTER_MODEL: z.string().min(1).default("deepseek/deepseek-r1-0528:free"),
  APP_URL: optionalString,
  APP_TITLE: z.string().default("CropTalk"),
  ADVICE_VARIANT: z.enum(["web", "fast"]).default("web"),
  DATABASE_URL: optionalString,
  MSG91_AUTH_KEY: optionalString,
  MSG91_SENDER_ID: z.string().default("SMSIND"),
  MSG91_ROUTE: z.string().default("4"),
});

export type AppConfig = {
  apiKey?: string;
  apiUrl: string;
  model: string;
  appUrl?: string;
  appTitle: string;
  webVariant: "web" | "fast";
  databaseUrl?: string;
  msg91AuthKey?: string;
  msg91SenderId: string;
  msg91Route: string;
};

/** Empty strings count as unset, so `FOO=` in .env behaves like a missing line. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.parse(cleaned);
  return {
    apiKey: parsed.OPENROUTER_API_KEY,
    apiUrl: parsed.OPENROUTER_API_URL,
    model: parsed.OPENROUTER_MODEL,
    appUrl: parsed.APP_URL,
    appTitle: parsed.APP_TITLE,
    webVariant: parsed.ADVICE_VARIANT,
    databaseUrl: parsed.DATABASE_URL,
    msg91AuthKey: parsed.MSG91_AUTH_KEY,
    msg91SenderId: parsed.MSG91_SENDER_ID,
    msg91Route: parsed.MSG91_ROUTE,
  };
}
