/**
 * CropTalk request/response types, shared by the CLI, web API and SMS gateway.
 */

/** Snapshot of farm sensor values. Field names match the JSON wire format. */
export type SensorReading = {
  /** °C */
  temperature: number;
  /** % */
  humidity: number;
  /** % */
  soil_moisture: number;
  /** Lux */
  light_level: number;
  /** mm */
  rainfall_last_24h: number;
  /** yyyy-MM-dd HH:mm:ss */
  timestamp: string;
};

export type FarmerContext = {
  crops?: string;
  /** Free text or a stage code "1"–"6" */
  growthStage?: string;
  issues?: string;
  location?: string;
  /** Hectares */
  farmSize?: string;
};

export type ConversationTurn = {
  role: "user" | "assistant";
  content: string;
};

export type AdviceErrorKind =
  | "missing_credential"
  | "rate_limited"
  | "unauthorized"
  | "http_error"
  | "connection_failure"
  | "timeout"
  | "malformed_reply"
  | "empty_question"
  | "limit_exceeded";

export type AdviceRequest = {
  question: string;
  sensor: SensorReading;
  farmer?: FarmerContext | null;
  history?: ConversationTurn[];
};

export type AdviceResponse = {
  response: string;
  /** True when a canned answer replaced the model's text. */
  usedFallback: boolean;
  error?: AdviceErrorKind;
};

/** Subset of an OpenAI-compatible chat completion body that the normalizer reads. */
export type ChatCompletionReply = {
  choices: Array<{
    message: {
      content?: string | null;
      reasoning?: string | null;
    };
  }>;
};

export type SamplingParams = {
  max_tokens: number;
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
};
