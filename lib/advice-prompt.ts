/**
 * Prompt construction for the advice pipeline. System prompts are static per
 * verbosity level; the user prompt is plain text assembled in a fixed order.
 * Free text from the farmer is inserted as-is.
 */

import { format } from "date-fns";
import type { ConversationTurn, FarmerContext, SensorReading } from "./types";

export type PromptStyle = "verbose" | "concise" | "sms" | "terse";

const VERBOSE_SYSTEM_PROMPT = `You are CropTalk, an AI agricultural assistant for farmers.
You must provide detailed, practical, and actionable advice based on the farmer's question and available sensor data.
Always analyze how the environmental conditions (temperature, humidity, soil moisture, etc.) specifically affect the crops mentioned.
Your answers must be thorough, specific, and educational - avoid generic responses.
Format your answers with clear sections, bullet points for action steps, and bold for important information.
Explain WHY you're making each recommendation based on the environmental data provided.
If the question needs clarification, suggest specific information that would help you give better advice.
The farmer uses this data to make critical decisions, so your answers must be accurate, helpful, and directly address the question asked.
NEVER respond with generic advice like "monitor your crops closely" or "provide more details" - always give specific, actionable guidance.`;

const CONCISE_SYSTEM_PROMPT = `You are CropTalk, an AI agricultural assistant for farmers.
You provide practical, actionable advice based on the farmer's question and available sensor data.
Keep responses focused, informative and practical for farmers with limited connectivity.
Provide step-by-step solutions when applicable.
If you don't have enough information, ask clarifying questions.
Always consider the provided sensor data in your response.`;

const SMS_SYSTEM_PROMPT = `${CONCISE_SYSTEM_PROMPT}
Keep responses under 160 characters when possible for SMS compatibility.`;

const TERSE_SYSTEM_PROMPT = `You are CropTalk, a fast agricultural assistant.
Answer in at most 6 short bullet points under the heading "Actionable steps:".
Use the sensor values given. No introductions, no disclaimers, no generic advice.`;

export const SYSTEM_PROMPTS: Record<PromptStyle, string> = {
  verbose: VERBOSE_SYSTEM_PROMPT,
  concise: CONCISE_SYSTEM_PROMPT,
  sms: SMS_SYSTEM_PROMPT,
  terse: TERSE_SYSTEM_PROMPT,
};

const WORKED_EXAMPLES = `EXAMPLES OF GOOD RESPONSES:

QUESTION: "Why are my pepper leaves curling?"
GOOD ANSWER: "With temperature at 34°C and humidity at 38%, the curling is most likely heat and water stress rather than a virus. Peppers close their stomata above 32°C and roll leaves to cut water loss. Water deeply at dawn until the top 15 cm is moist, add 5 cm of straw mulch, and put 30% shade cloth over the rows from 11am to 4pm. Check leaf undersides for mites, which thrive in hot, dry air; if present, spray water on the undersides every second morning for a week."

QUESTION: "Is it a good time to sow maize?"
GOOD ANSWER: "Your soil moisture of 41% and 12mm of rain in the last day give good germination conditions. Maize needs soil at 10°C or warmer; at your current 26°C air temperature that is met. Sow 4-5 cm deep, 25 cm between plants and 75 cm between rows. Apply starter fertilizer in a band 5 cm beside the seed. If no rain falls in the next 5 days and moisture drops under 25%, irrigate lightly to keep the seedbed from crusting."`;

const VERBOSE_CLOSING =
  "Please provide specific, detailed, and actionable advice that directly addresses the question. Analyze how the current conditions are affecting the crops, explain why certain issues might be occurring, and provide clear step-by-step solutions.";

const CONCISE_CLOSING = "Please provide the most accurate and practical advice based on this information.";

/** Labels for the numbered growth-stage menu. */
export const GROWTH_STAGES: Record<string, string> = {
  "1": "Planting/Seeding",
  "2": "Sprouting/Emergence",
  "3": "Vegetative Growth",
  "4": "Flowering",
  "5": "Fruiting/Grain Development",
  "6": "Harvesting",
};

export function describeGrowthStage(stage: string): string {
  const trimmed = stage.trim();
  return GROWTH_STAGES[trimmed] ?? trimmed;
}

export type PromptOptions = {
  style: PromptStyle;
  /** Most recent turns kept from the conversation. */
  historyTurns: number;
  /** Characters kept from each history turn. */
  historyCharBudget: number;
  includeExamples: boolean;
  now?: Date;
};

export type AdvicePromptInput = {
  question: string;
  sensor: SensorReading;
  farmer?: FarmerContext | null;
  history?: ConversationTurn[];
};

export type AdvicePrompt = {
  systemPrompt: string;
  userPrompt: string;
};

export function truncateHistory(history: ConversationTurn[] | undefined, maxTurns: number): ConversationTurn[] {
  if (!history?.length || maxTurns <= 0) return [];
  return history.slice(-maxTurns);
}

function cropBlock(farmer: FarmerContext): string {
  const lines: string[] = [];
  if (farmer.location) lines.push(`- Location: ${farmer.location}`);
  if (farmer.farmSize) lines.push(`- Farm size: ${farmer.farmSize} hectares`);
  lines.push(`- Main crops: ${farmer.crops || "various crops"}`);
  lines.push(`- Growth stage: ${farmer.growthStage ? describeGrowthStage(farmer.growthStage) : "unknown"}`);
  if (farmer.issues) lines.push(`- Reported issues: ${farmer.issues}`);
  return ["CROP INFORMATION:", ...lines].join("\n");
}

function historyBlock(history: ConversationTurn[], charBudget: number): string | null {
  if (history.length === 0) return null;
  const turns = history.map((turn) => {
    const role = turn.role === "user" ? "FARMER" : "ASSISTANT";
    const content = turn.content.length > charBudget ? `${turn.content.slice(0, charBudget)}...` : turn.content;
    return `${role}: ${content}`;
  });
  return ["PREVIOUS CONVERSATION:", ...turns].join("\n\n");
}

function hasFarmerDetails(farmer: FarmerContext | null | undefined): farmer is FarmerContext {
  if (!farmer) return false;
  return Boolean(farmer.crops || farmer.growthStage || farmer.issues || farmer.location || farmer.farmSize);
}

export function buildAdvicePrompt(input: AdvicePromptInput, options: PromptOptions): AdvicePrompt {
  const now = options.now ?? new Date();
  const { sensor } = input;

  const sections: string[] = [
    `FARMER QUESTION: ${input.question}`,
    [
      "CURRENT FARM CONDITIONS:",
      `- Temperature: ${sensor.temperature}°C`,
      `- Humidity: ${sensor.humidity}%`,
      `- Soil Moisture: ${sensor.soil_moisture}%`,
      `- Light Level: ${sensor.light_level} Lux`,
      `- Rainfall (Last 24h): ${sensor.rainfall_last_24h}mm`,
      `- Current Month: ${format(now, "MMMM")}`,
      `- Date/Time: ${sensor.timestamp}`,
    ].join("\n"),
  ];

  if (hasFarmerDetails(input.farmer)) sections.push(cropBlock(input.farmer));

  const history = historyBlock(truncateHistory(input.history, options.historyTurns), options.historyCharBudget);
  if (history) sections.push(history);

  if (options.includeExamples) sections.push(WORKED_EXAMPLES);

  sections.push(options.style === "verbose" ? VERBOSE_CLOSING : CONCISE_CLOSING);

  return {
    systemPrompt: SYSTEM_PROMPTS[options.style],
    userPrompt: sections.join("\n\n"),
  };
}
