/**
 * Interactive console front-end. I/O goes through `ConsoleIO` so the session
 * can be driven by readline in the CLI and by scripted answers in tests.
 */

import { createAdvisor } from "./advice";
import { describeGrowthStage, GROWTH_STAGES, truncateHistory } from "./advice-prompt";
import type { AppConfig } from "./config";
import { saveApiKeyToEnvFile } from "./credentials";
import { checkRequestGate, RequestCounter } from "./request-counter";
import { readingFromManualInput, simulateReading } from "./sensors";
import type { ConversationTurn, FarmerContext, SensorReading } from "./types";
import { VARIANTS } from "./variants";

export type ConsoleIO = {
  /** Resolves null once input is closed. */
  ask(prompt: string): Promise<string | null>;
  print(text?: string): void;
};

export type ConsoleOptions = {
  io: ConsoleIO;
  config: AppConfig;
  counter?: RequestCounter;
  envFilePath?: string;
  fetch?: typeof fetch;
  now?: () => Date;
};

const RULE = "=".repeat(60);
const EXIT_COMMANDS = new Set(["exit", "quit", "q"]);

export async function promptForApiKey(io: ConsoleIO, envFilePath: string): Promise<string | undefined> {
  io.print("\n===== OpenRouter API Key Required =====");
  io.print("CropTalk needs an OpenRouter API key. Get one at: https://openrouter.ai/keys");
  const apiKey = (await io.ask("Enter your OpenRouter API key: "))?.trim();
  if (!apiKey) return undefined;

  const save = (await io.ask("Save this API key to .env file for future use? (y/n): "))?.trim().toLowerCase();
  if (save === "y") {
    try {
      await saveApiKeyToEnvFile(envFilePath, apiKey);
      io.print("API key saved to .env file.");
    } catch (error) {
      io.print(`Error saving API key to .env file: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return apiKey;
}

export async function askFarmConditions(io: ConsoleIO, now: Date = new Date()): Promise<SensorReading> {
  io.print("\n===== FARM CONDITIONS SETUP =====");
  io.print("Would you like to enter your own farm conditions or use simulated values?");
  const choice = (await io.ask("Enter 'custom' or 'simulate' (default: simulate): "))?.trim().toLowerCase();
  if (choice !== "custom") return simulateReading(now);

  io.print("\nPlease enter your farm conditions:");
  const reading = readingFromManualInput(
    {
      temperature: (await io.ask("Temperature (°C, 10-50): ")) ?? "",
      humidity: (await io.ask("Humidity (%, 0-100): ")) ?? "",
      soil_moisture: (await io.ask("Soil Moisture (%, 0-100): ")) ?? "",
      light_level: (await io.ask("Light Level (Lux, 0-15000): ")) ?? "",
      rainfall_last_24h: (await io.ask("Rainfall last 24h (mm, 0-100): ")) ?? "",
    },
    now
  );
  if (reading) return reading;
  io.print("Invalid input detected. Using simulated values instead.");
  return simulateReading(now);
}

export async function askCropInformation(io: ConsoleIO): Promise<FarmerContext> {
  io.print("\n===== CROP INFORMATION =====");
  io.print("What are your main crops? (e.g., tomatoes, wheat, corn, potatoes)");
  const crops = (await io.ask("Enter your crops (comma separated): "))?.trim();

  io.print("\nWhat growth stage are they in?");
  for (const [code, label] of Object.entries(GROWTH_STAGES)) {
    io.print(`${code}) ${label}`);
  }
  const stage = (await io.ask("Enter the number or describe the stage: "))?.trim();

  io.print("\nAny specific pest or disease issues?");
  const issues = (await io.ask("Enter any issues (or 'none'): "))?.trim();

  return {
    crops: crops || "various crops",
    growthStage: stage || "unknown",
    issues: issues && issues.toLowerCase() !== "none" ? issues : undefined,
  };
}

export function formatConditions(sensor: SensorReading): string {
  return [
    "\n===== CURRENT FARM CONDITIONS =====",
    `Temperature: ${sensor.temperature}°C`,
    `Humidity: ${sensor.humidity}%`,
    `Soil Moisture: ${sensor.soil_moisture}%`,
    `Light Level: ${sensor.light_level} Lux`,
    `Rainfall (24h): ${sensor.rainfall_last_24h}mm`,
    `Timestamp: ${sensor.timestamp}`,
    "==================================",
  ].join("\n");
}

export function formatCropSummary(crop: FarmerContext): string {
  const stage = crop.growthStage ? describeGrowthStage(crop.growthStage) : "unknown";
  return `Crops: ${crop.crops ?? "various crops"} | Stage: ${stage}${crop.issues ? ` | Issues: ${crop.issues}` : ""}`;
}

export async function runConsole(options: ConsoleOptions): Promise<void> {
  const { io } = options;
  const counter = options.counter ?? new RequestCounter();
  const now = options.now ?? (() => new Date());

  io.print(RULE);
  io.print("Welcome to CropTalk - Your AI Farming Assistant");
  io.print(RULE);
  io.print("\nCropTalk gives farmers AI-powered advice on crops and field conditions.");

  const apiKey = options.config.apiKey ?? (await promptForApiKey(io, options.envFilePath ?? ".env"));
  if (!apiKey) {
    io.print(VARIANTS.console.messages.missing_credential);
    return;
  }

  const advisor = createAdvisor({
    variant: VARIANTS.console,
    config: { ...options.config, apiKey },
    counter,
    fetch: options.fetch,
    now,
  });

  let sensor = await askFarmConditions(io, now());
  let crop = await askCropInformation(io);
  io.print(formatConditions(sensor));

  io.print("\nAsk any farming or agriculture question, or type 'exit' to quit.");
  io.print("Type 'update conditions' to change farm conditions or 'update crops' to change crop information.");

  let history: ConversationTurn[] = [];
  const maxTurns = VARIANTS.console.historyTurns;

  for (;;) {
    const line = await io.ask("\nFarmer's Question: ");
    if (line === null) break;
    const input = line.trim();
    const command = input.toLowerCase();

    if (EXIT_COMMANDS.has(command)) break;
    if (command === "update conditions") {
      sensor = await askFarmConditions(io, now());
      io.print(formatConditions(sensor));
      continue;
    }
    if (command === "update crops") {
      crop = await askCropInformation(io);
      io.print(formatCropSummary(crop));
      continue;
    }
    if (!input) continue;

    const gate = checkRequestGate(counter);
    if (!gate.allowed) {
      io.print(`\n${gate.message}. Please try again tomorrow.`);
      continue;
    }

    io.print("\nConsulting agricultural knowledge... Please wait...");
    const result = await advisor.ask({ question: input, sensor, farmer: crop, history });
    history = truncateHistory(
      [...history, { role: "user", content: input }, { role: "assistant", content: result.response }],
      maxTurns
    );

    io.print("\nCropTalk Advice");
    io.print(result.response);
    io.print(`\n(API Request Count: ${counter.value}/${counter.ceiling} daily limit)`);
  }

  io.print("Thank you for using CropTalk. Goodbye!");
}
