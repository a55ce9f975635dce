/**
 * Farm sensor context. There is no IoT ingestion yet: readings are simulated
 * per request, entered by hand in the CLI, or supplied by the caller.
 */

import { format } from "date-fns";
import { z } from "zod";
import type { SensorReading } from "./types";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

export interface SensorProvider {
  getReading(identifier?: string): Promise<SensorReading>;
}

/** Caller-supplied readings are shape-checked only; out-of-range values pass through. */
export const sensorReadingSchema = z.object({
  temperature: z.number(),
  humidity: z.number(),
  soil_moisture: z.number(),
  light_level: z.number(),
  rainfall_last_24h: z.number(),
  timestamp: z.string(),
});

function uniform(min: number, max: number, random: () => number): number {
  return min + (max - min) * random();
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function formatTimestamp(d: Date): string {
  return format(d, TIMESTAMP_FORMAT);
}

export function simulateReading(now: Date = new Date(), random: () => number = Math.random): SensorReading {
  return {
    temperature: round1(uniform(20, 40, random)),
    humidity: round1(uniform(30, 90, random)),
    soil_moisture: round1(uniform(10, 60, random)),
    light_level: Math.round(uniform(2000, 10000, random)),
    rainfall_last_24h: round1(uniform(0, 30, random)),
    timestamp: formatTimestamp(now),
  };
}

// The identifier is accepted for the day real sensor lookups replace simulation.
export class SimulatedSensorProvider implements SensorProvider {
  async getReading(_identifier?: string): Promise<SensorReading> {
    return simulateReading();
  }
}

export type ManualSensorInput = {
  temperature: string;
  humidity: string;
  soil_moisture: string;
  light_level: string;
  rainfall_last_24h: string;
};

/**
 * Parse values typed at the console. Each value is clamped to the range the
 * prompt advertises. Returns null if any value is not a number.
 */
export function readingFromManualInput(input: ManualSensorInput, now: Date = new Date()): SensorReading | null {
  const values = [
    input.temperature,
    input.humidity,
    input.soil_moisture,
    input.light_level,
    input.rainfall_last_24h,
  ].map((raw) => (raw.trim() === "" ? NaN : Number(raw)));
  if (values.some((n) => !Number.isFinite(n))) return null;
  const [temperature, humidity, soil, light, rainfall] = values;
  return {
    temperature: round1(clamp(temperature, 10, 50)),
    humidity: round1(clamp(humidity, 0, 100)),
    soil_moisture: round1(clamp(soil, 0, 100)),
    light_level: Math.round(clamp(light, 0, 15000)),
    rainfall_last_24h: round1(clamp(rainfall, 0, 100)),
    timestamp: formatTimestamp(now),
  };
}
