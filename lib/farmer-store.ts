/**
 * Farmer profiles and interaction history, keyed by phone number (SMS) or
 * user id (API). Lookups and writes are best-effort: a failing database never
 * changes the advice a farmer receives.
 */

import { z } from "zod";
import type { QueryFn } from "./db";
import type { FarmerContext } from "./types";

export type StoreResult = { ok: true } | { ok: false; error: unknown };

export interface FarmerContextStore {
  get(identifier: string): Promise<FarmerContext | null>;
  saveProfile(identifier: string, context: FarmerContext): Promise<StoreResult>;
  appendInteraction(identifier: string, question: string, answer: string): Promise<StoreResult>;
}

const farmerRowSchema = z.object({
  location: z.string().nullable(),
  crops: z.string().nullable(),
  growth_stage: z.string().nullable(),
  issues: z.string().nullable(),
  farm_size: z.string().nullable(),
});

export class PgFarmerContextStore implements FarmerContextStore {
  constructor(private readonly query: QueryFn) {}

  async get(identifier: string): Promise<FarmerContext | null> {
    try {
      const result = await this.query(
        "SELECT location, crops, growth_stage, issues, farm_size FROM farmers WHERE phone_number = $1",
        [identifier]
      );
      if (result.rows.length === 0) return null;
      const row = farmerRowSchema.parse(result.rows[0]);
      return {
        location: row.location ?? undefined,
        crops: row.crops ?? undefined,
        growthStage: row.growth_stage ?? undefined,
        issues: row.issues ?? undefined,
        farmSize: row.farm_size ?? undefined,
      };
    } catch (error) {
      console.error("Farmer lookup error:", error);
      return null;
    }
  }

  async saveProfile(identifier: string, context: FarmerContext): Promise<StoreResult> {
    try {
      await this.query(
        `INSERT INTO farmers (phone_number, location, crops, growth_stage, issues, farm_size)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (phone_number) DO UPDATE SET
           location = COALESCE(EXCLUDED.location, farmers.location),
           crops = COALESCE(EXCLUDED.crops, farmers.crops),
           growth_stage = COALESCE(EXCLUDED.growth_stage, farmers.growth_stage),
           issues = EXCLUDED.issues,
           farm_size = COALESCE(EXCLUDED.farm_size, farmers.farm_size),
           updated_at = now()`,
        [
          identifier,
          context.location ?? null,
          context.crops ?? null,
          context.growthStage ?? null,
          context.issues ?? null,
          context.farmSize ?? null,
        ]
      );
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    }
  }

  async appendInteraction(identifier: string, question: string, answer: string): Promise<StoreResult> {
    try {
      await this.query(
        "INSERT INTO farmer_interactions (phone_number, message, response) VALUES ($1, $2, $3)",
        [identifier, question, answer]
      );
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    }
  }
}

/** Used when DATABASE_URL is not set. */
export class NoopFarmerContextStore implements FarmerContextStore {
  async get(): Promise<FarmerContext | null> {
    return null;
  }

  async saveProfile(): Promise<StoreResult> {
    return { ok: true };
  }

  async appendInteraction(): Promise<StoreResult> {
    return { ok: true };
  }
}

/** Writes the interaction and logs a failure; the caller's answer is unaffected. */
export async function recordInteraction(
  store: FarmerContextStore,
  identifier: string,
  question: string,
  answer: string
): Promise<StoreResult> {
  const result = await store.appendInteraction(identifier, question, answer);
  if (!result.ok) console.error("Record interaction error:", result.error);
  return result;
}
