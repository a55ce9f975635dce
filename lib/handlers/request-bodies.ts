import { z } from "zod";
import { sensorReadingSchema } from "../sensors";
import type { FarmerContext } from "../types";

export const cropInfoSchema = z.object({
  crops: z.string().optional(),
  stage: z.union([z.string(), z.number()]).transform(String).optional(),
  issues: z.string().nullish(),
  location: z.string().optional(),
  farm_size: z.union([z.string(), z.number()]).transform(String).optional(),
});

export type CropInfoBody = z.infer<typeof cropInfoSchema>;

// Malformed optional fields are dropped rather than failing the request.
export const askBodySchema = z.object({
  question: z.string().catch(""),
  sensor_data: sensorReadingSchema.optional().catch(undefined),
  crop_info: cropInfoSchema.optional().catch(undefined),
  user_id: z.string().optional().catch(undefined),
});

export type AskBody = z.infer<typeof askBodySchema>;

export const setupBodySchema = cropInfoSchema.extend({
  user_id: z.string().optional().catch(undefined),
});

export function toFarmerContext(info: CropInfoBody): FarmerContext {
  const issues = info.issues?.trim();
  return {
    crops: info.crops?.trim() || undefined,
    growthStage: info.stage?.trim() || undefined,
    issues: issues && issues.toLowerCase() !== "none" ? issues : undefined,
    location: info.location?.trim() || undefined,
    farmSize: info.farm_size?.trim() || undefined,
  };
}

/** Fields set in the session or request win over the stored profile, one by one. */
export function mergeFarmerContext(
  stored: FarmerContext | null,
  current: FarmerContext | null
): FarmerContext | null {
  if (!stored) return current;
  if (!current) return stored;
  return {
    crops: current.crops ?? stored.crops,
    growthStage: current.growthStage ?? stored.growthStage,
    issues: current.issues ?? stored.issues,
    location: current.location ?? stored.location,
    farmSize: current.farmSize ?? stored.farmSize,
  };
}

export function userIdOf(raw: string | undefined): string | null {
  const id = raw?.trim();
  return id && id !== "anonymous" ? id : null;
}
