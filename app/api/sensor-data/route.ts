import type { NextRequest } from "next/server";
import { handleSensorData } from "@/lib/handlers/sensor-data";
import { getServerContext } from "@/lib/server-context";

export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  return handleSensorData(req, getServerContext());
}
