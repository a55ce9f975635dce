import { NextResponse, type NextRequest } from "next/server";
import type { ServerContext } from "../server-context";
import { userIdOf } from "./request-bodies";

/** GET /api/sensor-data?user_id= returns a fresh reading. */
export async function handleSensorData(req: NextRequest, ctx: ServerContext): Promise<NextResponse> {
  try {
    const userId = userIdOf(req.nextUrl.searchParams.get("user_id") ?? undefined);
    return NextResponse.json(await ctx.sensors.getReading(userId ?? undefined));
  } catch (error) {
    console.error("Sensor data error:", error);
    return NextResponse.json({ success: false, message: "Could not read sensor data" }, { status: 500 });
  }
}
