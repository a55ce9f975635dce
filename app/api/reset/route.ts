import type { NextRequest } from "next/server";
import { handleReset } from "@/lib/handlers/session";
import { getServerContext } from "@/lib/server-context";

export async function POST(req: NextRequest) {
  return handleReset(req, getServerContext());
}
