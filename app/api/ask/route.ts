import type { NextRequest } from "next/server";
import { handleAsk } from "@/lib/handlers/ask";
import { getServerContext } from "@/lib/server-context";

export async function POST(req: NextRequest) {
  return handleAsk(req, getServerContext());
}
