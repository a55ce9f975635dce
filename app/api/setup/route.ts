import type { NextRequest } from "next/server";
import { handleSetup } from "@/lib/handlers/session";
import { getServerContext } from "@/lib/server-context";

export async function POST(req: NextRequest) {
  return handleSetup(req, getServerContext());
}
