import { NextResponse, type NextRequest } from "next/server";
import type { ServerContext } from "../server-context";
import { resolveSession, SESSION_COOKIE } from "../session";
import { setupBodySchema, toFarmerContext, userIdOf, type CropInfoBody } from "./request-bodies";

export function withSessionCookie(res: NextResponse, sessionId: string): NextResponse {
  res.cookies.set(SESSION_COOKIE, sessionId, { httpOnly: true, sameSite: "lax", path: "/" });
  return res;
}

/** POST /api/setup { crops, stage, issues, user_id? }: stores crop info and starts a new conversation. */
export async function handleSetup(req: NextRequest, ctx: ServerContext): Promise<NextResponse> {
  try {
    const parsed = setupBodySchema.safeParse(await req.json().catch(() => null));
    const body: CropInfoBody = parsed.success ? parsed.data : {};
    const cropInfo = toFarmerContext(body);

    const session = resolveSession(ctx.sessions, req.cookies.get(SESSION_COOKIE)?.value);
    ctx.sessions.save(session.id, { cropInfo, history: [] });

    const userId = userIdOf(parsed.success ? parsed.data.user_id : undefined);
    if (userId) {
      const saved = await ctx.farmers.saveProfile(userId, cropInfo);
      if (!saved.ok) console.error("Save profile error:", saved.error);
    }

    const res = NextResponse.json({ success: true, message: "Crop information stored" });
    return session.created ? withSessionCookie(res, session.id) : res;
  } catch (error) {
    console.error("Setup error:", error);
    return NextResponse.json({ success: false, message: "Could not store crop information" }, { status: 500 });
  }
}

/** POST /api/reset: forgets crop info and history for this browser. */
export function handleReset(req: NextRequest, ctx: ServerContext): NextResponse {
  const id = req.cookies.get(SESSION_COOKIE)?.value;
  if (id) ctx.sessions.clear(id);
  const res = NextResponse.json({ success: true, message: "Session reset" });
  res.cookies.delete(SESSION_COOKIE);
  return res;
}
