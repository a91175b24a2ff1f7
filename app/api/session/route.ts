import { NextRequest, NextResponse } from "next/server";
import { errorResponse, openSession, sessionIdFrom } from "@/lib/http";
import { getProviderClient } from "@/lib/openai-client";
import { sessionStore } from "@/lib/session";
import { endSession } from "@/lib/study-buddy";

export const runtime = "nodejs";

export async function GET(req: NextRequest) {
  try {
    const session = openSession(req);
    return NextResponse.json(session.snapshot());
  } catch (error) {
    return errorResponse(error, "session.GET");
  }
}

export async function DELETE(req: NextRequest) {
  try {
    const session = sessionStore.get(sessionIdFrom(req));
    if (!session) return NextResponse.json({ ok: true });

    await endSession(sessionStore, session, getProviderClient());
    return NextResponse.json({ ok: true });
  } catch (error) {
    return errorResponse(error, "session.DELETE", "Failed to end session");
  }
}
