// lib/http.ts
import { NextResponse, type NextRequest } from "next/server";
import { SESSION_COOKIE, SESSION_MAX_AGE_SECONDS } from "./config";
import { SessionError, isAppError } from "./errors";
import { logError } from "./logger";
import { getProviderClient } from "./openai-client";
import { sessionStore, type StudySession } from "./session";
import { evictIdleSessions } from "./study-buddy";

export function sessionIdFrom(req: NextRequest): string {
  const id = req.cookies.get(SESSION_COOKIE)?.value;
  if (!id) throw new SessionError();
  return id;
}

const SESSION_MAX_IDLE_MS = SESSION_MAX_AGE_SECONDS * 1000;

/** Tears down sessions whose cookie has expired. Runs in the background of a request. */
export function sweepIdleSessions(now = Date.now()): void {
  evictIdleSessions(sessionStore, getProviderClient, SESSION_MAX_IDLE_MS, now).catch(error =>
    logError("idle session cleanup failed", error),
  );
}

/** The caller's session, created on the first request that carries the cookie. */
export function openSession(req: NextRequest): StudySession {
  const id = sessionIdFrom(req);
  sweepIdleSessions();
  return sessionStore.open(id, {
    uploadFile: file => getProviderClient().uploadFile(file),
  });
}

export function errorResponse(error: unknown, route: string, fallback = "Something went wrong") {
  if (isAppError(error)) {
    if (error.status >= 500) logError(`[${route}] failed`, error);
    return NextResponse.json({ error: error.message }, { status: error.status });
  }
  logError(`[${route}] failed`, error);
  return NextResponse.json({ error: fallback }, { status: 500 });
}
