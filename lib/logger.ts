// lib/logger.ts
// One JSON object per line.

type Extra = Record<string, unknown>;

const ts = () => new Date().toISOString();
const j = (o: unknown) => JSON.stringify(o);

export function serializeError(e: unknown) {
  if (!e) return null;
  if (e instanceof Error) {
    const status = "status" in e ? e.status : undefined;
    return { name: e.name, message: e.message, status, stack: e.stack };
  }
  return e;
}

export function logInfo(msg: string, extra: Extra = {}) {
  console.info(j({ ts: ts(), level: "INFO", msg, ...extra }));
}

export function logWarn(msg: string, extra: Extra = {}) {
  console.warn(j({ ts: ts(), level: "WARN", msg, ...extra }));
}

export function logError(msg: string, error?: unknown, extra: Extra = {}) {
  console.error(j({ ts: ts(), level: "ERROR", msg, error: serializeError(error), ...extra }));
}
