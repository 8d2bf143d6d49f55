import { getRequestActorName, getRequestId } from "./request-context";

type LogLevel = "INFO" | "WARN" | "ERROR";

export function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    actor: getRequestActorName() ?? null,
    ...meta,
  };

  // JSON-only output (log aggregation safe)
  console.log(JSON.stringify(entry));
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
