export type LogValue = unknown;
export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveThreshold(): LogLevel {
  const configured = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return "info";
}

function isSilenced(level: LogLevel): boolean {
  if (process.env.LOG_SILENT === "true") {
    return true;
  }
  return levelRank[level] < levelRank[resolveThreshold()];
}

function emit(level: LogLevel, event: string, fields: Record<string, LogValue>): void {
  if (isSilenced(level)) {
    return;
  }

  const payload = {
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  };

  const serialized = JSON.stringify(payload);

  if (level === "error" || level === "warn") {
    console.error(serialized);
    return;
  }

  console.log(serialized);
}

export function logDebug(event: string, fields: Record<string, LogValue> = {}): void {
  emit("debug", event, fields);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
