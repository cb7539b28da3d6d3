const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

/** Ids that tie a log line to one request, conversation or ruling. */
export interface CorrelationContext {
  requestId?: string | null;
  conversationId?: string | null;
  documentId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

type LogFunction = (event: string, context: CorrelationContext, fields?: LogFields) => void;

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

const levelRank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const parseConfiguredLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
};

const isFlagEnabled = (value: string | undefined): boolean =>
  ["1", "true", "yes", "on"].includes(value?.trim().toLowerCase() ?? "");

// Resolved per call; LOG_LEVEL may change while the process runs.
const resolveConfiguredLogLevel = (): LogLevel => {
  const explicit = process.env.LOG_LEVEL?.trim();
  if (explicit) {
    return parseConfiguredLogLevel(explicit);
  }

  switch (process.env.BACKEND_REQUEST_TRACE_MODE?.trim().toLowerCase()) {
    case "trace":
      return "trace";
    case "debug":
      return "debug";
    default:
      return isFlagEnabled(process.env.BACKEND_REQUEST_TRACE) ? "debug" : "info";
  }
};

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  levelRank(level) >= levelRank(resolveConfiguredLogLevel());

const writeLine = (level: LogLevel, line: string): void => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
};

const loggerFor =
  (level: LogLevel): LogFunction =>
  (event, context, fields = {}) => {
    if (!isLogLevelEnabled(level)) {
      return;
    }
    writeLine(
      level,
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        request_id: context.requestId ?? null,
        conversation_id: context.conversationId ?? null,
        document_id: context.documentId ?? null,
        ...fields
      })
    );
  };

export const logTrace = loggerFor("trace");
export const logDebug = loggerFor("debug");
export const logInfo = loggerFor("info");
export const logWarn = loggerFor("warn");
export const logError = loggerFor("error");

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  const cause = error.cause;
  if (cause instanceof Error) {
    details.error_cause = { name: cause.name, message: cause.message };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};
