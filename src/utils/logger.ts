type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

let debugEnabled = false;

// stdout carries the hook decision JSON; every log line goes to stderr.
export function setDebugEnabled(value: boolean): void {
  debugEnabled = value;
}

function emit(level: "debug" | "warn" | "error", message: string, context?: LogContext): void {
  const prefix = level === "debug" ? "[antipattern-guard:debug]" : `[antipattern-guard:${level}]`;
  const suffix = context && Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : "";
  process.stderr.write(`${prefix} ${message}${suffix}\n`);
}

function safeStringify(context: LogContext): string {
  try {
    return JSON.stringify(context, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    );
  } catch {
    return "[unserializable context]";
  }
}

export const logDebug: LoggerFn = (message, context) => {
  if (!debugEnabled) {
    return;
  }
  emit("debug", message, context);
};

export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
