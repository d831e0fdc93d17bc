export type LogLevel = "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

export type Logger = {
  info(event: string, meta?: LogMeta): void;
  warn(event: string, meta?: LogMeta): void;
  error(event: string, meta?: LogMeta): void;
};

export type LoggerOptions = {
  level?: LogLevel;
  sink?: (level: LogLevel, line: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

const SENSITIVE_KEY =
  /secret|private|signature|key|token|authorization|bearer|pre-?authorized[_-]?code|issuer[_-]?state|tx[_-]?code|pin|api[_-]?key|client[_-]?secret/i;
const JWT_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]*/g;

export const redactString = (value: string) => {
  const replaced = value.replace(JWT_PATTERN, "[redacted]");
  if (replaced.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return replaced;
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

const consoleSink = (level: LogLevel, line: string) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

export const createLogger = (service: string, options: LoggerOptions = {}): Logger => {
  const minRank = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, event: string, meta?: LogMeta) => {
    if (LEVEL_RANK[level] < minRank) {
      return;
    }
    const safeMeta = meta ? redact(meta) : undefined;
    const payload = {
      level,
      service,
      event,
      ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
    };
    sink(level, JSON.stringify(payload));
  };

  return {
    info: (event, meta) => write("info", event, meta),
    warn: (event, meta) => write("warn", event, meta),
    error: (event, meta) => write("error", event, meta)
  };
};
