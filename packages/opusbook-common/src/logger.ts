type LogMethod = (message: string, ...args: unknown[]) => void;

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function parseBooleanEnv(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (parseBooleanEnv(env.OPUSBOOK_DEBUG)) {
    return "debug";
  }

  const configured = env.OPUSBOOK_LOG_LEVEL?.trim().toLowerCase();
  if (configured) {
    if (configured === "trace" || configured === "verbose") {
      return "debug";
    }
    if (isLogLevel(configured)) {
      return configured;
    }
  }

  // A converter run from a terminal only reports problems unless asked.
  return "warn";
}

let threshold: LogLevel = resolveLogLevel();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] <= LEVEL_WEIGHT[threshold];
}

export interface OpusbookLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export function createLogger(namespace: string): OpusbookLogger {
  const prefix = `[${namespace}]`;

  // Console methods are looked up per call so that test spies see them.
  const wrap = (method: LogLevel): LogMethod => {
    return (message: string, ...args: unknown[]) => {
      if (!shouldLog(method)) {
        return;
      }
      console[method](`${prefix} ${message}`, ...args);
    };
  };

  return {
    debug: wrap("debug"),
    info: wrap("info"),
    warn: wrap("warn"),
    error: wrap("error"),
  };
}
