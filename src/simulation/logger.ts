export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.MYCELIUM_LOG_LEVEL;
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "warn";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

/**
 * Scoped console logger. Messages are prefixed with `[scope]`; the context
 * object, when given, is passed through as a second console argument.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const emit = (
    level: Exclude<LogLevel, "silent">,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: LogContext,
  ): void => {
    if (!enabled(level)) return;
    if (context === undefined) {
      sink(`${prefix} ${message}`);
    } else {
      sink(`${prefix} ${message}`, context);
    }
  };

  return {
    debug: (message, context) => emit("debug", console.debug, message, context),
    info: (message, context) => emit("info", console.info, message, context),
    warn: (message, context) => emit("warn", console.warn, message, context),
    error: (message, context) => emit("error", console.error, message, context),
  };
}
