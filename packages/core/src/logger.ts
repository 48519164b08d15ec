/**
 * Structured Logging
 * Leveled logger with context propagation and pluggable handlers
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export interface LogContext {
  component?: string;
  questionId?: string;
  subQuestionId?: string;
  depth?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

let currentLevel: LogLevel = "info";
let currentFormat: LogFormat = "pretty";

const handlers: LogHandler[] = [];

function writeLine(entry: LogEntry, line: string): void {
  if (entry.level === "error" || entry.level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

const prettyHandler: LogHandler = (entry) => {
  const prefix = `${COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET}`;
  const component = entry.context?.component ? ` (${entry.context.component})` : "";
  const rest = entry.context ? omitComponent(entry.context) : undefined;
  const contextStr = rest && Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";

  writeLine(entry, `${prefix}${component} ${entry.message}${contextStr}`);

  if (entry.error) {
    const code = entry.error.code ? ` [${entry.error.code}]` : "";
    console.error(`  ${entry.error.name}${code}: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
};

const jsonHandler: LogHandler = (entry) => {
  writeLine(entry, JSON.stringify(entry));
};

function consoleHandler(): LogHandler {
  return (entry) => (currentFormat === "json" ? jsonHandler(entry) : prettyHandler(entry));
}

handlers.push(consoleHandler());

function omitComponent(context: LogContext): LogContext {
  const { component: _component, ...rest } = context;
  return rest;
}

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    entry.error = {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  setFormat(format: LogFormat): void {
    currentFormat = format;
  },

  getFormat(): LogFormat {
    return currentFormat;
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  /**
   * Replace every handler (the console one included)
   */
  setHandlers(next: LogHandler[]): void {
    handlers.length = 0;
    handlers.push(...next);
  },

  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(consoleHandler());
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined;
    emit(createEntry("error", message, context, err));
  },

  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(baseContext);
  },

  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};

class ChildLogger {
  constructor(private readonly baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}

export type { ChildLogger };
