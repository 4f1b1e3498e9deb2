export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogLine {
  at: string;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type LogListener = (line: LogLine) => void;

/**
 * Bounded in-memory log for one scope. Oldest lines are dropped once
 * `capacity` is reached.
 */
export class LogBuffer {
  private lines: LogLine[] = [];
  private listeners = new Set<LogListener>();

  constructor(private readonly capacity = 500) {}

  push(line: LogLine): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
    for (const listener of this.listeners) {
      listener(line);
    }
  }

  snapshot(): LogLine[] {
    return [...this.lines];
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  buffer?: LogBuffer;
  console?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const toConsole = options.console ?? true;

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line: LogLine = {
      at: new Date().toISOString(),
      level,
      scope,
      message,
    };
    options.buffer?.push(line);
    if (!toConsole) {
      return;
    }
    const text = `[${scope}] ${message}`;
    if (level === "error") {
      console.error(text);
    } else if (level === "warn") {
      console.warn(text);
    } else {
      console.log(text);
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export const silentLogger: Logger = createLogger("silent", { console: false });
