export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface LogRecord extends LogFields {
  time: string;
  level: LogLevel;
  event: string;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogFields;
  sink?: LogSink;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function serialiseValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }
  return value;
}

function consoleSink(record: LogRecord): void {
  const line = JSON.stringify(record);
  if (record.level === "error") {
    console.error(line);
  } else if (record.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_WEIGHT[options.level ?? "info"];
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    if (LEVEL_WEIGHT[level] < threshold) {
      return;
    }

    const serialised: LogFields = {};
    for (const [key, value] of Object.entries(fields)) {
      serialised[key] = serialiseValue(value);
    }

    sink({
      ...bindings,
      ...serialised,
      time: new Date().toISOString(),
      level,
      event
    });
  };

  return {
    debug: (event, fields) => write("debug", event, fields),
    info: (event, fields) => write("info", event, fields),
    warn: (event, fields) => write("warn", event, fields),
    error: (event, fields) => write("error", event, fields),
    child: (extra) =>
      createLogger({
        level: options.level,
        bindings: { ...bindings, ...extra },
        sink
      })
  };
}

export const silentLogger: Logger = createLogger({ sink: () => undefined });
