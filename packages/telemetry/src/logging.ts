export type IamSpecLogLevel = "debug" | "info" | "warn" | "error";

/** Ordered from least to most severe. */
export const LOG_LEVELS: ReadonlyArray<IamSpecLogLevel> = ["debug", "info", "warn", "error"];

export type LogFields = Readonly<Record<string, unknown>>;

/** Receives each rendered JSON line; the level lets a sink pick its stream. */
export type LogSink = (level: IamSpecLogLevel, line: string) => void;

export interface IamSpecLoggerOptions {
  readonly name?: string;
  readonly level?: IamSpecLogLevel;
  readonly fields?: LogFields;
  readonly sink?: LogSink;
  readonly clock?: () => Date;
}

export interface IamSpecLogger {
  log(level: IamSpecLogLevel, message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): IamSpecLogger;
}

export const isLogLevel = (value: string): value is IamSpecLogLevel => LOG_LEVELS.some((level) => level === value);

const severity = (level: IamSpecLogLevel): number => LOG_LEVELS.indexOf(level);

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// JSON.stringify renders an Error as `{}`.
const toLoggable = (value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

const loggableFields = (fields: LogFields): LogFields =>
  Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, toLoggable(value)]));

/**
 * JSON-line logger. Every entry carries `timestamp`, `level`, `message` and `service`,
 * then the bound fields of the logger and its ancestors, then the call's own fields.
 */
export const createIamSpecLogger = (options: IamSpecLoggerOptions = {}): IamSpecLogger => {
  const threshold = severity(options.level ?? "info");
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? (() => new Date());

  const bind = (bound: LogFields): IamSpecLogger => {
    const log = (level: IamSpecLogLevel, message: string, fields: LogFields = {}): void => {
      if (severity(level) < threshold) {
        return;
      }
      const entry = { timestamp: clock().toISOString(), level, message, ...bound, ...loggableFields(fields) };
      sink(level, JSON.stringify(entry));
    };

    return {
      log,
      debug: (message, fields) => log("debug", message, fields),
      info: (message, fields) => log("info", message, fields),
      warn: (message, fields) => log("warn", message, fields),
      error: (message, fields) => log("error", message, fields),
      child: (fields) => bind({ ...bound, ...loggableFields(fields) }),
    };
  };

  return bind({ service: options.name ?? "iamspec", ...options.fields });
};

const discard = (): void => undefined;

/** The default for callers that pass no logger. */
export const silentLogger: IamSpecLogger = {
  log: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  child: () => silentLogger,
};
