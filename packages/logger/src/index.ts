export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly analysisId?: string;
} & Record<string, unknown>;

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written; defaults to "info" */
  readonly level?: LogLevel;
  readonly write?: LogWriter;
}

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
};

export const writeSplit: LogWriter = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

export const writeStderr: LogWriter = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { analysisId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof analysisId === "string" ? { analysisId } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = options.level ?? "info";
  const write = options.write ?? writeSplit;

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, meta);
    write(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
};
