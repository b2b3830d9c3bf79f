export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level: LogLevel;
  includeTimings: boolean;
  format: "json" | "pretty";
  color: boolean;
  timeZone?: string;
};

type LogData = Record<string, unknown>;

type LogEntry = {
  level: LogLevel;
  msg: string;
  ts: string;
  data?: LogData;
};

export type Logger = {
  debug: (msg: string, data?: LogData) => void;
  info: (msg: string, data?: LogData) => void;
  warn: (msg: string, data?: LogData) => void;
  error: (msg: string, data?: LogData) => void;
  withContext: (context: LogData) => Logger;
};

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const defaults: LoggerConfig = {
  level: "info",
  includeTimings: false,
  format: "json",
  color: false,
  timeZone: undefined
};

let config: LoggerConfig = { ...defaults };

export function setLoggerConfig(next: Partial<LoggerConfig>) {
  config = { ...config, ...next };
}

export function getLoggerConfig(): LoggerConfig {
  return config;
}

export function resetLoggerConfig() {
  config = { ...defaults };
}

function log(level: LogLevel, msg: string, data?: LogData) {
  if (levelWeight[level] < levelWeight[config.level]) {
    return;
  }
  const entry: LogEntry = {
    level,
    msg,
    ts: formatTimestamp(new Date(), config.timeZone),
    data
  };

  // stdout carries command output; every log line goes to stderr
  console.error(formatLine(entry));
}

function createLogger(context?: LogData): Logger {
  return {
    debug: (msg, data) => log("debug", msg, mergeContext(context, data)),
    info: (msg, data) => log("info", msg, mergeContext(context, data)),
    warn: (msg, data) => log("warn", msg, mergeContext(context, data)),
    error: (msg, data) => log("error", msg, mergeContext(context, data)),
    withContext: (extra) => createLogger(mergeContext(context, extra))
  };
}

export const logger = createLogger();

function mergeContext(base?: LogData, extra?: LogData) {
  if (!base && !extra) return undefined;
  if (!base) return extra;
  if (!extra) return base;
  return { ...base, ...extra };
}

function formatLine(entry: LogEntry) {
  if (config.format === "pretty") {
    return formatPretty(entry);
  }
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry) {
  const level = config.color ? colorLevel(entry.level) : entry.level;
  const msg = config.color ? paint(entry.msg, colors.blue) : entry.msg;
  const header = `[${entry.ts}] ${level} ${msg}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return header;
  }
  return `${header}\n${JSON.stringify(entry.data, null, 2)}`;
}

const colors = {
  reset: "\u001b[0m",
  red: "\u001b[31m",
  yellow: "\u001b[33m",
  green: "\u001b[32m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m"
};

const levelColors: Record<LogLevel, string> = {
  debug: colors.magenta,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red
};

function colorLevel(level: LogLevel) {
  return paint(level, levelColors[level]);
}

function paint(text: string, color: string) {
  return `${color}${text}${colors.reset}`;
}

export function formatTimestamp(date: Date, timeZone?: string) {
  if (!timeZone) {
    return date.toISOString();
  }
  const parts = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false
  }).formatToParts(date);
  const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  const ms = String(date.getMilliseconds()).padStart(3, "0");
  return `${map.year}-${map.month}-${map.day}T${map.hour}:${map.minute}:${map.second}.${ms} ${timeZone}`;
}
