import type {
  LogFields,
  Logger,
  LoggerConfig,
  LogLevel,
  LogStream,
} from "~/app/types.ts";

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const levelColors: Record<LogLevel, string> = {
  trace: colors.gray,
  debug: colors.blue,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
  silent: "",
};

export const LOG_LEVEL_NAMES: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

function serializeError(error: Error): Record<string, unknown> {
  return { name: error.name, message: error.message, stack: error.stack };
}

function serializeValue(value: unknown): unknown {
  return value instanceof Error ? serializeError(value) : value;
}

function formatPretty(
  entry: LogEntry,
  name: string | undefined,
  showTimestamp: boolean,
): string {
  const { level, time, msg, ...rest } = entry;
  const color = levelColors[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let line = "";

  if (showTimestamp) {
    line += `${colors.gray}${formatTime(time)}${colors.reset} `;
  }

  if (name) {
    line += `${colors.cyan}${colors.bold}[${name}]${colors.reset} `;
  }

  line += `${color}${levelStr}${colors.reset} ${msg}`;

  const stacks: string[] = [];
  const keys = Object.keys(rest);
  if (keys.length > 0) {
    const extra = keys
      .map((k) => {
        const v = rest[k];
        if (v instanceof Error) {
          if (v.stack) stacks.push(v.stack);
          return `${colors.dim}${k}=${colors.reset}${v.name}: ${v.message}`;
        }
        const val = typeof v === "string" ? v : JSON.stringify(v);
        return `${colors.dim}${k}=${colors.reset}${val}`;
      })
      .join(" ");
    line += ` ${extra}`;
  }

  for (const stack of stacks) {
    line += `\n${colors.dim}${stack}${colors.reset}`;
  }

  return line + "\n";
}

function formatJson(entry: LogEntry, name: string | undefined): string {
  const obj: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    obj[key] = serializeValue(value);
  }
  if (name) obj.name = name;
  return JSON.stringify(obj) + "\n";
}

interface LoggerState {
  level: LogLevel;
  name?: string;
  timestamp: boolean;
  json: boolean;
  stream?: LogStream;
  bindings: LogFields;
}

function buildLogger(state: LoggerState): Logger {
  const { level: currentLevel, name, timestamp, json, stream, bindings } =
    state;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
  };

  const log = (level: LogLevel, msg: string, data?: LogFields): void => {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      time: Date.now(),
      msg,
      ...bindings,
      ...data,
    };

    const output = json
      ? formatJson(entry, name)
      : formatPretty(entry, name, timestamp);

    const target = stream ??
      (level === "error" || level === "fatal" ? process.stderr : process.stdout);

    target.write(output);
  };

  return {
    trace(msg, data) {
      log("trace", msg, data);
    },
    debug(msg, data) {
      log("debug", msg, data);
    },
    info(msg, data) {
      log("info", msg, data);
    },
    warn(msg, data) {
      log("warn", msg, data);
    },
    error(msg, data) {
      log("error", msg, data);
    },
    fatal(msg, data) {
      log("fatal", msg, data);
    },
    child(childBindings: LogFields): Logger {
      const { name: childName, ...rest } = childBindings;
      const fullName = childName
        ? name ? `${name}:${String(childName)}` : String(childName)
        : name;

      return buildLogger({
        ...state,
        name: fullName,
        bindings: { ...bindings, ...rest },
      });
    },
  };
}

/**
 * Create a leveled logger writing pretty or JSON lines.
 *
 * Error and fatal entries go to stderr, everything else to stdout, unless
 * a `stream` is configured.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: "faultline", level: "debug" });
 * log.info("Route registered", { method: "GET", path: "/users" });
 * log.child({ name: "errors" }).warn("Late registration");
 * ```
 */
export function createLogger(options: LoggerConfig = {}): Logger {
  return buildLogger({
    level: options.level ?? "info",
    name: options.name,
    timestamp: options.timestamp ?? true,
    json: options.json ?? false,
    stream: options.stream,
    bindings: {},
  });
}
