import type { LogFields, Logger, LogLevel } from "~/app/types.ts";

export interface LogRecord {
  level: LogLevel;
  msg: string;
  data?: LogFields;
}

/**
 * Logger that keeps entries in memory.
 */
export function recordingLogger(records: LogRecord[] = []): Logger & {
  records: LogRecord[];
} {
  const log = (level: LogLevel) => (msg: string, data?: LogFields) => {
    records.push({ level, msg, data });
  };
  return {
    records,
    trace: log("trace"),
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    fatal: log("fatal"),
    child: () => recordingLogger(records),
  };
}

export function memoryStream(): { chunks: string[]; write(chunk: string): void } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
    },
  };
}
