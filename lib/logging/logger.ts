// lib/logging/logger.ts
// One JSON object per line on stdout/stderr, picked up by the platform's log
// collector. Never pass secrets or raw API keys in `data`.

export type LogLevel = "info" | "warn" | "error";
export type LogData = Record<string, unknown>;
export type LogSink = (level: LogLevel, line: string) => void;

export type Logger = {
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(bindings: LogData): Logger;
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(bindings: LogData = {}, sink: LogSink = consoleSink): Logger {
  const write = (level: LogLevel, event: string, data: LogData = {}) => {
    const record: LogData = { level, event, time: new Date().toISOString(), ...bindings };
    for (const [k, v] of Object.entries(data)) record[k] = serialize(v);
    let line: string;
    try {
      line = JSON.stringify(record);
    } catch {
      line = JSON.stringify({ level, event, note: "unserializable log data" });
    }
    sink(level, line);
  };

  return {
    info: (event, data) => write("info", event, data),
    warn: (event, data) => write("warn", event, data),
    error: (event, data) => write("error", event, data),
    child: (extra) => createLogger({ ...bindings, ...extra }, sink),
  };
}

export const logger = createLogger({ service: "shakespeare-rag" });
