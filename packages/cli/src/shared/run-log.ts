// shared/run-log.ts — Run-scoped, timestamped log file (one per deployment run)

import { appendFileSync, mkdirSync, readFileSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "info" | "warn" | "error" | "step";

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
  step: "STEP",
};

const LINE_RE = /^\[(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\] (INFO|WARN|ERROR|STEP): (.*)$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function formatLogEntry(entry: LogEntry): string {
  // Multi-line messages (raw API bodies) are folded so each entry stays on one line.
  const message = entry.message.replace(/\r?\n/g, "\\n");
  return `[${formatTimestamp(entry.timestamp)}] ${LEVEL_LABELS[entry.level]}: ${message}`;
}

export function parseLogLine(line: string): LogEntry | null {
  const m = LINE_RE.exec(line);
  if (!m) {
    return null;
  }
  const level = Object.entries(LEVEL_LABELS).find(([, label]) => label === m[7]);
  if (!level) {
    return null;
  }
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return {
    timestamp: new Date(y, mo - 1, d, h, mi, s),
    level: toLevel(level[0]),
    message: m[8],
  };
}

function toLevel(name: string): LogLevel {
  switch (name) {
    case "warn":
    case "error":
    case "step":
      return name;
    default:
      return "info";
  }
}

/** File name for a run started at `d`: `deploy-YYYYMMDD-HHMMSS.log`. */
export function runLogFileName(d: Date): string {
  return (
    `deploy-${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}-` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}.log`
  );
}

export class RunLog {
  private constructor(readonly path: string) {}

  static create(dir: string, startedAt = new Date()): RunLog {
    mkdirSync(dir, {
      recursive: true,
    });
    const log = new RunLog(join(dir, runLogFileName(startedAt)));
    log.append("info", "Run started", startedAt);
    return log;
  }

  append(level: LogLevel, message: string, at = new Date()): LogEntry {
    const entry: LogEntry = {
      timestamp: at,
      level,
      message,
    };
    appendFileSync(this.path, `${formatLogEntry(entry)}\n`, {
      mode: 0o600,
    });
    return entry;
  }

  entries(): LogEntry[] {
    return readFileSync(this.path, "utf-8")
      .split("\n")
      .map(parseLogLine)
      .filter((e): e is LogEntry => e !== null);
  }
}
