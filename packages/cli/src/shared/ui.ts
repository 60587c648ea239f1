// shared/ui.ts — Logging, prompts, browser opening and input validators

import * as p from "@clack/prompts";
import pc from "picocolors";
import { spawnSync } from "node:child_process";
import { isString } from "@llm-quickstart/shared";
import type { LogLevel, RunLog } from "./run-log";

// ─── Logging ────────────────────────────────────────────────────────────────

let runLog: RunLog | null = null;

/** Mirror every log line into `log` until detached. */
export function attachRunLog(log: RunLog): void {
  runLog = log;
}

export function detachRunLog(): void {
  runLog = null;
}

export function activeRunLogPath(): string | null {
  return runLog?.path ?? null;
}

function emit(level: LogLevel, msg: string, paint: (s: string) => string): void {
  process.stderr.write(`${paint(msg)}\n`);
  runLog?.append(level, msg);
}

export function logInfo(msg: string): void {
  emit("info", msg, pc.green);
}

export function logWarn(msg: string): void {
  emit("warn", msg, pc.yellow);
}

export function logError(msg: string): void {
  emit("error", msg, pc.red);
}

export function logStep(msg: string): void {
  emit("step", msg, pc.cyan);
}

/** Write to the run log only (raw API bodies, command output). */
export function logDetail(msg: string): void {
  runLog?.append("info", msg);
}

/** `Xm Ys` above a minute, `Ns` below. */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

// ─── Prompts ────────────────────────────────────────────────────────────────

export function isNonInteractive(): boolean {
  return process.env.QUICKSTART_NON_INTERACTIVE === "1";
}

function assertInteractive(what: string): void {
  if (isNonInteractive()) {
    throw new Error(`Cannot prompt for ${what}: QUICKSTART_NON_INTERACTIVE is set`);
  }
}

/** Prompt for a line of user input. Throws if non-interactive. */
export async function prompt(question: string): Promise<string> {
  assertInteractive("input");
  const message = question.replace(/:\s*$/, "").trim();
  const result = await p.text({
    message,
  });
  return p.isCancel(result) ? "" : (result || "").trim();
}

/** Prompt for a secret. Returns "" on cancel. */
export async function promptSecret(question: string): Promise<string> {
  assertInteractive("a secret");
  const result = await p.password({
    message: question,
  });
  return p.isCancel(result) ? "" : result;
}

/** Yes/no confirmation; cancel counts as `false`. */
export async function confirm(question: string, initialValue = true): Promise<boolean> {
  assertInteractive("confirmation");
  const result = await p.confirm({
    message: question,
    initialValue,
  });
  return p.isCancel(result) ? false : result;
}

export interface ListItem {
  id: string;
  hint: string;
}

/**
 * Interactive select. A single item is picked without asking;
 * cancel returns `defaultValue`.
 */
export async function selectFromList(items: ListItem[], promptText: string, defaultValue: string): Promise<string> {
  if (items.length === 0) {
    return defaultValue;
  }
  if (items.length === 1) {
    logInfo(`Using ${promptText}: ${items[0].id}`);
    return items[0].id;
  }
  assertInteractive(promptText);

  const result = await p.select({
    message: `Select ${promptText}`,
    options: items.map((item) => ({
      value: item.id,
      label: item.id,
      hint: item.hint,
    })),
    initialValue: items.some((i) => i.id === defaultValue) ? defaultValue : items[0].id,
  });

  if (p.isCancel(result)) {
    return defaultValue;
  }
  return isString(result) ? result : String(result);
}

/** Open a URL in the user's browser, always echoing it for headless sessions. */
export function openBrowser(url: string): void {
  const cmds: [string, string[]][] =
    process.platform === "darwin"
      ? [["open", [url]]]
      : [
          ["xdg-open", [url]],
          ["wslview", [url]],
        ];

  let opened = false;
  for (const [cmd, args] of cmds) {
    const result = spawnSync(cmd, args, {
      stdio: "ignore",
    });
    // result.error is set when the binary does not exist; try the next one
    if (!result.error && result.status === 0) {
      opened = true;
      break;
    }
  }

  if (opened) {
    logStep(`If the browser didn't open, visit: ${url}`);
  } else {
    logStep(`Please open: ${url}`);
  }
}

// ─── Validators ─────────────────────────────────────────────────────────────

/** Instance label: 3-64 chars, alphanumeric start, then alphanumeric, dash, dot or underscore. */
export function validateLabel(label: string): boolean {
  return /^[a-zA-Z0-9][a-zA-Z0-9_.-]{2,63}$/.test(label) && !/--|__|\.\./.test(label);
}

/** Region id such as `us-ord` or `de-fra-2`. */
export function validateRegionId(region: string): boolean {
  return /^[a-z0-9-]{1,63}$/.test(region);
}

/** Model id such as `mistralai/Mistral-7B-Instruct-v0.3`. */
export function validateModelId(id: string): boolean {
  return /^[a-zA-Z0-9][a-zA-Z0-9/_:.-]*$/.test(id);
}

/** Convert a display name to kebab-case. */
export function toKebabCase(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-|-$/g, "");
}
