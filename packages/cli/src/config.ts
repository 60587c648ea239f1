// config.ts — Environment + flag configuration, validated with valibot

import * as v from "valibot";
import { join } from "node:path";
import { ConfigError } from "./errors";
import type { ParsedFlags } from "./flags";
import { toKebabCase, validateLabel, validateModelId, validateRegionId } from "./shared/ui";

export const API_BASE = "https://api.linode.com/v4";
export const OAUTH_AUTHORIZE_URL = "https://login.linode.com/oauth/authorize";
export const DEFAULT_OAUTH_CLIENT_ID = "5823b4627e45411d18e9";
export const NTFY_BASE = "https://ntfy.sh";
export const DEFAULT_MODEL = "mistralai/Mistral-7B-Instruct-v0.3";
export const DEFAULT_IMAGE = "linode/ubuntu24.04";
export const GPU_FAMILY_PREFIX = "g2-gpu-rtx4000";

export type ProbeMode = "ssh" | "http";

/** Per-phase budgets for the deployment monitor, in milliseconds. */
export interface PhaseTimings {
  bootTimeoutMs: number;
  bootPollMs: number;
  firstMessageTimeoutMs: number;
  installCeilingMs: number;
  reachabilityTimeoutMs: number;
  reachabilityPollMs: number;
  remoteCommandTimeoutMs: number;
  uiTimeoutMs: number;
  uiPollMs: number;
  modelTimeoutMs: number;
  modelPollMs: number;
}

export const DEFAULT_TIMINGS: Readonly<PhaseTimings> = Object.freeze({
  bootTimeoutMs: 180_000,
  bootPollMs: 5_000,
  firstMessageTimeoutMs: 300_000,
  installCeilingMs: 900_000,
  reachabilityTimeoutMs: 120_000,
  reachabilityPollMs: 2_000,
  remoteCommandTimeoutMs: 30_000,
  uiTimeoutMs: 300_000,
  uiPollMs: 5_000,
  modelTimeoutMs: 600_000,
  modelPollMs: 10_000,
});

export interface QuickstartConfig {
  apiBase: string;
  nonInteractive: boolean;
  region: string | undefined;
  instanceType: string | undefined;
  label: string | undefined;
  model: string;
  /** Undefined means "ssh when a key is available, otherwise http". */
  probe: ProbeMode | undefined;
  recordsDir: string;
  logDir: string;
  deleteOnFailure: boolean;
  oauthClientId: string;
  oauthTimeoutMs: number;
  familyPrefix: string;
  availabilityPages: number;
  requestTimeoutMs: number;
  timings: Readonly<PhaseTimings>;
}

const Flag = v.optional(v.picklist(["0", "1"]));

const EnvSchema = v.object({
  QUICKSTART_NON_INTERACTIVE: Flag,
  QUICKSTART_REGION: v.optional(v.string()),
  QUICKSTART_TYPE: v.optional(v.string()),
  QUICKSTART_LABEL: v.optional(v.string()),
  QUICKSTART_MODEL: v.optional(v.string()),
  QUICKSTART_PROBE: v.optional(v.picklist(["ssh", "http"])),
  QUICKSTART_RECORDS_DIR: v.optional(v.string()),
  QUICKSTART_LOG_DIR: v.optional(v.string()),
  QUICKSTART_DELETE_ON_FAILURE: Flag,
  QUICKSTART_OAUTH_CLIENT_ID: v.optional(v.pipe(v.string(), v.regex(/^[a-zA-Z0-9]+$/))),
  QUICKSTART_API_BASE: v.optional(v.pipe(v.string(), v.url())),
});

function nonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((s) => s !== undefined && s.trim() !== "")?.trim();
}

function describeIssues(issues: readonly v.BaseIssue<unknown>[]): string {
  return issues
    .map((issue) => {
      const key = issue.path?.map((item) => String(item.key)).join(".") ?? "value";
      return `  ${key}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Merge env and flags (flags win) into a frozen config.
 * Throws ConfigError listing every invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv, flags: Partial<ParsedFlags> = {}, cwd = process.cwd()): QuickstartConfig {
  const parsed = v.safeParse(EnvSchema, env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment:\n${describeIssues(parsed.issues)}`);
  }
  const e = parsed.output;

  const region = nonEmpty(flags.region, e.QUICKSTART_REGION);
  if (region !== undefined && !validateRegionId(region)) {
    throw new ConfigError(`Invalid region id: "${region}"`);
  }
  const label = nonEmpty(flags.label, e.QUICKSTART_LABEL);
  if (label !== undefined && !validateLabel(label)) {
    throw new ConfigError(
      `Invalid label: "${label}"\nLabels are 3-64 characters, start with a letter or digit, ` +
        "and contain only letters, digits, '-', '_' or '.' (no doubled separators).",
    );
  }
  const model = nonEmpty(flags.model, e.QUICKSTART_MODEL) ?? DEFAULT_MODEL;
  if (!validateModelId(model)) {
    throw new ConfigError(`Invalid model id: "${model}"`);
  }

  let probe: ProbeMode | undefined = e.QUICKSTART_PROBE;
  if (flags.probe !== undefined) {
    if (flags.probe !== "ssh" && flags.probe !== "http") {
      throw new ConfigError(`--probe must be "ssh" or "http", got "${flags.probe}"`);
    }
    probe = flags.probe;
  }

  return Object.freeze({
    apiBase: e.QUICKSTART_API_BASE ?? API_BASE,
    nonInteractive: flags.nonInteractive === true || e.QUICKSTART_NON_INTERACTIVE === "1",
    region,
    instanceType: nonEmpty(flags.type, e.QUICKSTART_TYPE),
    label,
    model,
    probe,
    recordsDir: nonEmpty(e.QUICKSTART_RECORDS_DIR) ?? cwd,
    logDir: nonEmpty(e.QUICKSTART_LOG_DIR) ?? join(cwd, "logs"),
    deleteOnFailure: e.QUICKSTART_DELETE_ON_FAILURE === "1",
    oauthClientId: e.QUICKSTART_OAUTH_CLIENT_ID ?? DEFAULT_OAUTH_CLIENT_ID,
    oauthTimeoutMs: 120_000,
    familyPrefix: GPU_FAMILY_PREFIX,
    availabilityPages: 4,
    requestTimeoutMs: 30_000,
    timings: DEFAULT_TIMINGS,
  });
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Short model name for labels: `mistralai/Mistral-7B-…` → `mistral`. */
export function modelSlug(model: string): string {
  const name = model.split("/").pop() ?? "";
  return toKebabCase(name.split("-")[0] ?? "") || "llm";
}

/** `ai-quickstart-<model>-YYMMDDHHMM` */
export function defaultLabel(model: string, now = new Date()): string {
  const stamp =
    `${pad(now.getFullYear() % 100)}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `ai-quickstart-${modelSlug(model)}-${stamp}`;
}
