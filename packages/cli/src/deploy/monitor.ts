// deploy/monitor.ts — Five-phase bring-up state machine with per-phase budgets.
//
// Boot and Reachability time-outs are fatal (PhaseTimeoutError), as is a
// progress feed that never delivers a message. Later phases end in warnings.

import { errorMessage } from "@llm-quickstart/shared";
import { ApiError, PhaseTimeoutError } from "../errors";
import { type Clock, withDeadline } from "../shared/clock";
import { withIpAddress } from "../shared/instance-record";
import type { RemoteShell } from "../shared/ssh";
import { formatElapsed, logDetail, logInfo, logStep, logWarn } from "../shared/ui";
import type { LinodeClient } from "../linode/linode";
import { advance, type DeploymentContext, type DeploymentPhase, type PhaseReport, warnings } from "./context";
import type { FeedEvent, ProgressFeed } from "./progress-feed";
import { missingContainers, modelListed, type ServiceProbe } from "./service-probe";

export const TERMINAL_PROGRESS = /Rebooting|Starting/;
export const FEED_RECONNECT_MS = 5_000;
export const SSH_PORT = 22;
export const SKIPPED_CONTAINER_CHECK = "No SSH key; skipped the container check";

export interface MonitorDeps {
  clock: Clock;
  statusSource: Pick<LinodeClient, "getInstance">;
  feed: ProgressFeed;
  isPortOpen(host: string, port: number): Promise<boolean>;
  /** Null in password-only mode, where remote commands are skipped. */
  remoteShell(host: string): RemoteShell | null;
  serviceProbe(host: string): ServiceProbe;
  /** Called after every phase transition. */
  onTransition?(ctx: DeploymentContext): void;
}

export interface MonitorOutcome {
  context: DeploymentContext;
  warnings: string[];
}

type PhaseRunner = (ctx: DeploymentContext, deps: MonitorDeps) => Promise<DeploymentContext>;

function report(
  phase: DeploymentPhase,
  startedAt: number,
  deps: MonitorDeps,
  timing: { timeoutMs: number; pollIntervalMs: number },
  warning?: string,
): PhaseReport {
  return {
    phase,
    startedAt,
    endedAt: deps.clock.now(),
    timeoutMs: timing.timeoutMs,
    pollIntervalMs: timing.pollIntervalMs,
    outcome: warning ? "timed-out" : "success",
    ...(warning
      ? {
          warning,
        }
      : {}),
  };
}

// ─── Boot ────────────────────────────────────────────────────────────────────

export const bootPhase: PhaseRunner = async (ctx, deps) => {
  const { bootTimeoutMs: timeoutMs, bootPollMs: pollIntervalMs } = ctx.timings;
  const { clock } = deps;
  const start = clock.now();
  let record = ctx.record;
  logStep(`Waiting for instance ${record.id} to boot (up to ${formatElapsed(timeoutMs)})...`);

  while (true) {
    let status = "unknown";
    try {
      const budget = timeoutMs - (clock.now() - start);
      const instance = await withDeadline(clock, budget, deps.statusSource.getInstance(record.id));
      if (instance === null) {
        logWarn(`Status check did not answer within ${formatElapsed(budget)}`);
      }
      status = instance?.status ?? status;
      if (instance && !record.ipAddress && instance.ipv4[0]) {
        record = withIpAddress(record, instance.ipv4[0]);
        logInfo(`Instance IP address: ${record.ipAddress}`);
      }
    } catch (err) {
      logWarn(`Status check failed: ${errorMessage(err)}`);
    }

    const elapsed = clock.now() - start;
    if (status === "running") {
      if (!record.ipAddress) {
        throw new ApiError(0, "", `Instance ${record.id} is running but reports no IPv4 address`);
      }
      logInfo(`Instance is running (${formatElapsed(elapsed)})`);
      return advance(ctx, report("boot", start, deps, { timeoutMs, pollIntervalMs }), {
        record,
      });
    }
    logStep(`  status: ${status} (${formatElapsed(elapsed)})`);
    if (elapsed >= timeoutMs) {
      throw new PhaseTimeoutError("boot", timeoutMs, `Instance did not reach "running" within ${formatElapsed(timeoutMs)}`);
    }
    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed));
  }
};

// ─── Install progress ────────────────────────────────────────────────────────

export const installProgressPhase: PhaseRunner = async (ctx, deps) => {
  const { firstMessageTimeoutMs, installCeilingMs } = ctx.timings;
  const { clock } = deps;
  const start = clock.now();
  const firstDeadline = start + firstMessageTimeoutMs;
  const ceiling = start + installCeilingMs;
  const topic = ctx.record.label;
  const cancel = new AbortController();
  let since = String(Math.floor(Date.parse(ctx.record.createdAt) / 1000));
  let gotFirst = false;
  let finished = false;

  logStep(`Following install progress on ntfy topic "${topic}"...`);
  try {
    while (!finished) {
      const iterator = deps.feed.subscribe(topic, { since, signal: cancel.signal })[Symbol.asyncIterator]();
      while (true) {
        const remaining = (gotFirst ? ceiling : firstDeadline) - clock.now();
        if (remaining <= 0) {
          finished = true;
          break;
        }
        let step: IteratorResult<FeedEvent> | null;
        try {
          step = await withDeadline(clock, remaining, iterator.next());
        } catch (err) {
          logWarn(`Progress feed error: ${errorMessage(err)}; reconnecting`);
          break;
        }
        if (step === null) {
          finished = true;
          break;
        }
        if (step.done) {
          break;
        }
        const event = step.value;
        since = event.id ?? since;
        if (event.event !== "message" || !event.message) {
          continue;
        }
        gotFirst = true;
        logInfo(`  [${formatElapsed(clock.now() - start)}] ${event.message}`);
        if (TERMINAL_PROGRESS.test(event.message)) {
          return advance(ctx, report("install-progress", start, deps, { timeoutMs: installCeilingMs, pollIntervalMs: 0 }));
        }
      }
      if (!finished) {
        const remaining = (gotFirst ? ceiling : firstDeadline) - clock.now();
        await clock.sleep(Math.max(0, Math.min(FEED_RECONNECT_MS, remaining)));
      }
    }
  } finally {
    cancel.abort();
  }

  if (!gotFirst) {
    throw new PhaseTimeoutError(
      "install-progress",
      firstMessageTimeoutMs,
      `No install progress received within ${formatElapsed(firstMessageTimeoutMs)}`,
    );
  }
  const warning = `Install progress did not report completion within ${formatElapsed(installCeilingMs)}`;
  logWarn(warning);
  return advance(ctx, report("install-progress", start, deps, { timeoutMs: installCeilingMs, pollIntervalMs: 0 }, warning));
};

// ─── Reachability ────────────────────────────────────────────────────────────

export const reachabilityPhase: PhaseRunner = async (ctx, deps) => {
  const { reachabilityTimeoutMs: timeoutMs, reachabilityPollMs: pollIntervalMs } = ctx.timings;
  const { clock } = deps;
  const start = clock.now();
  const host = ctx.record.ipAddress;
  logStep(`Waiting for SSH on ${host}:${SSH_PORT}...`);

  while (true) {
    if (await deps.isPortOpen(host, SSH_PORT)) {
      logInfo(`SSH port is open (${formatElapsed(clock.now() - start)})`);
      return advance(ctx, report("reachability", start, deps, { timeoutMs, pollIntervalMs }));
    }
    const elapsed = clock.now() - start;
    if (elapsed >= timeoutMs) {
      throw new PhaseTimeoutError(
        "reachability",
        timeoutMs,
        `SSH port ${SSH_PORT} on ${host} did not open within ${formatElapsed(timeoutMs)}`,
      );
    }
    logStep(`  port ${SSH_PORT} closed (${formatElapsed(elapsed)})`);
    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed));
  }
};

// ─── Remote health ───────────────────────────────────────────────────────────

export const remoteHealthPhase: PhaseRunner = async (ctx, deps) => {
  const timeoutMs = ctx.timings.remoteCommandTimeoutMs;
  const start = deps.clock.now();
  const timing = { timeoutMs, pollIntervalMs: 0 };
  const shell = deps.remoteShell(ctx.record.ipAddress);
  if (!shell) {
    logWarn(SKIPPED_CONTAINER_CHECK);
    return advance(ctx, report("remote-health", start, deps, timing, SKIPPED_CONTAINER_CHECK));
  }

  logStep("Checking containers on the instance...");
  const result = await shell.run("docker ps --format '{{.Names}}'", timeoutMs);
  if (result.code !== 0) {
    logDetail(`docker ps exited ${result.code}: ${result.stderr.trim()}`);
    const warning = `Could not list containers (exit ${result.code})`;
    logWarn(warning);
    return advance(ctx, report("remote-health", start, deps, timing, warning));
  }
  const missing = missingContainers(result.stdout);
  if (missing.length > 0) {
    const warning = `Containers not running yet: ${missing.join(", ")}`;
    logWarn(warning);
    return advance(ctx, report("remote-health", start, deps, timing, warning));
  }
  logInfo("vllm and open-webui containers are running");
  return advance(ctx, report("remote-health", start, deps, timing));
};

// ─── Service health ──────────────────────────────────────────────────────────

async function pollUntil(
  clock: Clock,
  timeoutMs: number,
  pollIntervalMs: number,
  label: string,
  check: () => Promise<boolean>,
): Promise<boolean> {
  const start = clock.now();
  while (true) {
    if (await check()) {
      logInfo(`${label}: ready (${formatElapsed(clock.now() - start)})`);
      return true;
    }
    const elapsed = clock.now() - start;
    if (elapsed >= timeoutMs) {
      return false;
    }
    logStep(`  ${label}: waiting (${formatElapsed(elapsed)})`);
    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed));
  }
}

export const serviceHealthPhase: PhaseRunner = async (ctx, deps) => {
  const t = ctx.timings;
  const start = deps.clock.now();
  const probe = deps.serviceProbe(ctx.record.ipAddress);
  const problems: string[] = [];

  logStep(`Waiting for Open WebUI (up to ${formatElapsed(t.uiTimeoutMs)})...`);
  if (!(await pollUntil(deps.clock, t.uiTimeoutMs, t.uiPollMs, "Open WebUI", () => probe.uiHealthy()))) {
    problems.push(`Open WebUI not healthy after ${formatElapsed(t.uiTimeoutMs)}`);
  }

  logStep(`Waiting for vLLM to load ${ctx.model} (up to ${formatElapsed(t.modelTimeoutMs)})...`);
  const loaded = await pollUntil(deps.clock, t.modelTimeoutMs, t.modelPollMs, "vLLM model", async () => {
    const body = await probe.modelListing();
    return body !== null && modelListed(body, ctx.model);
  });
  if (!loaded) {
    problems.push(`Model ${ctx.model} not listed after ${formatElapsed(t.modelTimeoutMs)}`);
  }

  const timing = {
    timeoutMs: Math.max(t.uiTimeoutMs, t.modelTimeoutMs),
    pollIntervalMs: Math.min(t.uiPollMs, t.modelPollMs),
  };
  const warning = problems.length > 0 ? problems.join("; ") : undefined;
  if (warning) {
    logWarn(warning);
  }
  return advance(ctx, report("service-health", start, deps, timing, warning));
};

// ─── Driver ──────────────────────────────────────────────────────────────────

const RUNNERS: Partial<Record<DeploymentPhase, PhaseRunner>> = {
  boot: bootPhase,
  "install-progress": installProgressPhase,
  reachability: reachabilityPhase,
  "remote-health": remoteHealthPhase,
  "service-health": serviceHealthPhase,
};

/**
 * Run every phase from `ctx.phase` through ServiceHealth. Fatal phases throw
 * PhaseTimeoutError; the rest are recorded as warnings on the outcome.
 */
export async function monitorDeployment(ctx: DeploymentContext, deps: MonitorDeps): Promise<MonitorOutcome> {
  let current = ctx;
  while (current.phase !== "complete") {
    const runner = RUNNERS[current.phase];
    if (!runner) {
      throw new Error(`No runner for phase ${current.phase}`);
    }
    const from = current.phase;
    current = await runner(current, deps);
    const last = current.reports[current.reports.length - 1];
    logDetail(`Phase ${from} ended: ${last?.outcome ?? "unknown"} -> ${current.phase}`);
    deps.onTransition?.(current);
  }
  return {
    context: current,
    warnings: warnings(current),
  };
}
