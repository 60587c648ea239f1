import type { PhaseTimings, ProbeMode } from "../config";
import type { InstanceRecord } from "../shared/instance-record";

export const PHASES = ["boot", "install-progress", "reachability", "remote-health", "service-health", "complete"] as const;

export type DeploymentPhase = (typeof PHASES)[number];

export type PhaseOutcome = "success" | "timed-out";

export interface PhaseReport {
  phase: DeploymentPhase;
  startedAt: number;
  endedAt: number;
  timeoutMs: number;
  pollIntervalMs: number;
  outcome: PhaseOutcome;
  /** Set when the phase finished with a non-fatal warning. */
  warning?: string;
}

export interface DeploymentContext {
  readonly record: InstanceRecord;
  readonly model: string;
  readonly probe: ProbeMode;
  readonly timings: Readonly<PhaseTimings>;
  readonly phase: DeploymentPhase;
  readonly reports: readonly PhaseReport[];
}

export function phaseIndex(phase: DeploymentPhase): number {
  return PHASES.indexOf(phase);
}

export function createContext(
  record: InstanceRecord,
  model: string,
  probe: ProbeMode,
  timings: Readonly<PhaseTimings>,
  phase: DeploymentPhase = "boot",
): DeploymentContext {
  return Object.freeze({
    record,
    model,
    probe,
    timings,
    phase,
    reports: Object.freeze([]),
  });
}

/**
 * Record a finished phase and move to the one after it. Throws if `report`
 * is not for the current phase, so phases can only advance in order.
 */
export function advance(ctx: DeploymentContext, report: PhaseReport, changes: Partial<Pick<DeploymentContext, "record">> = {}): DeploymentContext {
  if (report.phase !== ctx.phase) {
    throw new Error(`Phase order violated: finished ${report.phase} while in ${ctx.phase}`);
  }
  const next = PHASES[Math.min(phaseIndex(ctx.phase) + 1, PHASES.length - 1)];
  return Object.freeze({
    ...ctx,
    ...changes,
    phase: next,
    reports: Object.freeze([...ctx.reports, Object.freeze(report)]),
  });
}

export function warnings(ctx: DeploymentContext): string[] {
  return ctx.reports.flatMap((r) => (r.warning ? [r.warning] : []));
}
