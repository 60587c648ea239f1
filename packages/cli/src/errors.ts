// errors.ts — Error taxonomy for the deployment pipeline

import type { DeploymentPhase } from "./deploy/context";
import type { InstanceRecord } from "./shared/instance-record";

export type AuthFailureReason = "no-credential" | "timeout" | "invalid";

/** No credential could be resolved. Always raised before anything billable happens. */
export class AuthError extends Error {
  constructor(
    public readonly reason: AuthFailureReason,
    message: string,
  ) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * Non-2xx control-plane response, or a 2xx whose body is missing required fields.
 * `body` is the raw response text, kept verbatim for the run log.
 */
export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    message: string,
    public readonly endpoint = "",
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class PasswordPolicyError extends Error {
  constructor(public readonly violations: readonly string[]) {
    super(`Password does not meet policy: ${violations.join("; ")}`);
    this.name = "PasswordPolicyError";
  }
}

export class PhaseTimeoutError extends Error {
  constructor(
    public readonly phase: DeploymentPhase,
    public readonly timeoutMs: number,
    message: string,
  ) {
    super(message);
    this.name = "PhaseTimeoutError";
  }
}

/** The instance was created but its record file could not be written. */
export class RecordWriteError extends Error {
  constructor(
    public readonly record: InstanceRecord,
    public readonly recordsDir: string,
    reason: string,
  ) {
    super(`Could not write the record for instance ${record.id} to ${recordsDir}: ${reason}`);
    this.name = "RecordWriteError";
  }
}

/** Invalid flag or environment value. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
