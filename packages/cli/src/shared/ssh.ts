// shared/ssh.ts — Remote shell channel (ssh/scp) and TCP reachability probe

import { spawn, type ChildProcess } from "node:child_process";
import { connect } from "node:net";

// ─── Shared SSH Options ──────────────────────────────────────────────────────

/** Base SSH options for non-interactive commands against fresh instances. */
export const SSH_BASE_OPTS: readonly string[] = [
  "-o",
  "StrictHostKeyChecking=no",
  "-o",
  "UserKnownHostsFile=/dev/null",
  "-o",
  "LogLevel=ERROR",
  "-o",
  "ConnectTimeout=10",
  "-o",
  "ServerAliveInterval=15",
  "-o",
  "ServerAliveCountMax=3",
  "-o",
  "GSSAPIAuthentication=no",
  "-o",
  "BatchMode=yes",
];

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Kill a child process with SIGTERM, then escalate to SIGKILL after a grace period.
 * SSH stuck in network I/O can ignore SIGTERM indefinitely.
 */
export function killWithTimeout(proc: ChildProcess, gracePeriodMs = 5000): void {
  if (proc.exitCode !== null || proc.signalCode !== null) {
    return;
  }
  proc.kill("SIGTERM");
  const escalate = setTimeout(() => {
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill("SIGKILL");
    }
  }, gracePeriodMs);
  escalate.unref();
}

// ─── TCP Pre-Check ───────────────────────────────────────────────────────────

/**
 * Probe whether a TCP port is open using node:net.
 * Returns true if the connection succeeds within `timeoutMs`, false otherwise.
 */
export function tcpCheck(host: string, port: number, timeoutMs = 2000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({
      host,
      port,
    });
    const timer = setTimeout(() => {
      socket.destroy();
      resolve(false);
    }, timeoutMs);
    socket.on("connect", () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(true);
    });
    socket.on("error", () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(false);
    });
  });
}

// ─── Remote Shell ────────────────────────────────────────────────────────────

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RemoteShell {
  run(command: string, timeoutMs: number): Promise<CommandResult>;
  upload(localPath: string, remotePath: string, timeoutMs: number): Promise<CommandResult>;
}

/** Run a local binary, capturing output; exit code 124 on timeout like coreutils `timeout`. */
export function runCaptured(cmd: string, args: readonly string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(cmd, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    proc.stdout.setEncoding("utf-8");
    proc.stderr.setEncoding("utf-8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    const timer = setTimeout(() => {
      timedOut = true;
      killWithTimeout(proc);
    }, timeoutMs);
    proc.on("error", (err) => {
      clearTimeout(timer);
      resolve({
        code: 127,
        stdout,
        stderr: stderr || err.message,
      });
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        code: timedOut ? 124 : (code ?? 1),
        stdout,
        stderr,
      });
    });
  });
}

export interface SshTarget {
  host: string;
  user: string;
  /** Private key path; omitted in password-only mode. */
  identityFile?: string;
}

export class SshRemoteShell implements RemoteShell {
  constructor(private readonly target: SshTarget) {}

  private baseArgs(): string[] {
    const args = [...SSH_BASE_OPTS];
    if (this.target.identityFile) {
      args.push("-i", this.target.identityFile);
    }
    return args;
  }

  run(command: string, timeoutMs: number): Promise<CommandResult> {
    return runCaptured("ssh", [...this.baseArgs(), `${this.target.user}@${this.target.host}`, command], timeoutMs);
  }

  upload(localPath: string, remotePath: string, timeoutMs: number): Promise<CommandResult> {
    return runCaptured(
      "scp",
      [...this.baseArgs(), localPath, `${this.target.user}@${this.target.host}:${remotePath}`],
      timeoutMs,
    );
  }
}
