// deploy/service-probe.ts — UI health and model-listing probes, direct or through the remote shell

import * as v from "valibot";
import { parseJsonWith } from "@llm-quickstart/shared";
import type { RemoteShell } from "../shared/ssh";

export const UI_PORT = 3000;
export const API_PORT = 8000;
export const EXPECTED_CONTAINERS = ["vllm", "open-webui"] as const;

const ModelsSchema = v.object({
  data: v.array(
    v.object({
      id: v.string(),
    }),
  ),
});

export interface ServiceProbe {
  /** True when the UI health endpoint answers 200. */
  uiHealthy(): Promise<boolean>;
  /** Raw body of the model listing, or null when unreachable. */
  modelListing(): Promise<string | null>;
}

/** The listing names `model` exactly (`"id":"<model>"`). */
export function modelListed(body: string, model: string): boolean {
  const parsed = parseJsonWith(body, ModelsSchema);
  if (parsed) {
    return parsed.data.some((m) => m.id === model);
  }
  return body.includes(`"id":"${model}"`);
}

export class HttpServiceProbe implements ServiceProbe {
  constructor(
    private readonly host: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async uiHealthy(): Promise<boolean> {
    try {
      const resp = await fetch(`http://${this.host}:${UI_PORT}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await resp.body?.cancel();
      return resp.status === 200;
    } catch {
      return false;
    }
  }

  async modelListing(): Promise<string | null> {
    try {
      const resp = await fetch(`http://${this.host}:${API_PORT}/v1/models`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return resp.ok ? await resp.text() : null;
    } catch {
      return null;
    }
  }
}

/** Probes run as `curl` on the instance, so the service ports need not be reachable from here. */
export class SshServiceProbe implements ServiceProbe {
  constructor(
    private readonly shell: RemoteShell,
    private readonly timeoutMs = 20_000,
  ) {}

  async uiHealthy(): Promise<boolean> {
    const result = await this.shell.run(
      `curl -s -o /dev/null -w '%{http_code}' http://localhost:${UI_PORT}/health`,
      this.timeoutMs,
    );
    return result.code === 0 && result.stdout.trim() === "200";
  }

  async modelListing(): Promise<string | null> {
    const result = await this.shell.run(`curl -s http://localhost:${API_PORT}/v1/models`, this.timeoutMs);
    return result.code === 0 && result.stdout.trim() !== "" ? result.stdout : null;
  }
}

/** Names from `docker ps` that are missing from the expected set. */
export function missingContainers(psOutput: string): string[] {
  const running = new Set(
    psOutput
      .split("\n")
      .map((s) => s.trim())
      .filter(Boolean),
  );
  return EXPECTED_CONTAINERS.filter((name) => !running.has(name));
}
