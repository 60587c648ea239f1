// shared/orchestrate.ts — The deployment pipeline:
// credential → catalog → provision → monitor, with remediation on fatal monitor errors.

import { errorMessage } from "@llm-quickstart/shared";
import type { ProbeMode, QuickstartConfig } from "../config";
import { ApiError, RecordWriteError } from "../errors";
import type { Credential } from "../linode/auth";
import { type AvailabilityCatalog, fetchCatalog } from "../linode/catalog";
import type { LinodeClient } from "../linode/linode";
import { provision, type ProvisionResult } from "../linode/provision";
import { createContext } from "../deploy/context";
import { type MonitorDeps, monitorDeployment } from "../deploy/monitor";
import { NtfyFeed } from "../deploy/progress-feed";
import { offerDeletion } from "../deploy/remediation";
import { HttpServiceProbe, SshServiceProbe, UI_PORT, API_PORT } from "../deploy/service-probe";
import { systemClock } from "./clock";
import type { PayloadTemplates } from "./cloud-init";
import type { InstanceRecord } from "./instance-record";
import { SshRemoteShell, tcpCheck } from "./ssh";
import type { AuthorizedKey } from "./ssh-keys";
import { logDetail, logError, logInfo, logStep, logWarn } from "./ui";

export type DeploymentClient = Pick<
  LinodeClient,
  "getAvailabilityPage" | "getTypes" | "getRegions" | "createInstance" | "getInstance" | "deleteInstance"
>;

export interface DeploymentTarget {
  regionId: string;
  instanceTypeId: string;
}

/** Everything the pipeline talks to; the CLI wires real implementations, tests wire fakes. */
export interface DeploymentEnv {
  config: QuickstartConfig;
  credentials: {
    acquire(): Promise<Credential>;
  };
  createClient(credential: Credential): DeploymentClient;
  templates: PayloadTemplates;
  selectTarget(catalog: AvailabilityCatalog): Promise<DeploymentTarget>;
  selectKey(): Promise<AuthorizedKey | null>;
  /** Operator-supplied root password, or undefined to generate one. */
  rootPassword(): Promise<string | undefined>;
  monitorDeps(client: DeploymentClient, key: AuthorizedKey | null, probe: ProbeMode): MonitorDeps;
  confirm(question: string): Promise<boolean>;
  logPath: string | null;
}

export interface DeploymentResult {
  exitCode: 0 | 1;
  record: InstanceRecord;
  warnings: string[];
}

export function defaultMonitorDeps(client: DeploymentClient, key: AuthorizedKey | null, probe: ProbeMode): MonitorDeps {
  const shellFor = (host: string) =>
    key
      ? new SshRemoteShell({
          host,
          user: "root",
          identityFile: key.pair.privPath,
        })
      : null;
  return {
    clock: systemClock,
    statusSource: client,
    feed: new NtfyFeed(),
    isPortOpen: (host, port) => tcpCheck(host, port, 2000),
    remoteShell: shellFor,
    serviceProbe: (host) => {
      const shell = probe === "ssh" ? shellFor(host) : null;
      return shell ? new SshServiceProbe(shell) : new HttpServiceProbe(host);
    },
  };
}

export function printSummary(record: InstanceRecord, model: string): void {
  process.stderr.write("\n");
  logInfo(`Instance:   ${record.label} (${record.id}) in ${record.regionId}`);
  logInfo(`Open WebUI: http://${record.ipAddress}:${UI_PORT}`);
  logInfo(`vLLM API:   http://${record.ipAddress}:${API_PORT}/v1  (model ${model})`);
  logInfo(`SSH:        ssh root@${record.ipAddress}`);
}

/**
 * Errors before the create call propagate (nothing billable exists yet).
 * After it, fatal errors trigger the delete offer and yield exit code 1.
 */
export async function runDeployment(env: DeploymentEnv): Promise<DeploymentResult> {
  const { config } = env;

  const fail = async (record: InstanceRecord, client: DeploymentClient, err: unknown): Promise<DeploymentResult> => {
    logError(`Deployment failed: ${errorMessage(err)}`);
    if (err instanceof ApiError && err.body) {
      logDetail(`API response (HTTP ${err.status}): ${err.body}`);
    }
    await offerDeletion(record, {
      client,
      recordsDir: config.recordsDir,
      nonInteractive: config.nonInteractive,
      deleteOnFailure: config.deleteOnFailure,
      logPath: env.logPath,
      confirm: env.confirm,
    });
    return {
      exitCode: 1,
      record,
      warnings: [],
    };
  };

  const credential = await env.credentials.acquire();
  const client = env.createClient(credential);

  logStep("Fetching GPU availability...");
  const catalog = await fetchCatalog(client, {
    familyPrefix: config.familyPrefix,
    pages: config.availabilityPages,
  });
  if (catalog.regions.length === 0) {
    throw new ApiError(0, "", `No region currently offers ${config.familyPrefix} plans`);
  }
  logInfo(`${catalog.instanceTypes.length} GPU plans across ${catalog.regions.length} regions`);

  const target = await env.selectTarget(catalog);
  const key = await env.selectKey();
  const rootPassword = await env.rootPassword();

  let provisioned: ProvisionResult;
  try {
    provisioned = await provision(client, catalog, {
      regionId: target.regionId,
      instanceTypeId: target.instanceTypeId,
      label: config.label,
      model: config.model,
      rootPassword,
      authorizedKey: key,
      templates: env.templates,
      recordsDir: config.recordsDir,
    });
  } catch (err) {
    if (err instanceof RecordWriteError) {
      return fail(err.record, client, err);
    }
    throw err;
  }
  const { record, recordPath } = provisioned;

  const probe: ProbeMode = config.probe ?? (key ? "ssh" : "http");
  const ctx = createContext(record, config.model, probe, config.timings);
  try {
    const outcome = await monitorDeployment(ctx, env.monitorDeps(client, key, probe));
    const finalRecord = outcome.context.record;
    printSummary(finalRecord, config.model);
    logInfo(`Record:     ${recordPath}`);
    if (outcome.warnings.length > 0) {
      logWarn("Deployment finished with warnings; the service may still be starting.");
      logWarn(`Re-check later with: llm-quickstart status --id ${finalRecord.id}`);
    } else {
      logInfo("Deployment complete");
    }
    return {
      exitCode: 0,
      record: finalRecord,
      warnings: outcome.warnings,
    };
  } catch (err) {
    return fail(record, client, err);
  }
}
