import * as p from "@clack/prompts";
import pc from "picocolors";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errorMessage } from "@llm-quickstart/shared";
import { DEFAULT_TIMINGS, loadConfig, type QuickstartConfig } from "./config";
import { ApiError, ConfigError } from "./errors";
import type { ParsedFlags } from "./flags";
import { type Credential, CredentialProvider } from "./linode/auth";
import { type AvailabilityCatalog, catalogToJson, fetchCatalog } from "./linode/catalog";
import { LinodeClient } from "./linode/linode";
import { createContext } from "./deploy/context";
import { monitorDeployment, SKIPPED_CONTAINER_CHECK } from "./deploy/monitor";
import { loadTemplates, renderCompose } from "./shared/cloud-init";
import { deleteInstanceRecord, type InstanceRecord, readInstanceRecord, withIpAddress } from "./shared/instance-record";
import { defaultMonitorDeps, type DeploymentTarget, printSummary, runDeployment } from "./shared/orchestrate";
import { DEFAULT_PASSWORD_POLICY, passwordViolations } from "./shared/password";
import { RunLog } from "./shared/run-log";
import { SshRemoteShell } from "./shared/ssh";
import { type AuthorizedKey, discoverSshKeys, readPublicKey, selectAuthorizedKey } from "./shared/ssh-keys";
import {
  attachRunLog,
  confirm,
  logDetail,
  logError,
  logInfo,
  logStep,
  logWarn,
  prompt,
  promptSecret,
  selectFromList,
} from "./shared/ui";

// ── Shared setup ─────────────────────────────────────────────────────────────

function configFrom(flags: ParsedFlags): QuickstartConfig {
  const config = loadConfig(process.env, flags);
  if (config.nonInteractive) {
    // prompt helpers in shared/ui read the environment
    process.env.QUICKSTART_NON_INTERACTIVE = "1";
  }
  return config;
}

function startRunLog(config: QuickstartConfig): RunLog {
  const log = RunLog.create(config.logDir);
  attachRunLog(log);
  logInfo(`Logging to ${log.path}`);
  return log;
}

function credentialProvider(config: QuickstartConfig): CredentialProvider {
  return new CredentialProvider({
    env: process.env,
    apiBase: config.apiBase,
    requestTimeoutMs: config.requestTimeoutMs,
    oauthClientId: config.oauthClientId,
    oauthTimeoutMs: config.oauthTimeoutMs,
    nonInteractive: config.nonInteractive,
  });
}

function clientFor(config: QuickstartConfig, credential: Credential): LinodeClient {
  return new LinodeClient(credential.value, {
    apiBase: config.apiBase,
    timeoutMs: config.requestTimeoutMs,
  });
}

function requireId(flags: ParsedFlags, command: string): number {
  const raw = flags.id;
  if (raw === undefined) {
    throw new ConfigError(`${command} needs --id <instance id>`);
  }
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ConfigError(`--id must be a positive integer, got "${raw}"`);
  }
  return id;
}

function requireRecord(config: QuickstartConfig, id: number): InstanceRecord {
  const record = readInstanceRecord(config.recordsDir, id);
  if (!record) {
    throw new ConfigError(`No readable record for instance ${id} in ${config.recordsDir}`);
  }
  return record;
}

/** First discovered key, without prompting; for commands that reuse an existing deployment. */
function existingKey(): AuthorizedKey | null {
  const pair = discoverSshKeys()[0];
  const publicKey = pair ? readPublicKey(pair.pubPath) : null;
  return pair && publicKey
    ? {
        pair,
        publicKey,
      }
    : null;
}

function formatPrice(hourly: number): string {
  return `$${hourly.toFixed(2)}/hr`;
}

// ── Selection ────────────────────────────────────────────────────────────────

export async function selectTarget(catalog: AvailabilityCatalog, config: QuickstartConfig): Promise<DeploymentTarget> {
  const typesById = new Map(catalog.instanceTypes.map((t) => [t.id, t]));

  const regionId =
    config.region ??
    (await selectFromList(
      catalog.regions.map((r) => ({
        id: r.id,
        hint: `${r.label} (${r.availableInstanceTypeIds.size} plans)`,
      })),
      "region",
      catalog.regions[0].id,
    ));

  const region = catalog.regions.find((r) => r.id === regionId);
  const offered = region ? [...region.availableInstanceTypeIds] : [];
  const instanceTypeId =
    config.instanceType ??
    (await selectFromList(
      offered.map((id) => {
        const t = typesById.get(id);
        return {
          id,
          hint: t ? `${t.gpuCount} GPU, ${t.vcpus} vCPU, ${t.memory / 1024} GB, ${formatPrice(t.priceHourly)}` : "",
        };
      }),
      "instance type",
      offered[0] ?? "",
    ));

  return {
    regionId,
    instanceTypeId,
  };
}

/** Ask for a root password (twice) when --set-password is given; undefined means generate one. */
export async function askRootPassword(flags: ParsedFlags, config: QuickstartConfig): Promise<string | undefined> {
  if (!flags.setPassword) {
    return undefined;
  }
  if (config.nonInteractive) {
    throw new ConfigError("--set-password cannot be used with --non-interactive");
  }
  for (let attempt = 1; attempt <= 3; attempt++) {
    const password = await promptSecret(
      `Root password (${DEFAULT_PASSWORD_POLICY.minLength}-${DEFAULT_PASSWORD_POLICY.maxLength} chars, ` +
        `${DEFAULT_PASSWORD_POLICY.minPerClass}+ each of upper, lower, digit, symbol)`,
    );
    const violations = passwordViolations(password);
    if (violations.length > 0) {
      logWarn(`Password needs: ${violations.join(", ")}`);
      continue;
    }
    if ((await promptSecret("Confirm root password")) !== password) {
      logWarn("Passwords do not match");
      continue;
    }
    return password;
  }
  throw new ConfigError("No acceptable root password entered");
}

// ── Commands ─────────────────────────────────────────────────────────────────

export async function cmdDeploy(flags: ParsedFlags): Promise<number> {
  const config = configFrom(flags);
  const log = startRunLog(config);
  p.intro(pc.bold("LLM quickstart: vLLM + Open WebUI on a GPU instance"));

  const result = await runDeployment({
    config,
    credentials: credentialProvider(config),
    createClient: (credential) => clientFor(config, credential),
    templates: loadTemplates(),
    selectTarget: (catalog) => selectTarget(catalog, config),
    selectKey: () => selectAuthorizedKey(config.nonInteractive),
    rootPassword: () => askRootPassword(flags, config),
    monitorDeps: defaultMonitorDeps,
    confirm: (question) => confirm(question),
    logPath: log.path,
  });

  if (result.exitCode === 0) {
    p.outro(result.warnings.length > 0 ? pc.yellow("Done, with warnings") : pc.green("Done"));
  } else {
    logInfo(`Run log: ${log.path}`);
  }
  return result.exitCode;
}

export async function cmdCatalog(flags: ParsedFlags): Promise<number> {
  const config = configFrom(flags);
  const credential = await credentialProvider(config).acquire();
  const catalog = await fetchCatalog(clientFor(config, credential), {
    familyPrefix: config.familyPrefix,
    pages: config.availabilityPages,
  });

  if (flags.json) {
    console.log(JSON.stringify(catalogToJson(catalog), null, 2));
    return 0;
  }

  console.log(pc.bold("\nGPU plans"));
  for (const t of catalog.instanceTypes) {
    console.log(
      `  ${t.id.padEnd(24)} ${String(t.gpuCount).padStart(2)} GPU  ${String(t.vcpus).padStart(3)} vCPU  ` +
        `${String(t.memory / 1024).padStart(4)} GB  ${formatPrice(t.priceHourly).padStart(10)}  ${pc.dim(t.label)}`,
    );
  }
  console.log(pc.bold("\nRegions with capacity"));
  if (catalog.regions.length === 0) {
    console.log(pc.yellow("  none right now"));
  }
  for (const r of catalog.regions) {
    console.log(`  ${pc.cyan(r.id.padEnd(12))} ${r.label}`);
    console.log(`    ${[...r.availableInstanceTypeIds].join(", ")}`);
  }
  return 0;
}

/** Fill in the IP from the control plane when the record was written without one. */
async function resolveRecordHost(record: InstanceRecord, client: LinodeClient): Promise<InstanceRecord> {
  const instance = await client.getInstance(record.id);
  logInfo(`Instance ${record.id} (${instance.label}): ${instance.status}`);
  if (record.ipAddress) {
    return record;
  }
  const ip = instance.ipv4[0];
  if (!ip) {
    throw new ApiError(0, "", `Instance ${record.id} has no IPv4 address yet`);
  }
  return withIpAddress(record, ip);
}

export async function cmdStatus(flags: ParsedFlags): Promise<number> {
  const config = configFrom(flags);
  startRunLog(config);
  const id = requireId(flags, "status");
  const client = clientFor(config, await credentialProvider(config).acquire());
  const record = await resolveRecordHost(requireRecord(config, id), client);

  const key = existingKey();
  const probe = config.probe ?? (key ? "ssh" : "http");
  // One probe of each service instead of the deploy-time wait
  const timings = {
    ...DEFAULT_TIMINGS,
    uiTimeoutMs: 0,
    modelTimeoutMs: 0,
  };
  const ctx = createContext(record, config.model, probe, timings, "remote-health");
  const outcome = await monitorDeployment(ctx, defaultMonitorDeps(client, key, probe));
  printSummary(outcome.context.record, config.model);

  if (outcome.warnings.some((w) => w !== SKIPPED_CONTAINER_CHECK)) {
    logWarn("Not ready yet; the service may still be starting.");
    return 1;
  }
  logInfo("All services healthy");
  return 0;
}

export async function cmdCleanup(flags: ParsedFlags): Promise<number> {
  const config = configFrom(flags);
  startRunLog(config);
  const id = requireId(flags, "cleanup");
  const record = readInstanceRecord(config.recordsDir, id);
  const client = clientFor(config, await credentialProvider(config).acquire());

  let exists = true;
  try {
    const instance = await client.getInstance(id);
    logInfo(`Instance ${id}: ${instance.label} (${instance.type ?? "unknown type"}) in ${instance.region}, ${instance.status}`);
  } catch (err) {
    if (!(err instanceof ApiError) || err.status !== 404) {
      throw err;
    }
    exists = false;
    logWarn(`Instance ${id} no longer exists`);
  }

  if (exists) {
    if (!flags.force) {
      if (config.nonInteractive) {
        throw new ConfigError("cleanup in non-interactive mode needs --force");
      }
      const answer = await prompt(`Type 'yes' to permanently delete instance ${id}`);
      if (answer !== "yes") {
        logInfo("Cancelled");
        return 1;
      }
    }
    logStep(`Deleting instance ${id}...`);
    await client.deleteInstance(id);
    logInfo(`Instance ${id} deleted`);
  }

  if (deleteInstanceRecord(config.recordsDir, id)) {
    logInfo(`Removed record for ${record?.label ?? id}`);
  }
  return 0;
}

export async function cmdSync(flags: ParsedFlags): Promise<number> {
  const config = configFrom(flags);
  startRunLog(config);
  const id = requireId(flags, "sync");
  const key = existingKey();
  if (!key) {
    throw new ConfigError("sync needs an SSH key in ~/.ssh");
  }
  let record = requireRecord(config, id);
  if (!record.ipAddress) {
    record = await resolveRecordHost(record, clientFor(config, await credentialProvider(config).acquire()));
  }

  const shell = new SshRemoteShell({
    host: record.ipAddress,
    user: "root",
    identityFile: key.pair.privPath,
  });
  const dir = mkdtempSync(join(tmpdir(), "llm-quickstart-"));
  try {
    const composePath = join(dir, "docker-compose.yml");
    writeFileSync(composePath, renderCompose(loadTemplates().compose, config.model));
    logStep(`Uploading docker-compose.yml (model ${config.model})...`);
    const upload = await shell.upload(composePath, "/opt/ai-llm-basic/docker-compose.yml", 60_000);
    if (upload.code !== 0) {
      throw new Error(`Upload failed: ${upload.stderr.trim() || `exit ${upload.code}`}`);
    }
  } finally {
    rmSync(dir, {
      recursive: true,
      force: true,
    });
  }

  logStep("Restarting the stack...");
  const restart = await shell.run("cd /opt/ai-llm-basic && docker compose up -d", 300_000);
  if (restart.code !== 0) {
    throw new Error(`docker compose up failed: ${restart.stderr.trim() || `exit ${restart.code}`}`);
  }
  logInfo(`Stack restarted. Check it with: llm-quickstart status --id ${id}`);
  return 0;
}

export function cmdHelp(): void {
  const lines = [
    "",
    `${pc.bold("llm-quickstart")} -- vLLM + Open WebUI on a Linode GPU instance`,
    "",
    pc.bold("USAGE"),
    "  llm-quickstart [deploy] [--region ID] [--type ID] [--label NAME] [--model ID]",
    "                 [--set-password] [--probe ssh|http] [--non-interactive]",
    "  llm-quickstart catalog [--json]",
    "  llm-quickstart status  --id ID",
    "  llm-quickstart sync    --id ID [--model ID]",
    "  llm-quickstart cleanup --id ID [--force]",
    "",
    pc.bold("AUTHENTICATION"),
    "  LINODE_TOKEN (or LINODE_CLI_TOKEN), else the linode-cli config, else a browser login.",
    "",
    pc.bold("ENVIRONMENT"),
    "  QUICKSTART_REGION, QUICKSTART_TYPE, QUICKSTART_LABEL, QUICKSTART_MODEL, QUICKSTART_PROBE",
    "  QUICKSTART_NON_INTERACTIVE=1     never prompt",
    "  QUICKSTART_DELETE_ON_FAILURE=1   delete the instance on a fatal error (non-interactive)",
    "  QUICKSTART_RECORDS_DIR           where .instance-info-<id>.json files go (default: cwd)",
    "  QUICKSTART_LOG_DIR               run logs (default: ./logs)",
    "",
  ];
  console.log(lines.join("\n"));
}

export function describeError(err: unknown): string {
  if (err instanceof ApiError && err.status > 0) {
    return `${err.message} (HTTP ${err.status})`;
  }
  return errorMessage(err);
}

/** Top-level report: the message on stderr, the raw API body in the run log. */
export function reportError(err: unknown): void {
  logError(`Error: ${describeError(err)}`);
  if (err instanceof ApiError && err.body) {
    logDetail(`API response (HTTP ${err.status}): ${err.body}`);
  }
}
