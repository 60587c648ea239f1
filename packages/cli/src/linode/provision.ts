// linode/provision.ts — Instance creation: validate, build the request, submit once, persist

import { DEFAULT_IMAGE, defaultLabel } from "../config";
import { errorMessage } from "@llm-quickstart/shared";
import { ApiError, RecordWriteError } from "../errors";
import { buildUserData, type PayloadTemplates } from "../shared/cloud-init";
import { type InstanceRecord, writeInstanceRecord } from "../shared/instance-record";
import { DEFAULT_PASSWORD_POLICY, generatePassword, type RandomSource, cryptoRandom, validatePassword } from "../shared/password";
import type { AuthorizedKey } from "../shared/ssh-keys";
import { logInfo, logStep, logWarn } from "../shared/ui";
import type { AvailabilityCatalog } from "./catalog";
import type { CreateInstanceBody, LinodeClient } from "./linode";

export interface ProvisioningRequest {
  label: string;
  regionId: string;
  instanceTypeId: string;
  imageId: string;
  rootPassword: string;
  authorizedKey: string | undefined;
  /** Base64 cloud-init document */
  userData: string;
}

export interface ProvisionOptions {
  regionId: string;
  instanceTypeId: string;
  label?: string;
  model: string;
  imageId?: string;
  /** Operator-chosen password; generated when absent. */
  rootPassword?: string;
  authorizedKey: AuthorizedKey | null;
  templates: PayloadTemplates;
  recordsDir: string;
  now?: () => Date;
  random?: RandomSource;
}

export interface ProvisionResult {
  record: InstanceRecord;
  recordPath: string;
}

type InstanceCreator = Pick<LinodeClient, "createInstance">;

function rejectSelection(message: string): never {
  throw new ApiError(0, JSON.stringify({ errors: [{ reason: message }] }), message);
}

/** Region and type must both be in the catalog, and the type offered in that region. */
export function assertSelectable(catalog: AvailabilityCatalog, regionId: string, instanceTypeId: string): void {
  const region = catalog.regions.find((r) => r.id === regionId);
  if (!region) {
    rejectSelection(`Region ${regionId} has no available GPU plans`);
  }
  if (!catalog.instanceTypes.some((t) => t.id === instanceTypeId)) {
    rejectSelection(`Unknown instance type ${instanceTypeId}`);
  }
  if (!region.availableInstanceTypeIds.has(instanceTypeId)) {
    rejectSelection(`Instance type ${instanceTypeId} is not available in ${regionId}`);
  }
}

export function buildProvisioningRequest(opts: ProvisionOptions, now: Date): ProvisioningRequest {
  const label = opts.label ?? defaultLabel(opts.model, now);
  let rootPassword: string;
  if (opts.rootPassword !== undefined) {
    validatePassword(opts.rootPassword, DEFAULT_PASSWORD_POLICY);
    rootPassword = opts.rootPassword;
  } else {
    rootPassword = generatePassword(DEFAULT_PASSWORD_POLICY, opts.random ?? cryptoRandom);
  }
  return {
    label,
    regionId: opts.regionId,
    instanceTypeId: opts.instanceTypeId,
    imageId: opts.imageId ?? DEFAULT_IMAGE,
    rootPassword,
    authorizedKey: opts.authorizedKey?.publicKey,
    userData: buildUserData(opts.templates, label, opts.model),
  };
}

export function toCreateBody(req: ProvisioningRequest): CreateInstanceBody {
  const body: CreateInstanceBody = {
    label: req.label,
    region: req.regionId,
    type: req.instanceTypeId,
    image: req.imageId,
    root_pass: req.rootPassword,
    metadata: {
      user_data: req.userData,
    },
    booted: true,
    backups_enabled: false,
    private_ip: false,
  };
  if (req.authorizedKey) {
    body.authorized_keys = [req.authorizedKey];
  }
  return body;
}

/**
 * Create the instance and write its record before returning.
 * The create call is made exactly once: a retry could bill a second instance.
 * A failed record write raises RecordWriteError, which carries the record.
 */
export async function provision(
  client: InstanceCreator,
  catalog: AvailabilityCatalog,
  opts: ProvisionOptions,
): Promise<ProvisionResult> {
  assertSelectable(catalog, opts.regionId, opts.instanceTypeId);
  const now = (opts.now ?? (() => new Date()))();
  const req = buildProvisioningRequest(opts, now);

  logStep(`Creating ${req.instanceTypeId} instance "${req.label}" in ${req.regionId}...`);
  const created = await client.createInstance(toCreateBody(req));

  const ip = created.ipv4[0] ?? "";
  logInfo(`Instance ${created.id} created${ip ? ` at ${ip}` : ""}`);
  if (!ip) {
    logWarn("Create response had no IPv4 address; it will be read from the instance status");
  }

  const record: InstanceRecord = Object.freeze({
    id: created.id,
    ipAddress: ip,
    instanceTypeId: req.instanceTypeId,
    regionId: req.regionId,
    label: req.label,
    rootPassword: req.rootPassword,
    createdAt: now.toISOString(),
  });
  let recordPath: string;
  try {
    recordPath = writeInstanceRecord(opts.recordsDir, record);
  } catch (err) {
    throw new RecordWriteError(record, opts.recordsDir, errorMessage(err));
  }
  logInfo(`Record saved to ${recordPath}`);

  return {
    record,
    recordPath,
  };
}
