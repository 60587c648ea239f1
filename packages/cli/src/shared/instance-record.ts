// shared/instance-record.ts — Per-instance record file, the source of truth after provisioning

import * as v from "valibot";
import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parseJsonWith } from "@llm-quickstart/shared";

const InstanceRecordSchema = v.object({
  instance_id: v.pipe(v.number(), v.integer(), v.minValue(1)),
  instance_ip: v.string(),
  instance_type: v.string(),
  region: v.string(),
  label: v.string(),
  root_password: v.string(),
  created_at: v.pipe(v.string(), v.isoTimestamp()),
});

type InstanceRecordFile = v.InferOutput<typeof InstanceRecordSchema>;

export interface InstanceRecord {
  readonly id: number;
  /** Empty until the control plane reports an address. */
  readonly ipAddress: string;
  readonly instanceTypeId: string;
  readonly regionId: string;
  readonly label: string;
  readonly rootPassword: string;
  /** ISO-8601 */
  readonly createdAt: string;
}

export function recordFileName(id: number): string {
  return `.instance-info-${id}.json`;
}

export function recordPath(dir: string, id: number): string {
  return join(dir, recordFileName(id));
}

function toFile(record: InstanceRecord): InstanceRecordFile {
  return {
    instance_id: record.id,
    instance_ip: record.ipAddress,
    instance_type: record.instanceTypeId,
    region: record.regionId,
    label: record.label,
    root_password: record.rootPassword,
    created_at: record.createdAt,
  };
}

function fromFile(file: InstanceRecordFile): InstanceRecord {
  return Object.freeze({
    id: file.instance_id,
    ipAddress: file.instance_ip,
    instanceTypeId: file.instance_type,
    regionId: file.region,
    label: file.label,
    rootPassword: file.root_password,
    createdAt: file.created_at,
  });
}

/** Write (mode 0600, it holds the root password) and return the path. */
export function writeInstanceRecord(dir: string, record: InstanceRecord): string {
  mkdirSync(dir, {
    recursive: true,
  });
  const path = recordPath(dir, record.id);
  writeFileSync(path, `${JSON.stringify(toFile(record), null, 2)}\n`, {
    mode: 0o600,
  });
  return path;
}

/** Null when the file is missing or fails validation. */
export function readInstanceRecord(dir: string, id: number): InstanceRecord | null {
  const path = recordPath(dir, id);
  if (!existsSync(path)) {
    return null;
  }
  const file = parseJsonWith(readFileSync(path, "utf-8"), InstanceRecordSchema);
  return file ? fromFile(file) : null;
}

export function deleteInstanceRecord(dir: string, id: number): boolean {
  const path = recordPath(dir, id);
  if (!existsSync(path)) {
    return false;
  }
  unlinkSync(path);
  return true;
}

/** All readable records in `dir`, newest first. */
export function listInstanceRecords(dir: string): InstanceRecord[] {
  if (!existsSync(dir)) {
    return [];
  }
  return readdirSync(dir)
    .map((name) => /^\.instance-info-(\d+)\.json$/.exec(name))
    .filter((m): m is RegExpExecArray => m !== null)
    .map((m) => readInstanceRecord(dir, Number(m[1])))
    .filter((r): r is InstanceRecord => r !== null)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export function withIpAddress(record: InstanceRecord, ipAddress: string): InstanceRecord {
  return Object.freeze({
    ...record,
    ipAddress,
  });
}
