import { errorMessage } from "@llm-quickstart/shared";
import { deleteInstanceRecord, type InstanceRecord } from "../shared/instance-record";
import { logError, logInfo, logStep, logWarn } from "../shared/ui";
import type { LinodeClient } from "../linode/linode";

export interface RemediationOptions {
  client: Pick<LinodeClient, "deleteInstance">;
  recordsDir: string;
  nonInteractive: boolean;
  /** Automated-mode answer to the delete question. */
  deleteOnFailure: boolean;
  logPath: string | null;
  confirm(question: string): Promise<boolean>;
}

/** Returns true when the instance was deleted. */
export async function offerDeletion(record: InstanceRecord, opts: RemediationOptions): Promise<boolean> {
  if (opts.logPath) {
    logError(`Run log: ${opts.logPath}`);
    logStep(`  tail -f ${opts.logPath}`);
  }
  logWarn(`Instance ${record.id} (${record.label}) is still running${record.ipAddress ? ` at ${record.ipAddress}` : ""}`);

  const remove = opts.nonInteractive
    ? opts.deleteOnFailure
    : await opts.confirm(`Delete the failed instance ${record.id}?`);
  if (!remove) {
    logInfo(`Left running. Delete it later with: llm-quickstart cleanup --id ${record.id}`);
    return false;
  }

  logStep(`Deleting instance ${record.id}...`);
  try {
    await opts.client.deleteInstance(record.id);
  } catch (err) {
    logError(`Delete failed: ${errorMessage(err)}`);
    logInfo(`Retry with: llm-quickstart cleanup --id ${record.id}`);
    return false;
  }
  deleteInstanceRecord(opts.recordsDir, record.id);
  logInfo(`Instance ${record.id} deleted`);
  return true;
}
