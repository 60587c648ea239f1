#!/usr/bin/env tsx
import pc from "picocolors";
import * as v from "valibot";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseJsonWith } from "@llm-quickstart/shared";
import { cmdCatalog, cmdCleanup, cmdDeploy, cmdHelp, cmdStatus, cmdSync, reportError } from "./commands";
import { parseArgs, type ParsedFlags } from "./flags";
import { activeRunLogPath, detachRunLog } from "./shared/ui";

const PkgVersionSchema = v.object({
  version: v.string(),
});

function readVersion(): string {
  const path = fileURLToPath(new URL("../package.json", import.meta.url));
  return parseJsonWith(readFileSync(path, "utf-8"), PkgVersionSchema)?.version ?? "unknown";
}

const COMMANDS: Record<string, (flags: ParsedFlags) => Promise<number>> = {
  deploy: cmdDeploy,
  catalog: cmdCatalog,
  status: cmdStatus,
  cleanup: cmdCleanup,
  sync: cmdSync,
};

function handleError(err: unknown): number {
  reportError(err);
  const logPath = activeRunLogPath();
  if (logPath) {
    console.error(`\nDetails in ${pc.cyan(logPath)}`);
  }
  console.error(`Run ${pc.cyan("llm-quickstart help")} for usage information.`);
  return 1;
}

async function main(argv: string[]): Promise<number> {
  let command: string | undefined;
  let flags: ParsedFlags;
  try {
    ({ command, flags } = parseArgs(argv));
  } catch (err) {
    return handleError(err);
  }

  if (flags.version) {
    console.log(readVersion());
    return 0;
  }
  if (flags.help || command === "help") {
    cmdHelp();
    return 0;
  }

  const run = COMMANDS[command ?? "deploy"];
  if (!run) {
    console.error(pc.red(`Unknown command: ${pc.bold(command ?? "")}`));
    cmdHelp();
    return 1;
  }
  try {
    return await run(flags);
  } catch (err) {
    return handleError(err);
  } finally {
    detachRunLog();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(pc.red(String(err)));
    process.exitCode = 1;
  },
);
