/** CLI flag definitions and parsing — single source of truth for flag validation */

import { ConfigError } from "./errors";

const VALUE_FLAGS = {
  "--region": "region",
  "--type": "type",
  "--label": "label",
  "--model": "model",
  "--probe": "probe",
  "--id": "id",
} as const;

const BOOL_FLAGS = {
  "--non-interactive": "nonInteractive",
  "--force": "force",
  "--json": "json",
  "--set-password": "setPassword",
  "--help": "help",
  "-h": "help",
  "--version": "version",
  "-v": "version",
} as const;

type ValueFlagKey = (typeof VALUE_FLAGS)[keyof typeof VALUE_FLAGS];
type BoolFlagKey = (typeof BOOL_FLAGS)[keyof typeof BOOL_FLAGS];

export type ParsedFlags = Partial<Record<ValueFlagKey, string>> & Record<BoolFlagKey, boolean>;

export interface ParsedArgs {
  command: string | undefined;
  flags: ParsedFlags;
  positional: string[];
}

export const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  ...Object.keys(VALUE_FLAGS),
  ...Object.keys(BOOL_FLAGS),
]);

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

function isBoolFlag(arg: string): arg is keyof typeof BOOL_FLAGS {
  return Object.hasOwn(BOOL_FLAGS, arg);
}

function looksLikeFlag(arg: string): boolean {
  return arg.startsWith("--") || (arg.startsWith("-") && arg.length > 1 && !/^-\d/.test(arg));
}

/** Expand --flag=value into --flag value so all flag parsing works uniformly */
export function expandEqualsFlags(args: string[]): string[] {
  const result: string[] = [];
  for (const arg of args) {
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIdx = arg.indexOf("=");
      result.push(arg.slice(0, eqIdx), arg.slice(eqIdx + 1));
    } else {
      result.push(arg);
    }
  }
  return result;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = expandEqualsFlags(argv);
  const flags: ParsedFlags = {
    nonInteractive: false,
    force: false,
    json: false,
    setPassword: false,
    help: false,
    version: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined || looksLikeFlag(value)) {
        throw new ConfigError(`${arg} requires a value`);
      }
      flags[VALUE_FLAGS[arg]] = value;
      i++;
    } else if (isBoolFlag(arg)) {
      flags[BOOL_FLAGS[arg]] = true;
    } else if (looksLikeFlag(arg)) {
      const known = [...KNOWN_FLAGS].filter((f) => f.startsWith("--")).join(", ");
      throw new ConfigError(`Unknown flag: ${arg}\nKnown flags: ${known}`);
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional.shift(),
    flags,
    positional,
  };
}
