// shared/ssh-keys.ts — Public key discovery, selection, and generation

import { existsSync, mkdirSync, readdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { spawnSync } from "node:child_process";
import { confirm, logInfo, logStep, logWarn, selectFromList } from "./ui";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface SshKeyPair {
  privPath: string;
  pubPath: string;
  /** Base name, e.g. "id_ed25519" or "work_key" */
  name: string;
  /** Algorithm token from the public key, e.g. "ssh-ed25519" */
  type: string;
}

export interface AuthorizedKey {
  pair: SshKeyPair;
  /** Single-line public key as it goes into authorized_keys */
  publicKey: string;
}

const PREFERRED = ["id_ed25519", "id_ecdsa", "id_rsa"];

export function sshDir(): string {
  return join(process.env.HOME || homedir(), ".ssh");
}

// ─── Key Discovery ──────────────────────────────────────────────────────────

/** Read a public key file; null unless it looks like `<type> <base64> [comment]`. */
export function readPublicKey(pubPath: string): string | null {
  let text: string;
  try {
    text = readFileSync(pubPath, "utf-8").trim();
  } catch {
    return null;
  }
  const line = text.split("\n")[0] ?? "";
  return /^(ssh-|ecdsa-|sk-)[a-z0-9@.-]+ [A-Za-z0-9+/=]+/.test(line) ? line : null;
}

/**
 * Scan ~/.ssh/ for public keys that have a private half.
 * Standard names (ed25519, ecdsa, rsa) come first, the rest alphabetically.
 */
export function discoverSshKeys(dir = sshDir()): SshKeyPair[] {
  if (!existsSync(dir)) {
    return [];
  }

  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch {
    return [];
  }

  const pairs: SshKeyPair[] = [];
  for (const pubFile of entries.filter((f) => f.endsWith(".pub"))) {
    const name = pubFile.slice(0, -4);
    const pubPath = join(dir, pubFile);
    const privPath = join(dir, name);
    const publicKey = readPublicKey(pubPath);
    if (!publicKey || !existsSync(privPath)) {
      continue;
    }
    pairs.push({
      privPath,
      pubPath,
      name,
      type: publicKey.split(" ")[0],
    });
  }

  const rank = (name: string) => {
    const i = PREFERRED.indexOf(name);
    return i === -1 ? PREFERRED.length : i;
  };
  return pairs.sort((a, b) => rank(a.name) - rank(b.name) || a.name.localeCompare(b.name));
}

// ─── Key Generation ─────────────────────────────────────────────────────────

/** Generate a new ed25519 key at ~/.ssh/id_ed25519. */
export function generateSshKey(dir = sshDir()): SshKeyPair {
  const privPath = join(dir, "id_ed25519");
  const pubPath = `${privPath}.pub`;

  mkdirSync(dir, {
    recursive: true,
    mode: 0o700,
  });

  logStep("Generating SSH key...");
  const result = spawnSync("ssh-keygen", ["-t", "ed25519", "-f", privPath, "-N", "", "-C", "llm-quickstart"], {
    stdio: ["ignore", "pipe", "pipe"],
    encoding: "utf-8",
  });
  if (result.error || result.status !== 0) {
    throw new Error(`SSH key generation failed: ${result.error?.message ?? result.stderr.trim()}`);
  }
  logInfo(`SSH key generated at ${privPath}`);

  return {
    privPath,
    pubPath,
    name: "id_ed25519",
    type: "ssh-ed25519",
  };
}

// ─── Selection ──────────────────────────────────────────────────────────────

function toAuthorized(pair: SshKeyPair): AuthorizedKey | null {
  const publicKey = readPublicKey(pair.pubPath);
  return publicKey
    ? {
        pair,
        publicKey,
      }
    : null;
}

/**
 * Pick the key to install on the instance.
 *
 * - 0 keys: interactive offers to generate one; automated continues password-only (null)
 * - 1 key: used silently
 * - 2+ keys: interactive select; automated takes the first
 */
export async function selectAuthorizedKey(nonInteractive: boolean, dir = sshDir()): Promise<AuthorizedKey | null> {
  const discovered = discoverSshKeys(dir);

  if (discovered.length === 0) {
    if (nonInteractive) {
      logWarn("No SSH public key found; the instance will accept root password login only");
      return null;
    }
    if (!(await confirm(`No SSH key found in ${dir}. Generate an ed25519 key now?`))) {
      logWarn("Continuing without an SSH key; remote checks will be limited");
      return null;
    }
    return toAuthorized(generateSshKey(dir));
  }

  if (discovered.length === 1 || nonInteractive) {
    const key = discovered[0];
    logInfo(`Using SSH key: ${key.name} (${key.type})`);
    return toAuthorized(key);
  }

  const chosen = await selectFromList(
    discovered.map((k) => ({
      id: k.name,
      hint: `${k.type} ${k.pubPath}`,
    })),
    "SSH key",
    discovered[0].name,
  );
  const pair = discovered.find((k) => k.name === chosen) ?? discovered[0];
  logInfo(`Using SSH key: ${pair.name} (${pair.type})`);
  return toAuthorized(pair);
}
