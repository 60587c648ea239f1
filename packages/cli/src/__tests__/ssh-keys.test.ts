import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { discoverSshKeys, readPublicKey, selectAuthorizedKey } from "../shared/ssh-keys";
import { makeTempDir, removeDir, silenceStderr, stderrText } from "./test-helpers";

const ED25519 = "ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAIPlaceholderKeyMaterial op@host";
const RSA = "ssh-rsa AAAAB3NzaC1yc2EAAAADAQABPlaceholder op@host";

describe("ssh keys", () => {
  let dir: string;
  let stderr: ReturnType<typeof silenceStderr>;

  beforeEach(() => {
    dir = makeTempDir();
    stderr = silenceStderr();
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  function keyPair(name: string, publicKey: string, withPrivate = true): void {
    writeFileSync(join(dir, `${name}.pub`), `${publicKey}\n`);
    if (withPrivate) {
      writeFileSync(join(dir, name), "private\n", {
        mode: 0o600,
      });
    }
  }

  it("should read the first line of a well-formed public key", () => {
    keyPair("id_ed25519", `${ED25519}\nsecond line`);
    expect(readPublicKey(join(dir, "id_ed25519.pub"))).toBe(ED25519);
  });

  it("should reject files that are not public keys", () => {
    keyPair("notes", "hello world");
    expect(readPublicKey(join(dir, "notes.pub"))).toBeNull();
    expect(readPublicKey(join(dir, "missing.pub"))).toBeNull();
  });

  it("should list standard names first, then the rest alphabetically", () => {
    keyPair("zeta", ED25519);
    keyPair("id_rsa", RSA);
    keyPair("alpha", RSA);
    keyPair("id_ed25519", ED25519);
    keyPair("orphan", ED25519, false);
    keyPair("broken", "not a key");
    expect(discoverSshKeys(dir).map((k) => `${k.name}:${k.type}`)).toEqual([
      "id_ed25519:ssh-ed25519",
      "id_rsa:ssh-rsa",
      "alpha:ssh-rsa",
      "zeta:ssh-ed25519",
    ]);
  });

  it("should return nothing for a missing directory", () => {
    expect(discoverSshKeys(join(dir, "absent"))).toEqual([]);
  });

  it("should take the first key in automated mode", async () => {
    keyPair("id_rsa", RSA);
    keyPair("id_ed25519", ED25519);
    const key = await selectAuthorizedKey(true, dir);
    expect(key?.pair.name).toBe("id_ed25519");
    expect(key?.publicKey).toBe(ED25519);
  });

  it("should continue password-only in automated mode when no key exists", async () => {
    expect(await selectAuthorizedKey(true, dir)).toBeNull();
    expect(stderrText(stderr)).toContain("No SSH public key found; the instance will accept root password login only");
  });

  it("should use a single key without prompting", async () => {
    keyPair("work", RSA);
    const key = await selectAuthorizedKey(false, dir);
    expect(key?.pair).toEqual({
      privPath: join(dir, "work"),
      pubPath: join(dir, "work.pub"),
      name: "work",
      type: "ssh-rsa",
    });
  });
});
