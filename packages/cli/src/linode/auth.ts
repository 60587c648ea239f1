// linode/auth.ts — Credential resolution: env token → linode-cli config → browser OAuth

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { errorMessage } from "@llm-quickstart/shared";
import { OAUTH_AUTHORIZE_URL } from "../config";
import { AuthError } from "../errors";
import { logInfo, logStep, logWarn, openBrowser } from "../shared/ui";
import { LinodeClient } from "./linode";
import { type LocalCallbackListener, startCallbackListener } from "./oauth-listener";

export type CredentialSource = "environment" | "configured" | "oauth";

/** Lives for the process lifetime; never written to disk by this tool. */
export interface Credential {
  readonly value: string;
  readonly source: CredentialSource;
  readonly validatedIdentity: string;
}

// ─── linode-cli config ──────────────────────────────────────────────────────

export type IniSections = Record<string, Record<string, string>>;

/** Minimal INI reader: `[section]` headers, `key = value` pairs, `#`/`;` comments. */
export function parseIni(text: string): IniSections {
  const sections: IniSections = {};
  let current = "";
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) {
      continue;
    }
    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      current = header[1].trim();
      sections[current] ??= {};
      continue;
    }
    const eq = line.search(/[=:]/);
    if (eq <= 0) {
      continue;
    }
    const section = (sections[current] ??= {});
    section[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return sections;
}

/** Candidate config locations in lookup order. */
export function linodeCliConfigPaths(env: NodeJS.ProcessEnv): string[] {
  const home = env.HOME || homedir();
  const paths: string[] = [];
  if (env.LINODE_CLI_CONFIG) {
    paths.push(env.LINODE_CLI_CONFIG);
  }
  paths.push(join(home, ".linode-cli"));
  paths.push(join(env.XDG_CONFIG_HOME || join(home, ".config"), "linode-cli"));
  return paths;
}

/** Token of the `[DEFAULT] default-user` profile in the first config file found. */
export function readCliConfigToken(env: NodeJS.ProcessEnv): { token: string; user: string; path: string } | null {
  const path = linodeCliConfigPaths(env).find((p) => existsSync(p));
  if (!path) {
    return null;
  }
  const ini = parseIni(readFileSync(path, "utf-8"));
  const user = ini.DEFAULT?.["default-user"];
  if (!user) {
    return null;
  }
  const token = ini[user]?.token;
  return token
    ? {
        token,
        user,
        path,
      }
    : null;
}

// ─── OAuth ──────────────────────────────────────────────────────────────────

export function buildAuthorizeUrl(clientId: string, redirectUri: string): string {
  const params = new URLSearchParams({
    client_id: clientId,
    response_type: "token",
    scopes: "*",
    redirect_uri: redirectUri,
  });
  return `${OAUTH_AUTHORIZE_URL}?${params.toString()}`;
}

// ─── Provider ───────────────────────────────────────────────────────────────

export interface CredentialProviderOptions {
  env: NodeJS.ProcessEnv;
  apiBase: string;
  requestTimeoutMs: number;
  oauthClientId: string;
  oauthTimeoutMs: number;
  nonInteractive: boolean;
  /** Returns the account username, or null when the token is rejected. */
  validateToken?: (token: string) => Promise<string | null>;
  startListener?: () => Promise<LocalCallbackListener>;
  openBrowser?: (url: string) => void;
}

export class CredentialProvider {
  private readonly validate: (token: string) => Promise<string | null>;
  private readonly listen: () => Promise<LocalCallbackListener>;
  private readonly browse: (url: string) => void;

  constructor(private readonly opts: CredentialProviderOptions) {
    this.validate = opts.validateToken ?? ((token) => this.checkProfile(token));
    this.listen = opts.startListener ?? (() => startCallbackListener());
    this.browse = opts.openBrowser ?? openBrowser;
  }

  private async checkProfile(token: string): Promise<string | null> {
    const client = new LinodeClient(token, {
      apiBase: this.opts.apiBase,
      timeoutMs: this.opts.requestTimeoutMs,
    });
    try {
      const profile = await client.getProfile();
      return profile.username;
    } catch (err) {
      logWarn(`Token check failed: ${errorMessage(err)}`);
      return null;
    }
  }

  async acquire(): Promise<Credential> {
    const { env } = this.opts;

    const envToken = env.LINODE_TOKEN || env.LINODE_CLI_TOKEN;
    if (envToken) {
      const identity = await this.validate(envToken);
      if (identity) {
        logInfo(`Using API token from environment (${identity})`);
        return credential(envToken, "environment", identity);
      }
      logWarn("API token from the environment was rejected; trying other sources");
    }

    const configured = readCliConfigToken(env);
    if (configured) {
      const identity = await this.validate(configured.token);
      if (identity) {
        logInfo(`Using linode-cli token for ${configured.user} (${configured.path})`);
        return credential(configured.token, "configured", identity);
      }
      logWarn(`Token for ${configured.user} in ${configured.path} was rejected`);
    }

    return this.oauth();
  }

  private async oauth(): Promise<Credential> {
    logStep("Authorizing with your Linode account in the browser...");
    let listener: LocalCallbackListener;
    try {
      listener = await this.listen();
    } catch (err) {
      throw new AuthError("no-credential", `Could not start the OAuth callback listener: ${errorMessage(err)}`);
    }

    const url = buildAuthorizeUrl(this.opts.oauthClientId, listener.redirectUri);
    if (this.opts.nonInteractive) {
      logStep(`Open this URL to authorize: ${url}`);
    } else {
      this.browse(url);
    }

    const seconds = Math.round(this.opts.oauthTimeoutMs / 1000);
    logStep(`Waiting up to ${seconds}s for the authorization callback on port ${listener.port}...`);
    const token = await listener.waitForToken(this.opts.oauthTimeoutMs);
    if (token === null) {
      throw new AuthError("timeout", `No OAuth callback received within ${seconds}s`);
    }

    const identity = await this.validate(token);
    if (!identity) {
      throw new AuthError("invalid", "The token returned by the OAuth flow was rejected by the API");
    }
    logInfo(`Authorized as ${identity}`);
    return credential(token, "oauth", identity);
  }
}

function credential(value: string, source: CredentialSource, validatedIdentity: string): Credential {
  return Object.freeze({
    value,
    source,
    validatedIdentity,
  });
}
