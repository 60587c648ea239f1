import { describe, it, expect } from "vitest";
import { join } from "node:path";
import {
  API_BASE,
  DEFAULT_MODEL,
  DEFAULT_OAUTH_CLIENT_ID,
  DEFAULT_TIMINGS,
  defaultLabel,
  loadConfig,
  modelSlug,
} from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadConfig({}, {}, "/work");
    expect(config).toEqual({
      apiBase: API_BASE,
      nonInteractive: false,
      region: undefined,
      instanceType: undefined,
      label: undefined,
      model: DEFAULT_MODEL,
      probe: undefined,
      recordsDir: "/work",
      logDir: join("/work", "logs"),
      deleteOnFailure: false,
      oauthClientId: DEFAULT_OAUTH_CLIENT_ID,
      oauthTimeoutMs: 120_000,
      familyPrefix: "g2-gpu-rtx4000",
      availabilityPages: 4,
      requestTimeoutMs: 30_000,
      timings: DEFAULT_TIMINGS,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("should read the QUICKSTART_ variables", () => {
    const config = loadConfig(
      {
        QUICKSTART_NON_INTERACTIVE: "1",
        QUICKSTART_REGION: "de-fra-2",
        QUICKSTART_TYPE: "g2-gpu-rtx4000a2-s",
        QUICKSTART_LABEL: "my-llm",
        QUICKSTART_MODEL: "org/model-1",
        QUICKSTART_PROBE: "http",
        QUICKSTART_RECORDS_DIR: "/records",
        QUICKSTART_LOG_DIR: "/logs",
        QUICKSTART_DELETE_ON_FAILURE: "1",
        QUICKSTART_API_BASE: "http://127.0.0.1:9000/v4",
        UNRELATED: "ignored",
      },
      {},
      "/work",
    );
    expect(config).toMatchObject({
      nonInteractive: true,
      region: "de-fra-2",
      instanceType: "g2-gpu-rtx4000a2-s",
      label: "my-llm",
      model: "org/model-1",
      probe: "http",
      recordsDir: "/records",
      logDir: "/logs",
      deleteOnFailure: true,
      apiBase: "http://127.0.0.1:9000/v4",
    });
  });

  it("should let flags win over the environment", () => {
    const config = loadConfig(
      {
        QUICKSTART_REGION: "de-fra-2",
        QUICKSTART_PROBE: "http",
      },
      {
        region: "us-ord",
        probe: "ssh",
        nonInteractive: true,
      },
    );
    expect(config.region).toBe("us-ord");
    expect(config.probe).toBe("ssh");
    expect(config.nonInteractive).toBe(true);
  });

  it("should treat blank values as unset", () => {
    expect(
      loadConfig({
        QUICKSTART_REGION: "  ",
      }).region,
    ).toBeUndefined();
  });

  it("should reject malformed environment values", () => {
    expect(() =>
      loadConfig({
        QUICKSTART_PROBE: "telnet",
      }),
    ).toThrow(ConfigError);
    expect(() =>
      loadConfig({
        QUICKSTART_DELETE_ON_FAILURE: "yes",
      }),
    ).toThrow(/^Invalid environment:\n {2}QUICKSTART_DELETE_ON_FAILURE: /);
  });

  it("should reject invalid ids", () => {
    expect(() =>
      loadConfig(
        {},
        {
          region: "US ORD",
        },
      ),
    ).toThrow('Invalid region id: "US ORD"');
    expect(() =>
      loadConfig({
        QUICKSTART_LABEL: "a--b",
      }),
    ).toThrow('Invalid label: "a--b"');
    expect(() =>
      loadConfig(
        {},
        {
          probe: "ftp",
        },
      ),
    ).toThrow('--probe must be "ssh" or "http", got "ftp"');
  });
});

describe("labels", () => {
  it("should shorten the model to its family name", () => {
    expect(modelSlug("mistralai/Mistral-7B-Instruct-v0.3")).toBe("mistral");
    expect(modelSlug("meta-llama/Llama-3.1-8B-Instruct")).toBe("llama");
    expect(modelSlug("/")).toBe("llm");
  });

  it("should stamp the default label with local time", () => {
    expect(defaultLabel("mistralai/Mistral-7B-Instruct-v0.3", new Date(2026, 0, 5, 9, 7))).toBe(
      "ai-quickstart-mistral-2601050907",
    );
  });
});
