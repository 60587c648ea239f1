import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { askRootPassword, cmdCatalog, cmdCleanup, cmdStatus, describeError, reportError, selectTarget } from "../commands";
import { loadConfig } from "../config";
import { ApiError, ConfigError } from "../errors";
import { parseArgs } from "../flags";
import { buildCatalog } from "../linode/catalog";
import { readInstanceRecord, writeInstanceRecord } from "../shared/instance-record";
import { RunLog } from "../shared/run-log";
import { attachRunLog, detachRunLog } from "../shared/ui";
import { avail, gpuType, instance, jsonResponse, makeTempDir, record, region, removeDir, silenceStderr } from "./test-helpers";

const API = "http://api.test/v4";
const MODEL = "mistralai/Mistral-7B-Instruct-v0.3";

type Route = (url: string, method: string) => Response | undefined;

function stubApi(...routes: Route[]) {
  const fetchMock = vi.fn(async (url: string, init?: RequestInit) => {
    const method = init?.method ?? "GET";
    if (url === `${API}/profile`) {
      return jsonResponse({
        username: "operator",
      });
    }
    for (const route of routes) {
      const resp = route(url, method);
      if (resp) {
        return resp;
      }
    }
    return new Response('{"errors":[{"reason":"Not found"}]}', {
      status: 404,
    });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function calls(fetchMock: ReturnType<typeof stubApi>): string[] {
  return fetchMock.mock.calls.map(([url, init]) => `${init?.method ?? "GET"} ${url}`);
}

describe("commands", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    silenceStderr();
    vi.stubEnv("HOME", dir);
    vi.stubEnv("LINODE_TOKEN", "test-token");
    vi.stubEnv("QUICKSTART_API_BASE", API);
    vi.stubEnv("QUICKSTART_RECORDS_DIR", dir);
    vi.stubEnv("QUICKSTART_LOG_DIR", `${dir}/logs`);
    vi.stubEnv("QUICKSTART_NON_INTERACTIVE", "0");
  });

  afterEach(() => {
    detachRunLog();
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    removeDir(dir);
  });

  describe("cleanup", () => {
    it("should delete the instance and its record with --force", async () => {
      writeInstanceRecord(dir, record());
      const fetchMock = stubApi((url, method) =>
        url === `${API}/linode/instances/4242`
          ? method === "DELETE"
            ? jsonResponse({})
            : jsonResponse(
                instance({
                  status: "running",
                }),
              )
          : undefined,
      );
      expect(await cmdCleanup(parseArgs(["cleanup", "--id", "4242", "--force"]).flags)).toBe(0);
      expect(calls(fetchMock)).toEqual([
        `GET ${API}/profile`,
        `GET ${API}/linode/instances/4242`,
        `DELETE ${API}/linode/instances/4242`,
      ]);
      expect(readInstanceRecord(dir, 4242)).toBeNull();
    });

    it("should only remove the record when the instance is already gone", async () => {
      writeInstanceRecord(dir, record());
      const fetchMock = stubApi();
      expect(await cmdCleanup(parseArgs(["cleanup", "--id", "4242"]).flags)).toBe(0);
      expect(calls(fetchMock)).not.toContain(`DELETE ${API}/linode/instances/4242`);
      expect(readInstanceRecord(dir, 4242)).toBeNull();
    });

    it("should refuse to delete without --force in non-interactive mode", async () => {
      stubApi((url) => (url === `${API}/linode/instances/4242` ? jsonResponse(instance()) : undefined));
      await expect(cmdCleanup(parseArgs(["cleanup", "--id", "4242", "--non-interactive"]).flags)).rejects.toThrow(
        "cleanup in non-interactive mode needs --force",
      );
    });

    it("should require a valid id", async () => {
      await expect(cmdCleanup(parseArgs(["cleanup"]).flags)).rejects.toThrow("cleanup needs --id <instance id>");
      await expect(cmdCleanup(parseArgs(["cleanup", "--id", "abc"]).flags)).rejects.toThrow(
        '--id must be a positive integer, got "abc"',
      );
    });
  });

  describe("status", () => {
    function serviceRoutes(listing: string): Route {
      return (url) => {
        if (url === `${API}/linode/instances/4242`) {
          return jsonResponse(
            instance({
              status: "running",
            }),
          );
        }
        if (url === "http://203.0.113.10:3000/health") {
          return new Response("true");
        }
        if (url === "http://203.0.113.10:8000/v1/models") {
          return new Response(listing);
        }
        return undefined;
      };
    }

    it("should exit 0 when both services answer", async () => {
      writeInstanceRecord(dir, record());
      stubApi(
        serviceRoutes(
          JSON.stringify({
            data: [
              {
                id: MODEL,
              },
            ],
          }),
        ),
      );
      expect(await cmdStatus(parseArgs(["status", "--id", "4242"]).flags)).toBe(0);
    });

    it("should exit 1 while the model is still loading", async () => {
      writeInstanceRecord(dir, record());
      stubApi(serviceRoutes('{"data":[]}'));
      expect(await cmdStatus(parseArgs(["status", "--id", "4242"]).flags)).toBe(1);
    });

    it("should fail without a record", async () => {
      stubApi();
      await expect(cmdStatus(parseArgs(["status", "--id", "7"]).flags)).rejects.toThrow(
        `No readable record for instance 7 in ${dir}`,
      );
    });
  });

  describe("catalog", () => {
    it("should print the catalog as JSON", async () => {
      stubApi((url) => {
        if (url.startsWith(`${API}/regions/availability`)) {
          return jsonResponse({
            data: [avail("us-ord", "g2-gpu-rtx4000a1-s")],
            page: 1,
            pages: 1,
          });
        }
        if (url === `${API}/linode/types`) {
          return jsonResponse({
            data: [gpuType("g2-gpu-rtx4000a1-s"), gpuType("g6-standard-2")],
          });
        }
        if (url === `${API}/regions`) {
          return jsonResponse({
            data: [region("us-ord", "Chicago")],
          });
        }
        return undefined;
      });
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      expect(await cmdCatalog(parseArgs(["catalog", "--json"]).flags)).toBe(0);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
        instance_types: [
          {
            id: "g2-gpu-rtx4000a1-s",
            gpuCount: 1,
          },
        ],
        regions: [
          {
            id: "us-ord",
            label: "Chicago",
            available_instance_type_ids: ["g2-gpu-rtx4000a1-s"],
          },
        ],
      });
    });
  });
});

describe("selectTarget", () => {
  const catalog = buildCatalog(
    [avail("us-ord", "g2-gpu-rtx4000a1-s")],
    [gpuType("g2-gpu-rtx4000a1-s")],
    [region("us-ord")],
    "g2-gpu-rtx4000",
  );

  beforeEach(() => {
    silenceStderr();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should use configured ids without prompting", async () => {
    const config = loadConfig(
      {},
      {
        region: "de-fra-2",
        type: "g2-gpu-rtx4000a2-s",
      },
    );
    expect(await selectTarget(catalog, config)).toEqual({
      regionId: "de-fra-2",
      instanceTypeId: "g2-gpu-rtx4000a2-s",
    });
  });

  it("should take the only offered region and type", async () => {
    expect(await selectTarget(catalog, loadConfig({}))).toEqual({
      regionId: "us-ord",
      instanceTypeId: "g2-gpu-rtx4000a1-s",
    });
  });
});

describe("askRootPassword", () => {
  it("should generate unless --set-password is given", async () => {
    expect(await askRootPassword(parseArgs([]).flags, loadConfig({}))).toBeUndefined();
  });

  it("should refuse to prompt in non-interactive mode", async () => {
    await expect(
      askRootPassword(
        parseArgs(["--set-password"]).flags,
        loadConfig({
          QUICKSTART_NON_INTERACTIVE: "1",
        }),
      ),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("describeError", () => {
  it("should add the HTTP status to API errors", () => {
    expect(describeError(new ApiError(400, "", "POST /linode/instances: Bad label"))).toBe(
      "POST /linode/instances: Bad label (HTTP 400)",
    );
    expect(describeError(new ApiError(0, "", "Region x has no available GPU plans"))).toBe(
      "Region x has no available GPU plans",
    );
    expect(describeError("plain")).toBe("plain");
  });
});

describe("reportError", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    silenceStderr();
  });

  afterEach(() => {
    detachRunLog();
    removeDir(dir);
    vi.restoreAllMocks();
  });

  it("should write the raw API body to the run log", () => {
    const log = RunLog.create(dir);
    attachRunLog(log);
    reportError(new ApiError(503, '{"errors":[{"reason":"Service unavailable"}]}', "GET /regions failed with 503"));
    expect(log.entries().slice(1).map((e) => [e.level, e.message])).toEqual([
      ["error", "Error: GET /regions failed with 503 (HTTP 503)"],
      ["info", 'API response (HTTP 503): {"errors":[{"reason":"Service unavailable"}]}'],
    ]);
  });
});
