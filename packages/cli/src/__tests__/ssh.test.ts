import { describe, it, expect } from "vitest";
import { createServer } from "node:net";
import { runCaptured, tcpCheck } from "../shared/ssh";

describe("tcpCheck", () => {
  it("should report an open port", async () => {
    const server = createServer((socket) => socket.end());
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    const port = address !== null && typeof address === "object" ? address.port : 0;
    try {
      expect(await tcpCheck("127.0.0.1", port, 1_000)).toBe(true);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it("should report a closed port", async () => {
    const server = createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    const port = address !== null && typeof address === "object" ? address.port : 0;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    expect(await tcpCheck("127.0.0.1", port, 1_000)).toBe(false);
  });
});

describe("runCaptured", () => {
  it("should capture output and the exit code", async () => {
    expect(await runCaptured("sh", ["-c", "echo out; echo err >&2; exit 3"], 5_000)).toEqual({
      code: 3,
      stdout: "out\n",
      stderr: "err\n",
    });
  });

  it("should exit 124 on timeout", async () => {
    const result = await runCaptured("sh", ["-c", "sleep 5"], 50);
    expect(result.code).toBe(124);
  });

  it("should exit 127 when the binary is missing", async () => {
    const result = await runCaptured("llm-quickstart-no-such-binary", [], 1_000);
    expect(result.code).toBe(127);
  });
});
