import { describe, it, expect, afterEach } from "vitest";
import { extractAccessToken, type LocalCallbackListener, startCallbackListener } from "../linode/oauth-listener";

describe("extractAccessToken", () => {
  it("should read access_token from anywhere in the fragment", () => {
    expect(extractAccessToken("access_token=tok-1&token_type=bearer&expires_in=7200")).toBe("tok-1");
    expect(extractAccessToken("token_type=bearer&access_token=tok-2")).toBe("tok-2");
  });

  it("should not match a key that only ends in access_token", () => {
    expect(extractAccessToken("xaccess_token=nope")).toBeNull();
    expect(extractAccessToken("")).toBeNull();
  });
});

describe("startCallbackListener", () => {
  let listener: LocalCallbackListener | null = null;

  afterEach(async () => {
    await listener?.close();
    listener = null;
  });

  it("should bind an ephemeral port and advertise a localhost redirect", async () => {
    listener = await startCallbackListener();
    expect(listener.port).toBeGreaterThan(0);
    expect(listener.redirectUri).toBe(`http://localhost:${listener.port}`);
  });

  it("should serve the landing page that relays the fragment", async () => {
    listener = await startCallbackListener();
    const resp = await fetch(`http://127.0.0.1:${listener.port}/`);
    expect(resp.status).toBe(200);
    expect(await resp.text()).toContain('fetch("/token/" + encodeURIComponent(fragment))');
  });

  it("should keep the landing script's globals clear of window.status", async () => {
    listener = await startCallbackListener();
    const html = await (await fetch(`http://127.0.0.1:${listener.port}/`)).text();
    const declared = [...html.matchAll(/\bvar (\w+)/g)].map((m) => m[1]);
    expect(declared).toEqual(["statusEl", "fragment"]);
  });

  it("should deliver the token from the relayed fragment and close", async () => {
    listener = await startCallbackListener();
    const waiting = listener.waitForToken(5_000);
    const fragment = encodeURIComponent("access_token=test-token&token_type=bearer");
    const resp = await fetch(`http://127.0.0.1:${listener.port}/token/${fragment}`);
    expect(resp.status).toBe(200);
    await resp.text();
    expect(await waiting).toBe("test-token");
    await expect(fetch(`http://127.0.0.1:${listener.port}/`)).rejects.toThrow();
  });

  it("should reject callbacks without a token", async () => {
    listener = await startCallbackListener();
    const resp = await fetch(`http://127.0.0.1:${listener.port}/token/${encodeURIComponent("error=access_denied")}`);
    expect(resp.status).toBe(400);
  });

  it("should answer 404 for other paths and 405 for other methods", async () => {
    listener = await startCallbackListener();
    const base = `http://127.0.0.1:${listener.port}`;
    expect((await fetch(`${base}/favicon.ico`)).status).toBe(404);
    expect(
      (
        await fetch(`${base}/`, {
          method: "POST",
        })
      ).status,
    ).toBe(405);
  });

  it("should resolve null when no callback arrives in time", async () => {
    listener = await startCallbackListener();
    expect(await listener.waitForToken(50)).toBeNull();
  });
});
