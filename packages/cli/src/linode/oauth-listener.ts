// linode/oauth-listener.ts — Local HTTP listener for the implicit-grant OAuth redirect.
//
// The access token arrives in the URL fragment, which browsers never send to a
// server. The landing page served at "/" reads location.hash and relays it back
// as a path segment: GET /token/<fragment>.

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

export interface LocalCallbackListener {
  readonly port: number;
  /** Redirect URI to register with the authorization request. */
  readonly redirectUri: string;
  /**
   * Resolves with the access token from the first valid callback, or null when
   * none arrives within `timeoutMs`. The listener is closed either way.
   */
  waitForToken(timeoutMs: number): Promise<string | null>;
  close(): Promise<void>;
}

const LANDING_HTML = `<!doctype html>
<html>
<head><meta charset="utf-8"><title>LLM Quickstart authorization</title></head>
<body style="font-family:sans-serif;text-align:center;margin-top:4em">
<p id="status">Completing sign-in...</p>
<script>
  var statusEl = document.getElementById("status");
  var fragment = window.location.hash.substring(1);
  if (!fragment) {
    statusEl.textContent = "No token in the redirect. Return to the terminal and try again.";
  } else {
    fetch("/token/" + encodeURIComponent(fragment)).then(function (r) {
      statusEl.textContent = r.ok
        ? "Authorization complete. You can close this window."
        : "Authorization failed. Return to the terminal.";
    });
  }
</script>
</body>
</html>
`;

const DONE_HTML = "<!doctype html><html><body>Authorization received.</body></html>\n";

/** Pull `access_token` out of a fragment like `access_token=abc&token_type=bearer&expires_in=7200`. */
export function extractAccessToken(fragment: string): string | null {
  const m = /(?:^|&)access_token=([^&\s]+)/.exec(fragment);
  return m ? m[1] : null;
}

function send(res: ServerResponse, status: number, body: string, onSent?: () => void): void {
  res.writeHead(status, {
    "Content-Type": "text/html; charset=utf-8",
    "Cache-Control": "no-store",
    Connection: "close",
  });
  res.end(body, onSent);
}

/**
 * Bind a listener on a free ephemeral port (port 0) on the loopback interface.
 */
export async function startCallbackListener(host = "127.0.0.1"): Promise<LocalCallbackListener> {
  let deliver: (token: string) => void = () => {};
  const received = new Promise<string>((resolve) => {
    deliver = resolve;
  });
  let delivered = false;

  const handle = (req: IncomingMessage, res: ServerResponse): void => {
    if (req.method !== "GET") {
      send(res, 405, "Method not allowed\n");
      return;
    }
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    if (path.startsWith("/token/")) {
      let fragment: string;
      try {
        fragment = decodeURIComponent(path.slice("/token/".length));
      } catch {
        send(res, 400, "Malformed callback\n");
        return;
      }
      const token = extractAccessToken(fragment);
      if (!token || delivered) {
        send(res, 400, "No access token in callback\n");
        return;
      }
      delivered = true;
      send(res, 200, DONE_HTML, () => deliver(token));
      return;
    }
    if (path === "/") {
      send(res, 200, LANDING_HTML);
      return;
    }
    send(res, 404, "Not found\n");
  };

  const server = createServer(handle);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("OAuth callback listener did not bind a TCP port");
  }
  const port = address.port;

  const close = (): Promise<void> =>
    new Promise((resolve) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.closeAllConnections();
      server.close(() => resolve());
    });

  return {
    port,
    redirectUri: `http://localhost:${port}`,
    async waitForToken(timeoutMs: number): Promise<string | null> {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<null>((resolve) => {
        timer = setTimeout(() => resolve(null), timeoutMs);
      });
      try {
        return await Promise.race([received, timeout]);
      } finally {
        clearTimeout(timer);
        await close();
      }
    },
    close,
  };
}
