import http from "node:http";
import type { Socket } from "node:net";
import open from "open";
import { info, warn } from "../utils/log.js";
import { AuthorizationError } from "./errors.js";

/**
 * Shows the authorization page to the user and hands back the URL the
 * provider redirected to. Implementations must reject with an
 * {@link AuthorizationError} of reason `cancelled` when the user gives up.
 */
export interface BrowserPresenter {
  present(authorizationUrl: URL, redirectUri: string): Promise<string>;
}

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

type CallbackServer = {
  callbackPromise: Promise<string>;
  close: () => Promise<void>;
};

function parseLoopbackRedirect(redirectUri: string) {
  const redirectUrl = new URL(redirectUri);
  if (redirectUrl.protocol !== "http:") {
    throw new Error(`Invalid redirect URI protocol: ${redirectUri}`);
  }
  const port = Number(redirectUrl.port);
  if (!port || Number.isNaN(port)) {
    throw new Error(
      `Redirect URI must include an explicit port (e.g. http://127.0.0.1:3334/oauth/callback), got: ${redirectUri}`
    );
  }
  return { redirectUrl, port };
}

export async function startCallbackServer(
  redirectUri: string
): Promise<CallbackServer> {
  const { redirectUrl, port } = parseLoopbackRedirect(redirectUri);
  const server = http.createServer();
  let closed = false;
  const sockets = new Set<Socket>();
  server.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });
  const close = () =>
    new Promise<void>((resolve) => {
      if (closed) {
        resolve();
        return;
      }
      closed = true;
      for (const socket of sockets) {
        socket.destroy();
      }
      server.close(() => resolve());
    });

  const callbackPromise = new Promise<string>((resolve) => {
    server.on("request", (req, res) => {
      const url = new URL(req.url ?? "", redirectUri);
      if (url.pathname !== redirectUrl.pathname) {
        res.writeHead(404);
        res.end("Not found");
        return;
      }
      const failed = url.searchParams.has("error");
      res.writeHead(failed ? 400 : 200, {
        "content-type": "text/plain",
        connection: "close",
      });
      res.end(
        failed
          ? "Authorization failed. You can return to the terminal."
          : "Authorization complete. You can return to the terminal."
      );
      resolve(url.toString());
    });
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(port, redirectUrl.hostname, () => {
      server.off("error", onError);
      resolve();
    });
  }).catch((err: unknown) => {
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      throw new Error(
        `OAuth callback port ${port} is already in use (redirect URI: ${redirectUri}). Close the other process using it and retry.`
      );
    }
    throw err;
  });

  return { callbackPromise, close };
}

/** Opens the system browser and captures the redirect on a loopback listener. */
export class LoopbackBrowserPresenter implements BrowserPresenter {
  private readonly timeoutMs: number;

  constructor(options?: { timeoutMs?: number }) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async present(authorizationUrl: URL, redirectUri: string) {
    const { callbackPromise, close } = await startCallbackServer(redirectUri);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new AuthorizationError(
            "cancelled",
            `no callback received within ${Math.round(this.timeoutMs / 1000)}s`
          )
        );
      }, this.timeoutMs);
    });
    try {
      info("Open the following URL in your browser to authorize:");
      info(authorizationUrl.toString());
      try {
        await open(authorizationUrl.toString());
      } catch (err) {
        warn(`Failed to open browser automatically: ${String(err)}`);
      }
      return await Promise.race([callbackPromise, timeout]);
    } finally {
      clearTimeout(timer);
      await close();
    }
  }
}
