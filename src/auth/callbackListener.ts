/**
 * Local OAuth callback listener
 *
 * Binds http://localhost:{port}/callback for exactly one authorization
 * redirect, checks its state against the session and hands the code back.
 *
 *   idle → listening → captured | timed_out | rejected → closed
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { timingSafeEqual } from "node:crypto";
import { AuthenticationError, CallbackTimeoutError, PortConflictError } from "../errors.js";

export const CALLBACK_PATH = "/callback";
const DEFAULT_PROGRESS_INTERVAL_MS = 15_000;

export type ListenerPhase = "idle" | "listening" | "captured" | "timed_out" | "rejected" | "closed";

export type CallbackListenerOptions = {
  port: number;
  expectedState: string;
  timeoutMs: number;
  /** Extra attempts allowed after a callback with a missing or wrong state. 0 makes a mismatch terminal. */
  stateMismatchRetries?: number;
  host?: string;
  onWaiting?: (remainingMs: number) => void;
  progressIntervalMs?: number;
};

export interface CallbackListener {
  readonly port: number;
  readonly redirectUri: string;
  phase(): ListenerPhase;
  waitForCode(): Promise<string>;
  close(): Promise<void>;
}

type Settled = { ok: true; code: string } | { ok: false; error: Error };

export async function startCallbackListener(options: CallbackListenerOptions): Promise<CallbackListener> {
  if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
    throw new RangeError(`Callback timeout must be a positive, finite number of ms (got ${options.timeoutMs})`);
  }

  const host = options.host ?? "localhost";
  let phase: ListenerPhase = "idle";
  let settled: Settled | null = null;
  let retriesLeft = Math.max(0, options.stateMismatchRetries ?? 0);
  let closing: Promise<void> | null = null;
  let timeoutTimer: NodeJS.Timeout | undefined;
  let progressTimer: NodeJS.Timeout | undefined;
  const waiters: Array<(result: Settled) => void> = [];
  let boundPort = options.port;

  const server = createServer((req, res) => handleRequest(req, res));

  function stopTimers(): void {
    clearTimeout(timeoutTimer);
    clearInterval(progressTimer);
  }

  function closeServer(): Promise<void> {
    closing ??= new Promise<void>(resolve => {
      // Stops accepting connections immediately; resolves once open sockets drain
      server.close(() => resolve());
      server.closeIdleConnections();
    });
    return closing;
  }

  function settle(next: ListenerPhase, result: Settled): void {
    if (settled) return;
    phase = next;
    settled = result;
    stopTimers();
    void closeServer();
    for (const deliver of waiters.splice(0)) {
      deliver(result);
    }
  }

  function handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? "/", `http://localhost:${boundPort}`);

    if (req.method !== "GET" || url.pathname !== CALLBACK_PATH) {
      respond(res, 404, renderPage("Not Found", "Nothing to see here.", "#6b7280"));
      return;
    }

    if (phase !== "listening") {
      respond(
        res,
        410,
        renderPage("Link Already Used", "This sign-in attempt is no longer active. You can close this window.", "#dc2626")
      );
      return;
    }

    const error = url.searchParams.get("error");
    if (error) {
      const description = url.searchParams.get("error_description") ?? "Unknown error";
      respond(res, 400, renderPage("Authentication Failed", `Error: ${escapeHtml(error)}`, "#dc2626"));
      settle("rejected", {
        ok: false,
        error: new AuthenticationError(`Authorization was denied: ${error}: ${description}`, { errorCode: error })
      });
      return;
    }

    const code = url.searchParams.get("code");
    const state = url.searchParams.get("state");
    if (!code || !state || !statesMatch(state, options.expectedState)) {
      respond(res, 400, renderPage("Authentication Failed", "This callback could not be verified.", "#dc2626"));
      if (retriesLeft > 0) {
        retriesLeft -= 1;
        return;
      }
      settle("rejected", {
        ok: false,
        error: new AuthenticationError("OAuth callback did not carry this session's state; the authorization was not accepted")
      });
      return;
    }

    respond(
      res,
      200,
      renderPage("Authentication Successful!", "You can close this window and return to the terminal.", "#16a34a")
    );
    settle("captured", { ok: true, code });
  }

  await new Promise<void>((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      server.off("listening", onListening);
      reject(err.code === "EADDRINUSE" ? new PortConflictError(options.port, { cause: err }) : err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(options.port, host);
  });

  const address = server.address();
  if (address && typeof address === "object") {
    boundPort = address.port;
  }
  phase = "listening";

  server.on("error", (err: Error) => settle("rejected", { ok: false, error: err }));

  const deadline = Date.now() + options.timeoutMs;
  timeoutTimer = setTimeout(() => {
    settle("timed_out", { ok: false, error: new CallbackTimeoutError(options.timeoutMs) });
  }, options.timeoutMs);

  if (options.onWaiting) {
    const onWaiting = options.onWaiting;
    progressTimer = setInterval(() => {
      onWaiting(Math.max(0, deadline - Date.now()));
    }, options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS);
    progressTimer.unref();
  }

  return {
    port: boundPort,
    redirectUri: `http://localhost:${boundPort}${CALLBACK_PATH}`,
    phase: () => phase,
    waitForCode(): Promise<string> {
      return new Promise<string>((resolve, reject) => {
        const deliver = (result: Settled) => (result.ok ? resolve(result.code) : reject(result.error));
        if (settled) {
          deliver(settled);
        } else {
          waiters.push(deliver);
        }
      });
    },
    async close(): Promise<void> {
      settle("closed", { ok: false, error: new AuthenticationError("Callback listener closed before a callback arrived") });
      await closeServer();
      phase = "closed";
    }
  };
}

function statesMatch(received: string, expected: string): boolean {
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function respond(res: ServerResponse, status: number, html: string): void {
  res.writeHead(status, {
    "Content-Type": "text/html; charset=utf-8",
    "Cache-Control": "no-store",
    Connection: "close"
  });
  res.end(html);
}

function renderPage(title: string, message: string, color: string): string {
  return `<!DOCTYPE html>
<html>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h1 style="color: ${color};">${title}</h1>
    <p>${message}</p>
  </body>
</html>
`;
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
