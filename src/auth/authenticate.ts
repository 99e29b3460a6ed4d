/**
 * Browser-driven Authorization-Code + PKCE flow for one org.
 *
 * Starts the callback listener, opens the authorize URL, waits for the
 * redirect and exchanges the code. The listener is always closed (and its
 * port released) before this returns, whatever the outcome.
 */

import { startCallbackListener } from "./callbackListener.js";
import { exchangeCodeForToken, type FetchLike } from "./tokenExchange.js";
import { maskSecret, type Logger } from "../logger.js";
import type { AuthSession, OrgConfig, TokenSet } from "../types.js";

export const OAUTH_SCOPES = "api refresh_token";

export type BrowserOpener = (url: string) => Promise<void>;

export type AuthenticateOptions = {
  logger: Logger;
  openBrowser?: BrowserOpener;
  fetchImpl?: FetchLike;
  stateMismatchRetries?: number;
  progressIntervalMs?: number;
};

export function buildAuthorizeUrl(config: OrgConfig, session: AuthSession, redirectUri: string): string {
  const params = new URLSearchParams({
    response_type: "code",
    client_id: config.clientId,
    redirect_uri: redirectUri,
    scope: OAUTH_SCOPES,
    code_challenge: session.codeChallenge,
    code_challenge_method: "S256",
    state: session.state
  });
  return `${config.instanceUrl}/services/oauth2/authorize?${params.toString()}`;
}

async function openWithDefaultBrowser(url: string): Promise<void> {
  const { default: open } = await import("open");
  await open(url);
}

export async function authenticate(
  config: OrgConfig,
  session: AuthSession,
  options: AuthenticateOptions
): Promise<TokenSet> {
  const { logger } = options;
  const timeoutMs = Math.max(1, session.deadline - Date.now());

  logger.log(`Starting local callback server on port ${session.port}...`);
  logger.debug(`Client ID: ${maskSecret(config.clientId)}`);

  const listener = await startCallbackListener({
    port: session.port,
    expectedState: session.state,
    timeoutMs,
    stateMismatchRetries: options.stateMismatchRetries,
    progressIntervalMs: options.progressIntervalMs,
    onWaiting: remainingMs => {
      logger.log(`⏳ Still waiting for authentication... (${Math.ceil(remainingMs / 1000)} seconds remaining)`);
    }
  });

  try {
    // Port-specific: must match the callback URL registered on the Connected App
    const redirectUri = listener.redirectUri;
    const authorizeUrl = buildAuthorizeUrl(config, session, redirectUri);

    logger.log(`Opening browser to: ${authorizeUrl}`);
    try {
      await (options.openBrowser ?? openWithDefaultBrowser)(authorizeUrl);
    } catch (err) {
      logger.warn(`Could not open a browser automatically (${err instanceof Error ? err.message : String(err)}).`);
      logger.warn("Open the URL above manually to continue.");
    }
    logger.log("Waiting for you to complete authentication in your browser...");

    const code = await listener.waitForCode();
    logger.log("✔ Authorization code received");

    const tokens = await exchangeCodeForToken({
      config,
      session,
      code,
      redirectUri,
      fetchImpl: options.fetchImpl
    });
    logger.log(`✔ Authenticated against ${tokens.instanceUrl}`);
    return tokens;
  } finally {
    await listener.close();
    logger.debug("Callback server shut down");
  }
}
