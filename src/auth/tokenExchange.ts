import { AuthenticationError } from "../errors.js";
import { maskSensitive } from "../logger.js";
import type { AuthSession, OrgConfig, TokenSet } from "../types.js";
import { consumeSession } from "./pkce.js";

export type FetchLike = typeof fetch;

type TokenResponseBody = {
  access_token?: string;
  instance_url?: string;
  token_type?: string;
  id?: string;
  issued_at?: string;
  error?: string;
  error_description?: string;
};

const TOKEN_FIELDS = ["access_token", "instance_url", "token_type", "id", "issued_at", "error", "error_description"] as const;

function readTokenBody(parsed: unknown): TokenResponseBody {
  const body: TokenResponseBody = {};
  if (typeof parsed !== "object" || parsed === null) return body;
  for (const field of TOKEN_FIELDS) {
    const value: unknown = Reflect.get(parsed, field);
    if (typeof value === "string") body[field] = value;
  }
  return body;
}

export function tokenEndpoint(instanceUrl: string): string {
  return `${instanceUrl}/services/oauth2/token`;
}

function scrub(text: string, secrets: Array<string | undefined>): string {
  let out = text;
  for (const secret of secrets) {
    if (secret) out = out.split(secret).join("***MASKED***");
  }
  return maskSensitive(out);
}

/**
 * Exchange an authorization code for an access token.
 *
 * Sends the session's code_verifier (never the challenge) so the server can
 * recompute the challenge. The code is single-use, so a failure here is final.
 */
export async function exchangeCodeForToken(params: {
  config: OrgConfig;
  session: AuthSession;
  code: string;
  redirectUri: string;
  fetchImpl?: FetchLike;
}): Promise<TokenSet> {
  const { config, session, code, redirectUri } = params;
  const fetchImpl = params.fetchImpl ?? fetch;

  if (!consumeSession(session)) {
    throw new AuthenticationError("Authorization session was already used for a token exchange");
  }

  const form = new URLSearchParams({
    grant_type: "authorization_code",
    code,
    client_id: config.clientId,
    redirect_uri: redirectUri,
    code_verifier: session.codeVerifier
  });
  if (config.clientSecret) {
    form.set("client_secret", config.clientSecret);
  }

  const secrets = [config.clientSecret, code, session.codeVerifier];

  let response: Response;
  try {
    response = await fetchImpl(tokenEndpoint(config.instanceUrl), {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json"
      },
      body: form.toString()
    });
  } catch (err) {
    throw new AuthenticationError(
      `Token request failed: ${scrub(err instanceof Error ? err.message : String(err), secrets)}`,
      { cause: err }
    );
  }

  const text = await response.text();
  let body: TokenResponseBody;
  try {
    body = readTokenBody(JSON.parse(text));
  } catch {
    body = { error_description: text.slice(0, 500) };
  }

  if (!response.ok) {
    const errorCode = body.error ?? `http_${response.status}`;
    const description = body.error_description ?? response.statusText;
    throw new AuthenticationError(`Token exchange failed (${response.status}): ${errorCode}: ${scrub(description, secrets)}`, {
      errorCode,
      httpStatus: response.status
    });
  }

  if (!body.access_token) {
    throw new AuthenticationError("Token response did not include an access_token. Check the Connected App configuration.", {
      httpStatus: response.status
    });
  }

  const issuedAt = body.issued_at ? Number(body.issued_at) : undefined;
  return {
    accessToken: body.access_token,
    instanceUrl: (body.instance_url ?? config.instanceUrl).replace(/\/+$/, ""),
    tokenType: body.token_type ?? "Bearer",
    identityUrl: body.id,
    issuedAt: issuedAt !== undefined && Number.isFinite(issuedAt) ? issuedAt : undefined
  };
}
