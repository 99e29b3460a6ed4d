/**
 * PKCE verifier/challenge generation and the single-use AuthSession.
 */

import { createHash, randomBytes } from "node:crypto";
import type { AuthSession } from "../types.js";

export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

// 32 bytes → 43 base64url characters, the minimum verifier length RFC 7636 allows
const VERIFIER_BYTES = 32;
const STATE_BYTES = 32;

export function deriveCodeChallenge(codeVerifier: string): string {
  return createHash("sha256").update(codeVerifier, "ascii").digest("base64url");
}

export function generateAuthSession(options: { port: number; timeoutMs?: number }): AuthSession {
  const codeVerifier = randomBytes(VERIFIER_BYTES).toString("base64url");
  return {
    state: randomBytes(STATE_BYTES).toString("base64url"),
    codeVerifier,
    codeChallenge: deriveCodeChallenge(codeVerifier),
    port: options.port,
    deadline: Date.now() + (options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS)
  };
}

const consumedSessions = new WeakSet<AuthSession>();

/**
 * Marks the session as used. Returns false when it had already been consumed,
 * in which case the caller must not exchange anything with it.
 */
export function consumeSession(session: AuthSession): boolean {
  if (consumedSessions.has(session)) return false;
  consumedSessions.add(session);
  return true;
}

export function isSessionConsumed(session: AuthSession): boolean {
  return consumedSessions.has(session);
}
