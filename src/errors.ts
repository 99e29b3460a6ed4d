import type { RunFailure } from "./types.js";

export type CleanupErrorCode =
  | "PORT_CONFLICT"
  | "AUTHENTICATION_FAILED"
  | "CALLBACK_TIMEOUT"
  | "PRODUCTION_GATE_DECLINED"
  | "RESOLUTION_FAILED"
  | "DELETION_BATCH_FAILED"
  | "API_REQUEST_FAILED"
  | "CONFIG_INVALID";

/**
 * Base class for every failure the cleanup pipeline raises on purpose.
 * The orchestrator turns these into RunResult.fatalError at the tenant boundary.
 */
export class CleanupError extends Error {
  readonly code: CleanupErrorCode;

  constructor(code: CleanupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CleanupError";
    this.code = code;
  }
}

export class PortConflictError extends CleanupError {
  readonly port: number;

  constructor(port: number, options?: { cause?: unknown }) {
    super(
      "PORT_CONFLICT",
      `Port ${port} is already in use. Close the application holding it or pick another callback_port ` +
        `(the Connected App callback URL must match http://localhost:${port}/callback).`,
      options
    );
    this.name = "PortConflictError";
    this.port = port;
  }
}

export class AuthenticationError extends CleanupError {
  readonly errorCode?: string;
  readonly httpStatus?: number;

  constructor(message: string, details: { errorCode?: string; httpStatus?: number; cause?: unknown } = {}) {
    super("AUTHENTICATION_FAILED", message, { cause: details.cause });
    this.name = "AuthenticationError";
    this.errorCode = details.errorCode;
    this.httpStatus = details.httpStatus;
  }
}

export class CallbackTimeoutError extends CleanupError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("CALLBACK_TIMEOUT", `No OAuth callback received within ${Math.round(timeoutMs / 1000)} seconds`);
    this.name = "CallbackTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Not a failure: the tenant is skipped because production was not confirmed. */
export class ProductionGateDeclinedError extends CleanupError {
  constructor(message = "Production org was not confirmed for deletion") {
    super("PRODUCTION_GATE_DECLINED", message);
    this.name = "ProductionGateDeclinedError";
  }
}

export class ResolutionError extends CleanupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOLUTION_FAILED", message, options);
    this.name = "ResolutionError";
  }
}

export class DeletionBatchError extends CleanupError {
  readonly batch: number;
  readonly httpStatus?: number;

  constructor(batch: number, message: string, details: { httpStatus?: number; cause?: unknown } = {}) {
    super("DELETION_BATCH_FAILED", message, { cause: details.cause });
    this.name = "DeletionBatchError";
    this.batch = batch;
    this.httpStatus = details.httpStatus;
  }
}

export class ApiRequestError extends CleanupError {
  readonly status: number;
  readonly errorCode?: string;

  constructor(status: number, message: string, errorCode?: string) {
    super("API_REQUEST_FAILED", message);
    this.name = "ApiRequestError";
    this.status = status;
    this.errorCode = errorCode;
  }
}

export class ConfigError extends CleanupError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Configuration is invalid:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function describeError(err: unknown): RunFailure {
  if (err instanceof CleanupError) {
    return { code: err.code, message: err.message };
  }
  return {
    code: "UNEXPECTED",
    message: err instanceof Error ? err.message : String(err)
  };
}
