import fs from "node:fs";
import path from "node:path";

type LoggerOptions = {
  quiet?: boolean;
  logFile?: string;
  verbose?: boolean;
};

const SENSITIVE_PATTERNS: Array<[RegExp, string]> = [
  [/(client_id["']?\s*[:=]\s*["']?)[A-Za-z0-9._]{15,}/g, "$1***MASKED***"],
  [/(client_secret["']?\s*[:=]\s*["']?)[A-Za-z0-9._]{15,}/g, "$1***MASKED***"],
  [/(access_token["']?\s*[:=]\s*["']?)[A-Za-z0-9!._]{20,}/g, "$1***MASKED***"],
  [/(code(?:_verifier)?["']?\s*[:=]\s*["']?)[A-Za-z0-9%._~-]{20,}/g, "$1***MASKED***"],
  [/(Bearer\s+)[A-Za-z0-9!._]{20,}/g, "$1***MASKED***"]
];

export function maskSensitive(text: string): string {
  return SENSITIVE_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

/** Keeps a short prefix so operators can tell credentials apart. */
export function maskSecret(value: string | undefined, visible = 8): string {
  if (!value) return "";
  if (value.length <= visible) return "***";
  return `${value.slice(0, visible)}...`;
}

function formatArgs(args: unknown[]): string {
  return args
    .map(arg => (typeof arg === "string" ? arg : arg instanceof Error ? arg.message : JSON.stringify(arg)))
    .join(" ");
}

function timestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

export function createLogger(options: LoggerOptions) {
  const quiet = Boolean(options.quiet);
  const logFile = options.logFile;

  if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  }

  const writeFile = (level: string, args: unknown[]) => {
    if (!logFile) return;
    fs.appendFileSync(logFile, `[${timestamp()}] ${level} ${maskSensitive(formatArgs(args))}\n`, "utf8");
  };

  const log = (...args: unknown[]) => {
    writeFile("INFO ", args);
    if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const warn = (...args: unknown[]) => {
    writeFile("WARN ", args);
    // eslint-disable-next-line no-console
    console.warn(...args);
  };
  const error = (...args: unknown[]) => {
    writeFile("ERROR", args);
    // eslint-disable-next-line no-console
    console.error(...args);
  };
  const debug = (...args: unknown[]) => {
    writeFile("DEBUG", args);
    if (options.verbose && !quiet) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const tenantStart = (index: number, total: number, instanceUrl: string) => {
    log(`▶ Processing org ${index}/${total}: ${instanceUrl}`);
  };
  const batchResult = (batch: number, totalBatches: number, deleted: number, failed: number) => {
    const mark = failed === 0 ? "✔" : "✖";
    log(`${mark} Batch ${batch}/${totalBatches}: ${deleted} deleted, ${failed} failed`);
  };
  return {
    log,
    warn,
    error,
    debug,
    tenantStart,
    batchResult,
    logFile
  };
}

export type Logger = ReturnType<typeof createLogger>;
