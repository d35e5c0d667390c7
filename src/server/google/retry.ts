// ABOUTME: Retries Google Sheets requests with jittered exponential backoff.
// ABOUTME: Inserts are resent only when Sheets refused them unapplied, so rows are never doubled.
import { warnLog } from "@/lib/debug-log";

/** How a request changes the sheet, which decides whether resending it is safe. */
export type SheetsOperation = "read" | "overwrite" | "insert";

const TRANSIENT_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504]);

// Rate-limited requests are refused before Sheets applies them.
const UNAPPLIED_STATUS_CODES = new Set([429]);

export interface RetryOptions {
  operation?: SheetsOperation;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  status: number | null;
  operation: SheetsOperation;
}

export interface RetryDependencies {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (notice: RetryNotice) => void;
}

interface SheetsFailure {
  status: number | null;
  retryAfterMs: number | null;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

function logRetry({ attempt, delayMs, status, operation }: RetryNotice) {
  warnLog(`Retrying Sheets ${operation} (attempt ${attempt}, status ${status ?? "unknown"})`, {
    delayMs: Math.round(delayMs),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

function readStatus(value: unknown): number | null {
  if (typeof value === "number") {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }

  return null;
}

function readRetryAfter(headers: unknown): number | null {
  let raw: unknown = null;

  if (headers instanceof Headers) {
    raw = headers.get("retry-after");
  } else if (isRecord(headers)) {
    raw = headers["retry-after"];
  }

  const seconds = typeof raw === "string" || typeof raw === "number" ? Number(raw) : Number.NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

function describeFailure(error: unknown): SheetsFailure {
  if (!isRecord(error)) {
    return { status: null, retryAfterMs: null };
  }

  const response = isRecord(error.response) ? error.response : null;

  return {
    status: readStatus(error.code) ?? readStatus(error.status) ?? readStatus(response?.status),
    retryAfterMs: readRetryAfter(response?.headers),
  };
}

function isRetryable(operation: SheetsOperation, status: number | null) {
  if (status === null) {
    return false;
  }

  const statuses = operation === "insert" ? UNAPPLIED_STATUS_CODES : TRANSIENT_STATUS_CODES;
  return statuses.has(status);
}

function backoffDelay(
  attempt: number,
  { baseDelayMs, maxDelayMs }: { baseDelayMs: number; maxDelayMs: number },
  random: () => number,
  retryAfterMs: number | null,
) {
  if (retryAfterMs !== null) {
    return Math.min(maxDelayMs, retryAfterMs);
  }

  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return ceiling * (0.5 + random() * 0.5);
}

export async function executeWithRetry<T>(
  run: () => Promise<T>,
  { operation = "read", maxAttempts = 5, baseDelayMs = 200, maxDelayMs = 5000 }: RetryOptions = {},
  { sleep = defaultSleep, random = Math.random, onRetry = logRetry }: RetryDependencies = {},
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await run();
    } catch (error) {
      const failure = describeFailure(error);

      if (attempt >= maxAttempts || !isRetryable(operation, failure.status)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, { baseDelayMs, maxDelayMs }, random, failure.retryAfterMs);

      onRetry({ attempt, delayMs, status: failure.status, operation });
      await sleep(delayMs);
    }
  }
}
