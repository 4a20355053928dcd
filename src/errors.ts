/**
 * errors.ts — Error taxonomy shared by stores, tasks and the plan controller.
 *
 * Every failure that can reach published state is reduced to one stable code:
 *   NOT_FOUND  — expected "nothing there yet" (neutral UI state)
 *   TRANSPORT  — network / connectivity
 *   DECODE     — corrupt cached or server payload
 *   CANCELED   — cooperative cancellation (never surfaced)
 *   STORAGE    — key-value store or encoding failure
 *   UNKNOWN    — catch-all
 *
 * Usage:
 *   throw PlanServiceError.fromHttpStatus(404);
 *   const info = toErrorInfo(err, "fetch");
 */

import { ZodError } from "zod";

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  NOT_FOUND: "NOT_FOUND",
  TRANSPORT: "TRANSPORT",
  DECODE: "DECODE",
  CANCELED: "CANCELED",
  STORAGE: "STORAGE",
  UNKNOWN: "UNKNOWN",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** User-facing copy per code. Diagnostic detail stays in `ErrorInfo.detail` and the logs. */
const GENERIC_MESSAGES: Record<ErrorCodeValue, string> = {
  NOT_FOUND: "Nothing has been generated yet.",
  TRANSPORT: "Network unavailable. Check your connection and try again.",
  DECODE: "Received data could not be read. Please try again.",
  CANCELED: "The request was canceled.",
  STORAGE: "Local storage is unavailable.",
  UNKNOWN: "Something went wrong. Please try again.",
};

// ─── Error Classes ──────────────────────────────────────────────

export type PlanServiceErrorKind = "notFound" | "transport" | "decode" | "unknown";

/** Failure raised by a Plan Service implementation. */
export class PlanServiceError extends Error {
  readonly kind: PlanServiceErrorKind;
  readonly status: number | undefined;

  constructor(kind: PlanServiceErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PlanServiceError";
    this.kind = kind;
    this.status = options.status;
  }

  /**
   * Map an HTTP status onto the taxonomy.
   * 404 → notFound; 0 (no response), 408, 429 and 5xx → transport; everything else → unknown.
   */
  static fromHttpStatus(status: number, message?: string): PlanServiceError {
    let kind: PlanServiceErrorKind = "unknown";
    if (status === 404) kind = "notFound";
    else if (status === 0 || status === 408 || status === 429 || status >= 500) kind = "transport";
    return new PlanServiceError(kind, message ?? `HTTP ${status}`, { status });
  }
}

/** Raised by `CancellationToken.throwIfCancelled()`. */
export class CancellationError extends Error {
  constructor(message = "operation canceled") {
    super(message);
    this.name = "CancellationError";
  }
}

export type StorageOperation = "encode" | "write" | "read" | "remove";

/** Key-value store or payload encoding failure. */
export class StorageError extends Error {
  readonly key: string;
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, key: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "StorageError";
    this.key = key;
    this.operation = operation;
  }
}

// ─── Classification ─────────────────────────────────────────────

/** True for our own CancellationError and for DOM-style AbortErrors. */
export function isCancellation(err: unknown): boolean {
  if (err instanceof CancellationError) return true;
  return err instanceof Error && err.name === "AbortError";
}

export function classifyError(err: unknown): ErrorCodeValue {
  if (isCancellation(err)) return ErrorCode.CANCELED;
  if (err instanceof PlanServiceError) {
    switch (err.kind) {
      case "notFound":
        return ErrorCode.NOT_FOUND;
      case "transport":
        return ErrorCode.TRANSPORT;
      case "decode":
        return ErrorCode.DECODE;
      default:
        return ErrorCode.UNKNOWN;
    }
  }
  if (err instanceof ZodError || err instanceof SyntaxError) return ErrorCode.DECODE;
  if (err instanceof StorageError) return ErrorCode.STORAGE;
  return ErrorCode.UNKNOWN;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ─── Published Error Info ───────────────────────────────────────

export interface ErrorInfo {
  code: ErrorCodeValue;
  /** Generic, user-facing message */
  message: string;
  /** Diagnostic detail (original error message) */
  detail: string;
  /** Which step of a multi-step flow failed */
  step: string;
  /** HTTP status, when the failure came from the Plan Service */
  status?: number;
}

export function toErrorInfo(err: unknown, step: string): ErrorInfo {
  const code = classifyError(err);
  const info: ErrorInfo = {
    code,
    message: GENERIC_MESSAGES[code],
    detail: errorMessage(err),
    step,
  };
  if (err instanceof PlanServiceError && err.status !== undefined) {
    info.status = err.status;
  }
  return info;
}
