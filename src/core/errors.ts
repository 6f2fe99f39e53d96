export type ShelfErrorSeverity = "fatal" | "recoverable" | "warning";

export const REPO_ERROR_CODES = [
  "URL_PARSE_FAILED",
  "LINK_CONFLICT",
  "IO_ERROR",
  "GIT_OPERATION_FAILED",
  "REPO_NOT_FOUND",
] as const;

export const API_ERROR_CODES = [
  "API_UNAUTHORIZED",
  "API_RATE_LIMITED",
  "API_NETWORK_ERROR",
  "API_RESPONSE_INVALID",
  "API_REQUEST_FAILED",
  "PARTIAL_AGGREGATION",
] as const;

export const CONFIG_ERROR_CODES = [
  "CONFIG_INVALID",
  "CONFIG_SECRET_MISSING",
  "CONFIG_NOT_FOUND",
  "CONFIG_EXISTS",
  "CREDENTIAL_MISSING",
  "BASE_DIR_UNRESOLVABLE",
] as const;

export const SYSTEM_ERROR_CODES = ["RUN_CANCELLED", "EDITOR_NOT_FOUND", "EDITOR_FAILED"] as const;

export const SHELF_ERROR_CODES = [
  ...REPO_ERROR_CODES,
  ...API_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
  ...SYSTEM_ERROR_CODES,
] as const;

export type RepoErrorCode = (typeof REPO_ERROR_CODES)[number];
export type ApiErrorCode = (typeof API_ERROR_CODES)[number];
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type SystemErrorCode = (typeof SYSTEM_ERROR_CODES)[number];
export type ShelfErrorCode = (typeof SHELF_ERROR_CODES)[number];

export interface ShelfErrorOptions {
  severity?: ShelfErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class ShelfError extends Error {
  public readonly code: ShelfErrorCode;
  public readonly severity: ShelfErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: ShelfErrorCode,
    severity: ShelfErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "ShelfError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: ShelfErrorCode,
  message: string,
  defaultSeverity: ShelfErrorSeverity,
  options: ShelfErrorOptions = {},
): ShelfError {
  return new ShelfError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

export function repoError(
  code: RepoErrorCode,
  message: string,
  options: ShelfErrorOptions = {},
): ShelfError {
  return createError(code, message, "recoverable", options);
}

export function apiError(
  code: ApiErrorCode,
  message: string,
  options: ShelfErrorOptions = {},
): ShelfError {
  return createError(code, message, "recoverable", options);
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: ShelfErrorOptions = {},
): ShelfError {
  return createError(code, message, "fatal", options);
}

export function systemError(
  code: SystemErrorCode,
  message: string,
  options: ShelfErrorOptions = {},
): ShelfError {
  return createError(code, message, "recoverable", options);
}

export function isShelfError(error: unknown, code?: ShelfErrorCode): error is ShelfError {
  return error instanceof ShelfError && (code === undefined || error.code === code);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Converts an arbitrary thrown value into a `ShelfError`. Existing
 * `ShelfError`s pass through untouched so their code survives re-throws.
 */
export function normalizeError(
  error: unknown,
  fallbackCode: ShelfErrorCode,
  context?: Record<string, unknown>,
): ShelfError {
  if (error instanceof ShelfError) {
    return error;
  }

  if (isAbortError(error)) {
    return systemError("RUN_CANCELLED", "Operation was cancelled.", { context, cause: error });
  }

  return new ShelfError(toErrorMessage(error), fallbackCode, "recoverable", context, error);
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
