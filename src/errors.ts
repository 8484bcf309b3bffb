/**
 * errors.ts — Import error taxonomy
 *
 * Stable, machine-readable codes for every fatal import failure. Skips
 * (lock held, upstream unchanged) are not errors and never use these.
 *
 * Usage:
 *   throw new ImportError(ImportErrorCode.LOAD_FAILED, "COPY into stg_hd failed", {
 *     detail: "HD.dat.utf8", cause: err,
 *   });
 */

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ImportErrorCode = {
  CONFIG_INVALID: "CONFIG_INVALID",
  LOCK_FAILED: "LOCK_FAILED",
  FETCH_FAILED: "FETCH_FAILED",
  EXTRACT_FAILED: "EXTRACT_FAILED",
  SCHEMA_FAILED: "SCHEMA_FAILED",
  LOAD_FAILED: "LOAD_FAILED",
  MERGE_FAILED: "MERGE_FAILED",
  VERIFY_FAILED: "VERIFY_FAILED",
} as const;

export type ImportErrorCodeValue = (typeof ImportErrorCode)[keyof typeof ImportErrorCode];

/** Short diagnostic tag printed in the one-line outcome for each code. */
const ERROR_TAGS: Record<ImportErrorCodeValue, string> = {
  CONFIG_INVALID: "config",
  LOCK_FAILED: "lock",
  FETCH_FAILED: "fetch",
  EXTRACT_FAILED: "extract",
  SCHEMA_FAILED: "schema",
  LOAD_FAILED: "load",
  MERGE_FAILED: "merge",
  VERIFY_FAILED: "verify",
};

export interface ImportErrorOptions {
  /** Extra context: statement preview, table or file name */
  detail?: string;
  cause?: unknown;
}

export class ImportError extends Error {
  readonly code: ImportErrorCodeValue;
  readonly tag: string;
  readonly detail: string | undefined;

  constructor(code: ImportErrorCodeValue, message: string, options: ImportErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ImportError";
    this.code = code;
    this.tag = ERROR_TAGS[code];
    this.detail = options.detail;
  }
}

export function isImportError(err: unknown): err is ImportError {
  return err instanceof ImportError;
}

/** Render any thrown value as a log-friendly message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Wrap an arbitrary failure as an ImportError with the given code.
 * ImportErrors pass through untouched so the innermost context wins.
 */
export function asImportError(
  err: unknown,
  code: ImportErrorCodeValue,
  message: string,
  detail?: string,
): ImportError {
  if (err instanceof ImportError) return err;
  return new ImportError(code, `${message}: ${describeError(err)}`, { detail, cause: err });
}
