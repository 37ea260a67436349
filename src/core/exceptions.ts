/**
 * Error kinds raised while importing a tree.
 *
 * Components propagate these unchanged; only the DriveImport facade turns
 * them into an ImportResult.
 */
import type { ImportErrorKind, ImportResult } from "./types.js";

export abstract class ImportError extends Error {
  abstract readonly kind: ImportErrorKind;
  abstract readonly retryable: boolean;
}

/** A parent mapping the import relies on does not exist. */
export class PreconditionFailedError extends ImportError {
  readonly kind = "precondition";
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = "PreconditionFailedError";
  }
}

/** A destination API call failed. */
export class TransportError extends ImportError {
  readonly kind = "transport";
  readonly retryable: boolean;
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(
      status === null ? `Transport failed: ${message}` : `Transport failed (${status}): ${message}`,
      options,
    );
    this.name = "TransportError";
    this.status = status;
    this.retryable =
      status === null || status === 408 || status === 429 || status >= 500;
  }
}

export class MetadataTranslationError extends ImportError {
  readonly kind = "translation";
  readonly retryable = false;
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Cannot translate ${field}: ${JSON.stringify(value)}`);
    this.name = "MetadataTranslationError";
    this.field = field;
    this.value = value;
  }
}

/** Cached content could not be opened or read. */
export class ContentStreamError extends ImportError {
  readonly kind = "content";
  readonly retryable = true;

  constructor(message: string, options?: ErrorOptions) {
    super(`Content stream failed: ${message}`, options);
    this.name = "ContentStreamError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ExportBundleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`Invalid export bundle: ${message}`, options);
    this.name = "ExportBundleError";
  }
}

/** Classify any thrown value as an ImportResult error. */
export function toImportResult(err: unknown): ImportResult {
  if (err instanceof ImportError) {
    return {
      status: "error",
      kind: err.kind,
      message: err.message,
      retryable: err.retryable,
    };
  }
  return {
    status: "error",
    kind: "transport",
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  };
}
