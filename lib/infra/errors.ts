export type FailureKind =
  | "missing_credential"
  | "network_failure"
  | "api_failure"
  | "malformed_payload"
  | "structural_defect"
  | "unexpected_failure";

export interface DigestErrorOptions {
  status?: number;
  details?: unknown;
  cause?: unknown;
}

/**
 * A failed summarization attempt. `message` is the short reason shown to readers;
 * everything needed for a postmortem lives in `details`.
 */
export class DigestError extends Error {
  readonly kind: FailureKind;
  readonly status?: number;
  readonly details?: unknown;

  constructor(kind: FailureKind, message: string, options: DigestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DigestError";
    this.kind = kind;
    this.status = options.status;
    this.details = options.details;
  }

  toJSON() {
    return {
      kind: this.kind,
      message: this.message,
      status: this.status,
      details: this.details,
    };
  }
}

export class ArticleInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArticleInputError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
