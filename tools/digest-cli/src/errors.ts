export type ExitCode = 1 | 2;

export interface CliErrorOptions {
  path?: string;
  hint?: string;
  details?: unknown;
}

export class CliError extends Error {
  readonly code: ExitCode;
  readonly path?: string;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(code: ExitCode, message: string, options: CliErrorOptions = {}) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.path = options.path;
    this.hint = options.hint;
    this.details = options.details;
  }

  toJSON() {
    return {
      ok: false,
      error: {
        code: this.code,
        message: this.message,
        path: this.path,
        hint: this.hint,
        details: this.details,
      },
    };
  }
}
