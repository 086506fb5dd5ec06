export type ViewerErrorCode = "unsupported-operation" | "decode-failed" | "invalid-configuration";

export class ViewerError extends Error {
  readonly code: ViewerErrorCode;

  constructor(code: ViewerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ViewerError";
    this.code = code;
  }
}

export class UnsupportedOperationError extends ViewerError {
  readonly operation: string;

  constructor(operation: string, reason: string) {
    super("unsupported-operation", `${operation} is not supported: ${reason}`);
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export class DecodeError extends ViewerError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("decode-failed", `Failed to open ${path}: ${message}`, options);
    this.name = "DecodeError";
    this.path = path;
  }
}

export class InvalidConfigurationError extends ViewerError {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super("invalid-configuration", `Invalid ${setting}: ${message}`);
    this.name = "InvalidConfigurationError";
    this.setting = setting;
  }
}

export type Result<T, E extends ViewerError = ViewerError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends ViewerError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
