import type { ErrorKind } from "./types.js";

/**
 * A per-file failure. The pipeline turns it into a failed `CompressionResult`
 * and the run moves on to the next file.
 */
export class CompressionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompressionError";
    this.kind = kind;
  }
}

/** Target format outside the supported set. Fatal, raised before any file is touched. */
export class UnsupportedFormatError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported target format: ${format}`);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
