import * as logger from "./logger.js";

export type ErrorKind = "user" | "io" | "validation" | "internal";

/**
 * Base class for every error raised by the scan pipeline.
 * The kind decides the CLI exit code.
 */
export abstract class JozinError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

/** Invalid caller-supplied parameters */
export class UserError extends JozinError {
  readonly kind = "user";
  readonly exitCode = 1;
}

/** Filesystem access failures */
export class IoError extends JozinError {
  readonly kind = "io";
  readonly exitCode = 2;
}

/** A path or record is structurally unsuitable */
export class ValidationError extends JozinError {
  readonly kind = "validation";
  readonly exitCode = 3;
}

/** A bug in our own logic */
export class InternalError extends JozinError {
  readonly kind = "internal";
  readonly exitCode = 4;
}

export interface ErrorResult {
  success: false;
  error: string;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error && typeof error.code === "string";

/**
 * Normalize anything thrown into a JozinError.
 * Node errno failures become IoError, everything else is internal.
 */
export const toJozinError = (error: unknown): JozinError => {
  if (error instanceof JozinError) {
    return error;
  }
  if (isErrnoException(error)) {
    return new IoError(error.message);
  }
  return new InternalError(formatError(error));
};

export const handleError = (
  error: unknown,
  context: string,
  verbosity?: number
): ErrorResult => {
  const msg = formatError(error);
  logger.error(`${context}: ${msg}`, verbosity);
  return { success: false, error: msg };
};

export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
