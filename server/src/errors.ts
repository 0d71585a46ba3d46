export abstract class AppError extends Error {
  public abstract readonly code: string;
  public abstract readonly statusCode: number;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {
  public readonly code = "config_error";
  public readonly statusCode = 500;
}

export class ValidationError extends AppError {
  public readonly code = "validation_error";
  public readonly statusCode = 400;
}

export class SessionNotFoundError extends AppError {
  public readonly code = "session_not_found";
  public readonly statusCode = 401;

  public constructor() {
    super("Session not found. Please sign in again.");
  }
}

export class UnsupportedFormatError extends AppError {
  public readonly code = "unsupported_format";
  public readonly statusCode = 415;

  public constructor(mimeType: string) {
    super(`Unsupported file type "${mimeType || "unknown"}". Upload a JPG, PNG or PDF.`);
  }
}

export class DecodeError extends AppError {
  public readonly code = "decode_error";
  public readonly statusCode = 422;
}

/** Raised when a mutating action arrives while a tutor request is still running. */
export class BusyError extends AppError {
  public readonly code = "session_busy";
  public readonly statusCode = 409;

  public constructor() {
    super("Still working on the previous question. Please wait.");
  }
}

export class GenerationError extends AppError {
  public readonly code = "generation_failed";
  public readonly statusCode = 502;
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }

  return fallback;
}
