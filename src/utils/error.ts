export class ImageProcessingError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "ImageProcessingError";
  }
}

export class DecodeError extends ImageProcessingError {
  constructor(
    message: string = "Image file is corrupted or unreadable",
    cause?: Error
  ) {
    super(message, cause);
    this.name = "DecodeError";
  }
}

export class UnsupportedFormatError extends DecodeError {
  constructor(format: string, cause?: Error) {
    super(`Unsupported image format: ${format}`, cause);
    this.name = "UnsupportedFormatError";
  }
}

export class EncodeError extends ImageProcessingError {
  constructor(message: string, cause?: Error) {
    super(`Image conversion failed: ${message}`, cause);
    this.name = "EncodeError";
  }
}

export class ArchiveError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "ArchiveError";
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
    public readonly retryable: boolean = false,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class CriticalError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "CriticalError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : "Unknown error";
}
