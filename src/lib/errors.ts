/**
 * Typed errors for the gallery core.
 *
 * Only ConfigError and AccessError are allowed to abort a view; TransportError
 * and DecodeError are recovered where they occur.
 */

export class GalleryError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GalleryError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigError extends GalleryError {
  public readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
    this.variable = variable;
  }
}

export type AccessErrorCode = "BUCKET_NOT_FOUND" | "BUCKET_FORBIDDEN" | "BUCKET_UNAVAILABLE";

export class AccessError extends GalleryError {
  public readonly bucket: string;

  constructor(bucket: string, code: AccessErrorCode, detail?: string) {
    super(AccessError.describe(bucket, code, detail), code);
    this.name = "AccessError";
    this.bucket = bucket;
  }

  get httpStatus(): number {
    if (this.code === "BUCKET_NOT_FOUND") {
      return 404;
    }

    return this.code === "BUCKET_FORBIDDEN" ? 403 : 502;
  }

  private static describe(bucket: string, code: AccessErrorCode, detail?: string): string {
    if (code === "BUCKET_NOT_FOUND") {
      return `Bucket '${bucket}' not found.`;
    }

    if (code === "BUCKET_FORBIDDEN") {
      return `Access denied to bucket '${bucket}'. Check your permissions.`;
    }

    return detail ? `Error accessing bucket '${bucket}': ${detail}` : `Error accessing bucket '${bucket}'`;
  }
}

export class TransportError extends GalleryError {
  public readonly operation: string;
  public readonly statusCode?: number;

  constructor(operation: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(`${operation} failed: ${message}`, "TRANSPORT_ERROR", { cause: options?.cause });
    this.name = "TransportError";
    this.operation = operation;
    this.statusCode = options?.statusCode;
  }
}

export class DecodeError extends GalleryError {
  public readonly key: string;

  constructor(key: string, message: string, cause?: unknown) {
    super(`Cannot process image ${key}: ${message}`, "DECODE_ERROR", { cause });
    this.name = "DecodeError";
    this.key = key;
  }
}

export const errorMessage = (error: unknown, fallback: string): string => {
  return error instanceof Error ? error.message : fallback;
};
