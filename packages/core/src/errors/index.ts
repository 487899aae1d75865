/**
 * Lazypull Error Codes
 */
export const ErrorCodes = {
  UNSUPPORTED_DRIVER: 'UNSUPPORTED_DRIVER',
  TEMPLATE_LOAD_FAILED: 'TEMPLATE_LOAD_FAILED',
  INVALID_IMAGE_REFERENCE: 'INVALID_IMAGE_REFERENCE',
  MIRROR_UPDATE_FAILED: 'MIRROR_UPDATE_FAILED',
  UNSUPPORTED_BACKEND: 'UNSUPPORTED_BACKEND',
  SERIALIZATION_FAILED: 'SERIALIZATION_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export interface LazypullErrorOptions {
  hint?: string;
  cause?: unknown;
}

/**
 * Base class for lazypull errors
 */
export class LazypullError extends Error {
  public readonly hint?: string;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options: LazypullErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LazypullError';
    this.hint = options.hint;
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error: The requested filesystem driver has no configuration shape
 */
export class UnsupportedDriverError extends LazypullError {
  constructor(public readonly driver: string, hint?: string) {
    super(
      ErrorCodes.UNSUPPORTED_DRIVER,
      `Unsupported fs driver "${driver}"`,
      { hint: hint ?? 'Use one of: fusedev, fscache' },
    );
    this.name = 'UnsupportedDriverError';
  }
}

/**
 * Error: Template could not be read or decoded
 */
export class TemplateLoadError extends LazypullError {
  constructor(public readonly templatePath: string, cause: unknown, hint?: string) {
    super(
      ErrorCodes.TEMPLATE_LOAD_FAILED,
      `Failed to load daemon config template ${templatePath}: ${describeCause(cause)}`,
      { hint, cause },
    );
    this.name = 'TemplateLoadError';
  }
}

/**
 * Error: Image identifier is not a valid reference
 */
export class ImageReferenceError extends LazypullError {
  constructor(public readonly imageId: string, reason: string, cause?: unknown) {
    super(
      ErrorCodes.INVALID_IMAGE_REFERENCE,
      `Invalid image reference "${imageId}": ${reason}`,
      { hint: 'Expected [host[:port]/]path[:tag][@digest]', cause },
    );
    this.name = 'ImageReferenceError';
  }
}

/**
 * Error: Mirror definitions for a registry host could not be loaded
 */
export class MirrorUpdateError extends LazypullError {
  constructor(
    public readonly registryHost: string,
    public readonly imageId: string,
    cause: unknown,
  ) {
    super(
      ErrorCodes.MIRROR_UPDATE_FAILED,
      `Failed to update mirrors for ${registryHost} (image ${imageId}): ${describeCause(cause)}`,
      { hint: 'Check the mirrors config directory for unreadable or malformed files', cause },
    );
    this.name = 'MirrorUpdateError';
  }
}

/**
 * Error: Backend type is none of localfs, oss, registry
 */
export class UnsupportedBackendError extends LazypullError {
  constructor(public readonly backendType: string, public readonly imageId?: string) {
    super(
      ErrorCodes.UNSUPPORTED_BACKEND,
      imageId
        ? `Unknown backend type "${backendType}" while supplementing image ${imageId}`
        : `Unknown backend type "${backendType}"`,
    );
    this.name = 'UnsupportedBackendError';
  }
}

/**
 * Error: Configuration could not be encoded as JSON
 */
export class SerializationError extends LazypullError {
  constructor(cause: unknown) {
    super(
      ErrorCodes.SERIALIZATION_FAILED,
      `Failed to serialize daemon config: ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'SerializationError';
  }
}
