/**
 * Typed error catalog for the clip archive pipeline.
 *
 * Errors carry a stable `errorCode`; mapping to transport status codes is
 * left to the caller (see the server's error handler).
 */

export class ClipArchiveError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Run-terminating: credentials missing, malformed or rejected by the vendor

export class AuthError extends ClipArchiveError {
  constructor(message = "Authentication failed", details?: Record<string, unknown>) {
    super("AUTH_FAILED", message, details);
  }
}

// Network or remote-service failure; the in-flight clip is left unmarked

export class TransportError extends ClipArchiveError {
  constructor(message = "Remote service request failed", details?: Record<string, unknown>) {
    super("TRANSPORT_FAILED", message, details);
  }
}

export class NotFoundError extends ClipArchiveError {
  constructor(cameraName: string, details?: Record<string, unknown>) {
    super("CAMERA_NOT_FOUND", `Camera not found: ${cameraName}`, {
      cameraName,
      ...details,
    });
  }
}

// Directory creation or rename failure; the clip is retried next run

export class FilesystemError extends ClipArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("FILESYSTEM_ERROR", message, details);
  }
}

export class InvalidRequestError extends ClipArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_REQUEST", message, details);
  }
}
