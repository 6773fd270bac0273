/**
 * Typed error catalog for mirror operations.
 *
 * `status` is the HTTP status the hosting provider answered with, or 0 when
 * the failure happened locally.
 */

export class MirrorError extends Error {
  constructor(
    public readonly status: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        status: this.status,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Remote failures

export class AuthError extends MirrorError {
  constructor(status = 401, details?: Record<string, unknown>) {
    super(status, 'AUTH_FAILED', 'Authentication with the hosting provider failed', details);
  }
}

export class NotFoundError extends MirrorError {
  constructor(resource: string, details?: Record<string, unknown>) {
    super(404, 'NOT_FOUND', `Not found: ${resource}`, details);
  }
}

export class NotAFileError extends MirrorError {
  constructor(path: string, details?: Record<string, unknown>) {
    super(200, 'NOT_A_FILE', `${path} is not a file`, details);
  }
}

export class RemoteApiError extends MirrorError {
  constructor(
    status: number,
    public readonly body: string,
    details?: Record<string, unknown>,
  ) {
    super(status, 'REMOTE_API_ERROR', `Hosting provider answered ${status}: ${body}`, details);
  }
}

// Local failures

export class LocalIoError extends MirrorError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(0, 'LOCAL_IO_ERROR', `Cannot access ${path}: ${reason}`, { path }, { cause });
  }
}

export class InvalidEntryError extends MirrorError {
  constructor(field: string, value: string) {
    super(0, 'INVALID_ENTRY', `${field} must not contain whitespace: "${value}"`, { field, value });
  }
}

export class ManifestParseError extends MirrorError {
  constructor(lineNumber: number, line: string) {
    super(0, 'MANIFEST_PARSE_ERROR', `Malformed manifest line ${lineNumber}: "${line}"`, {
      lineNumber,
      line,
    });
  }
}

export class MissingTokenError extends AuthError {
  constructor(source: string) {
    super(401, { source });
    this.message = `No access token found in ${source}`;
  }
}

export class ConfigurationError extends MirrorError {
  constructor(setting: string, hint?: string) {
    super(
      0,
      'CONFIGURATION_ERROR',
      hint ? `Missing setting ${setting}: ${hint}` : `Missing setting ${setting}`,
      { setting },
    )
  }
}
