/**
 * phpswitch error codes, one per failure category
 */
export const ErrorCodes = {
  FILESYSTEM: 'FILESYSTEM',
  VALIDATION: 'VALIDATION',
  EXTERNAL_COMMAND: 'EXTERNAL_COMMAND',
  CORRUPTION: 'CORRUPTION',
  UNKNOWN_FORMAT: 'UNKNOWN_FORMAT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for phpswitch errors
 */
export class PhpSwitchError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'PhpSwitchError';
  }
}

export class FileSystemError extends PhpSwitchError {
  constructor(
    message: string,
    public readonly path: string,
    hint?: string
  ) {
    super(ErrorCodes.FILESYSTEM, message, hint);
    this.name = 'FileSystemError';
  }
}

export type ValidationReason =
  | 'traversal'
  | 'outside-root'
  | 'control-characters'
  | 'too-long'
  | 'not-a-directory'
  | 'invalid-value'
  | 'malformed-manifest'
  | 'unsupported-shell';

export class ValidationError extends PhpSwitchError {
  constructor(
    message: string,
    public readonly reason: ValidationReason,
    hint?: string
  ) {
    super(ErrorCodes.VALIDATION, message, hint);
    this.name = 'ValidationError';
  }
}

export class ExternalCommandError extends PhpSwitchError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    hint?: string
  ) {
    super(ErrorCodes.EXTERNAL_COMMAND, message, hint);
    this.name = 'ExternalCommandError';
  }
}

export class CorruptionError extends PhpSwitchError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(
      ErrorCodes.CORRUPTION,
      message,
      `Inspect ${path} and remove the partial phpswitch block by hand, or restore a backup`
    );
    this.name = 'CorruptionError';
  }
}

export class UnknownVersionFormatError extends PhpSwitchError {
  constructor(
    public readonly raw: string,
    public readonly file?: string
  ) {
    super(
      ErrorCodes.UNKNOWN_FORMAT,
      file
        ? `Unrecognized PHP version '${raw}' in ${file}`
        : `Unrecognized PHP version '${raw}'`,
      'Use a form like 8.2, 8 or php@8.2'
    );
    this.name = 'UnknownVersionFormatError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
