export type CliErrorCode =
  | 'NO_LINKED_PROJECT'
  | 'PROJECT_NOT_FOUND'
  | 'HOME_DIRECTORY_UNAVAILABLE'
  | 'CONFIG_WRITE_FAILED'
  | 'UPDATE_CHECK_FAILED'
  | 'UNAUTHORIZED';

/**
 * Base class for failures that commands surface with a stable error code.
 */
export class CliError extends Error {
  constructor(
    public readonly code: CliErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CliError';
  }
}

export class NoLinkedProjectError extends CliError {
  constructor() {
    super('NO_LINKED_PROJECT', 'No linked project found. Run `railway link` to connect to a project');
    this.name = 'NoLinkedProjectError';
  }
}

export class ProjectNotFoundError extends CliError {
  constructor(message = 'Project not found. Run `railway link` to connect to a project') {
    super('PROJECT_NOT_FOUND', message);
    this.name = 'ProjectNotFoundError';
  }
}

export class HomeDirectoryError extends CliError {
  constructor(cause?: unknown) {
    super('HOME_DIRECTORY_UNAVAILABLE', 'Unable to get home directory', { cause });
    this.name = 'HomeDirectoryError';
  }
}

export class ConfigWriteError extends CliError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super('CONFIG_WRITE_FAILED', `Failed to write config file ${path}: ${describeError(cause)}`, { cause });
    this.name = 'ConfigWriteError';
  }
}

export class UpdateCheckError extends CliError {
  constructor(message: string, cause?: unknown) {
    super('UPDATE_CHECK_FAILED', message, { cause });
    this.name = 'UpdateCheckError';
  }
}

export class UnauthorizedError extends CliError {
  constructor() {
    super('UNAUTHORIZED', 'Unauthorized. Please login with `railway login`');
    this.name = 'UnauthorizedError';
  }
}

/**
 * HTTP or GraphQL failure returned by the platform API.
 */
export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
