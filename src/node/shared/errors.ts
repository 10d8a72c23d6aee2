/**
 * Custom error classes for the sync engine.
 * Every phase throws one of these; the CLI reports them and exits non-zero.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git operation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when the starting directory is not inside a git working copy.
 */
export class NotARepositoryError extends AppError {
  constructor(
    message: string,
    public readonly dir: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'NotARepositoryError'
  }
}

/**
 * Error thrown when the submodule registration is inconsistent.
 */
export class ModuleGraphError extends AppError {
  constructor(
    message: string,
    public readonly modulePath: string
  ) {
    super(message)
    this.name = 'ModuleGraphError'
  }
}

/**
 * Error thrown when pushing a synthetic commit to the replica fails.
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly modulePath: string,
    public readonly destination: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'TransportError'
  }
}

/**
 * Error thrown when the composed apply script exits non-zero.
 * How many module steps ran before the failure is unknown.
 */
export class RemoteApplyError extends AppError {
  constructor(
    message: string,
    public readonly exitCode: number | null
  ) {
    super(message)
    this.name = 'RemoteApplyError'
  }
}

/**
 * Error thrown when a validation check fails.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}
