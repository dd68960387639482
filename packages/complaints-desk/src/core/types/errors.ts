/**
 * Complaints Desk Error Types
 *
 * Custom error classes for store, configuration and user-input failures.
 * The CLI loop distinguishes these to decide whether a failure ends the
 * current action, ends the session, or is just a message to the user.
 */

/**
 * Raised when the store cannot be opened, or is used after release.
 */
export class ConnectionError extends Error {
  public readonly name = 'ConnectionError' as const;

  constructor(
    message: string,
    public readonly databasePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Raised when a report parameter cannot be parsed.
 *
 * @example
 * ```typescript
 * throw new InvalidParameterError('ward number', 'north');
 * ```
 */
export class InvalidParameterError extends Error {
  public readonly name = 'InvalidParameterError' as const;

  constructor(
    public readonly parameter: string,
    public readonly input: string
  ) {
    super(`Invalid ${parameter} entered.`);
    Object.setPrototypeOf(this, InvalidParameterError.prototype);
  }
}

/**
 * Raised when the user interrupts a prompt (Ctrl+C or end of input).
 */
export class UserInterruptError extends Error {
  public readonly name = 'UserInterruptError' as const;

  constructor(message = 'Interrupted by user') {
    super(message);
    Object.setPrototypeOf(this, UserInterruptError.prototype);
  }
}

/**
 * Raised for unreadable or invalid configuration.
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly configPath: string | null = null
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    return this.configPath
      ? `ConfigError: ${this.message}\n  File: ${this.configPath}`
      : `ConfigError: ${this.message}`;
  }
}

export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof Error && error.name === 'ConnectionError';
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
  return error instanceof Error && error.name === 'InvalidParameterError';
}

export function isUserInterruptError(error: unknown): error is UserInterruptError {
  return error instanceof Error && error.name === 'UserInterruptError';
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof Error && error.name === 'ConfigError';
}

/**
 * Message text for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
