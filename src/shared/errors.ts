/**
 * Error Types
 *
 * Errors raised by the context, the HTTP adapter and configuration.
 * Route misses (404) and method mismatches (405) are responses, never errors.
 */

export class SwitchyardError extends Error {
  public readonly timestamp: Date;

  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// Variable Errors
// ============================================================================

export class VariableNotFoundError extends SwitchyardError {
  constructor(public readonly variable: string) {
    super(`Variable "${variable}" is not bound`, 'VARIABLE_NOT_FOUND', 500, { variable });
  }
}

export class VariableTypeError extends SwitchyardError {
  constructor(
    public readonly variable: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `Variable "${variable}" is ${actual}, not ${expected}`,
      'VARIABLE_TYPE_MISMATCH',
      500,
      { variable, expected, actual }
    );
  }
}

// ============================================================================
// Response Errors
// ============================================================================

export class ResponseAlreadySentError extends SwitchyardError {
  constructor() {
    super('Response already sent', 'RESPONSE_ALREADY_SENT', 500);
  }
}

// ============================================================================
// Body Errors
// ============================================================================

export class BodyDecodeError extends SwitchyardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BODY_DECODE_ERROR', 400, details);
  }
}

export class BodyTooLargeError extends SwitchyardError {
  constructor(public readonly limit: number) {
    super('Request body too large', 'BODY_TOO_LARGE', 413, { limit });
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends SwitchyardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', 500, details);
  }
}
