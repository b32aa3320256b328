/**
 * Custom error classes
 *
 * All gateway errors extend ToolgateError for consistent error handling.
 */

export class ToolgateError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ToolgateError';
  }
}

export class ValidationError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_failed', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Qualified tool name is not exactly "<kind>.<tool>"
 */
export class NameFormatError extends ToolgateError {
  constructor(toolName: string) {
    super(`Invalid tool name format: ${toolName} (expected "<kind>.<tool>")`, 'invalid_tool_name', 400, {
      tool_name: toolName,
    });
    this.name = 'NameFormatError';
  }
}

export class NoConnectionError extends ToolgateError {
  constructor(kind: string) {
    super(`No connection for kind: ${kind}`, 'no_connection', 404, { kind });
    this.name = 'NoConnectionError';
  }
}

export class NotFoundError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'not_found', 404, details);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'conflict', 409, details);
    this.name = 'ConflictError';
  }
}

export class PermissionDeniedError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'permission_denied', 403, details);
    this.name = 'PermissionDeniedError';
  }
}

export class BackendError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'backend_error', 502, details);
    this.name = 'BackendError';
  }
}

/**
 * Backend call aborted by the caller (signal or timeout)
 */
export class CancelledError extends ToolgateError {
  constructor(reason: string) {
    super(`Tool call cancelled: ${reason}`, 'call_cancelled', 499, { reason });
    this.name = 'CancelledError';
  }
}

export class VaultError extends ToolgateError {
  constructor(message: string, code: string = 'vault_error') {
    super(message, code, 500);
    this.name = 'VaultError';
  }
}

/**
 * Ciphertext was not produced by this vault (wrong key, tampering, corruption)
 */
export class DecryptionError extends VaultError {
  constructor(message: string = 'Credential decryption failed') {
    super(message, 'decryption_failed');
    this.name = 'DecryptionError';
  }
}

export class ServiceUnavailableError extends ToolgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'service_unavailable', 503, details);
    this.name = 'ServiceUnavailableError';
  }
}

export class ConfigurationError extends ToolgateError {
  constructor(message: string, code: string = 'configuration_error') {
    super(message, code, 500);
    this.name = 'ConfigurationError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
