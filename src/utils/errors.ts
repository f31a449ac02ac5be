/**
 * Error taxonomy for the delegation engine.
 *
 * Every thrown error extends OAuthSecurityError so callers can switch on
 * `code` and HTTP layers can map `statusCode` directly.
 *
 * - ConfigurationError: fatal, raised while wiring the provider
 * - CredentialRuntimeError: transient, raised while producing a credential
 * - TokenExchangeError / MetadataDiscoveryError: authorization server failures
 * - ResourceAccessError: handler asked for a resource that has no token
 */

export interface SecurityError extends Error {
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export class OAuthSecurityError extends Error implements SecurityError {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OAuthSecurityError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSecurityError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): OAuthSecurityError {
  return new OAuthSecurityError(code, message, statusCode, details);
}

// ============================================================================
// Configuration errors (fatal)
// ============================================================================

export class ConfigurationError extends OAuthSecurityError {
  constructor(message: string, details?: Record<string, unknown>, code: string = 'CONFIGURATION_ERROR') {
    super(code, message, 500, details);
    this.name = 'ConfigurationError';
  }
}

export class ClientSecretConfigurationError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'CLIENT_SECRET_CONFIGURATION');
    this.name = 'ClientSecretConfigurationError';
  }
}

export class EKSWorkloadIdentityConfigurationError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'EKS_WORKLOAD_IDENTITY_CONFIGURATION');
    this.name = 'EKSWorkloadIdentityConfigurationError';
  }
}

export class AuthProviderConfigurationError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'AUTH_PROVIDER_CONFIGURATION');
    this.name = 'AuthProviderConfigurationError';
  }
}

/** Handler wrapped by grant() does not accept an identity context. */
export class MissingContextError extends ConfigurationError {
  constructor(message: string) {
    super(message, undefined, 'MISSING_CONTEXT_PARAMETER');
    this.name = 'MissingContextError';
  }
}

/** Handler wrapped by grant() does not accept an AccessContext. */
export class MissingAccessContextError extends ConfigurationError {
  constructor(message: string) {
    super(message, undefined, 'MISSING_ACCESS_CONTEXT_PARAMETER');
    this.name = 'MissingAccessContextError';
  }
}

// ============================================================================
// Runtime errors (retryable)
// ============================================================================

export class CredentialRuntimeError extends OAuthSecurityError {
  constructor(message: string, details?: Record<string, unknown>, code: string = 'CREDENTIAL_RUNTIME_ERROR') {
    super(code, message, 503, details);
    this.name = 'CredentialRuntimeError';
  }
}

export class EKSWorkloadIdentityRuntimeError extends CredentialRuntimeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'EKS_WORKLOAD_IDENTITY_RUNTIME');
    this.name = 'EKSWorkloadIdentityRuntimeError';
  }
}

// ============================================================================
// Authorization server errors
// ============================================================================

export class TokenExchangeError extends OAuthSecurityError {
  readonly oauthError?: string;
  readonly httpStatus?: number;

  constructor(
    message: string,
    options: { oauthError?: string; httpStatus?: number; details?: Record<string, unknown> } = {}
  ) {
    super('TOKEN_EXCHANGE_FAILED', message, 502, {
      ...options.details,
      ...(options.oauthError && { oauthError: options.oauthError }),
      ...(options.httpStatus !== undefined && { httpStatus: options.httpStatus }),
    });
    this.name = 'TokenExchangeError';
    this.oauthError = options.oauthError;
    this.httpStatus = options.httpStatus;
  }
}

export class MetadataDiscoveryError extends OAuthSecurityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('METADATA_DISCOVERY_FAILED', message, 502, details);
    this.name = 'MetadataDiscoveryError';
  }
}

// ============================================================================
// Handler-facing errors
// ============================================================================

export class ResourceAccessError extends OAuthSecurityError {
  constructor(
    message: string,
    public readonly resource: string,
    details?: Record<string, unknown>
  ) {
    super('RESOURCE_ACCESS_DENIED', message, 403, { resource, ...details });
    this.name = 'ResourceAccessError';
  }
}

/** Human-readable message from anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof OAuthSecurityError) {
    return {
      type: 'SecurityError',
      name: error.name,
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

export function createErrorResponse(error: SecurityError): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
