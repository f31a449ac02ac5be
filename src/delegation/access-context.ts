import type { TokenResponse } from '../oauth/types.js';
import { ResourceAccessError } from '../utils/errors.js';
import type { AccessStatus, ResourceError } from './types.js';

/**
 * Outcome of one grant invocation: a token or an error per resource, plus
 * an optional global error that applies to every resource.
 *
 * A resource never holds both a token and an error. Created per call and
 * handed to exactly one handler.
 */
export class AccessContext {
  private readonly tokens = new Map<string, TokenResponse>();
  private readonly resourceErrors = new Map<string, ResourceError>();
  private globalError?: ResourceError;

  setToken(resource: string, token: TokenResponse): void {
    this.tokens.set(resource, token);
    this.resourceErrors.delete(resource);
  }

  setBulkTokens(tokens: Record<string, TokenResponse>): void {
    for (const [resource, token] of Object.entries(tokens)) {
      this.setToken(resource, token);
    }
  }

  setResourceError(resource: string, error: ResourceError): void {
    this.resourceErrors.set(resource, error);
    this.tokens.delete(resource);
  }

  setError(error: ResourceError): void {
    this.globalError = error;
  }

  /**
   * Returns the token for `resource`.
   *
   * @throws ResourceAccessError if a global error is set, the resource
   *   failed, or no token was obtained for it
   */
  access(resource: string): TokenResponse {
    if (this.globalError) {
      throw new ResourceAccessError(
        `Access denied for ${resource}: ${this.globalError.message}`,
        resource,
        { code: this.globalError.code }
      );
    }

    const resourceError = this.resourceErrors.get(resource);
    if (resourceError) {
      throw new ResourceAccessError(
        `Access denied for ${resource}: ${resourceError.message}`,
        resource,
        { code: resourceError.code }
      );
    }

    const token = this.tokens.get(resource);
    if (!token) {
      throw new ResourceAccessError(`No token available for resource: ${resource}`, resource);
    }
    return token;
  }

  hasError(): boolean {
    return this.globalError !== undefined;
  }

  hasResourceError(resource: string): boolean {
    return this.resourceErrors.has(resource);
  }

  hasErrors(): boolean {
    return this.hasError() || this.resourceErrors.size > 0;
  }

  getError(): ResourceError | undefined {
    return this.globalError;
  }

  getResourceError(resource: string): ResourceError | undefined {
    return this.resourceErrors.get(resource);
  }

  getResourceErrors(): Record<string, ResourceError> {
    return Object.fromEntries(this.resourceErrors);
  }

  /** Global error (if any) under `_global`, then every resource error. */
  getErrors(): Record<string, ResourceError> {
    return {
      ...(this.globalError && { _global: this.globalError }),
      ...this.getResourceErrors(),
    };
  }

  getStatus(): AccessStatus {
    if (this.globalError) {
      return 'error';
    }
    // Resource-level failures never escalate to 'error', even when every resource failed
    return this.resourceErrors.size > 0 ? 'partial_error' : 'success';
  }

  getSuccessfulResources(): string[] {
    return [...this.tokens.keys()];
  }

  getFailedResources(): string[] {
    return [...this.resourceErrors.keys()];
  }
}
