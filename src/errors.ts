import type { ClusterHeader } from './types.js';

/**
 * Error taxonomy.
 *
 * - TransientPlatformError: retried by the status updater, requeued by the queue
 * - ResourceNotFoundError: the cluster resource is gone
 * - StructuralValidationError: the topology (or the whole spec) stays invalid
 *   until a user edits it
 * - ExternalProtocolError: a database query failed; conditions degrade to Unknown
 */

export class OperatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** API timeouts, throttling, server errors and version conflicts */
export class TransientPlatformError extends OperatorError {
  constructor(message: string, readonly statusCode?: number, options?: ErrorOptions) {
    super(message, options);
  }
}

/** HTTP 409: the resourceVersion we wrote against is stale */
export class ConflictError extends TransientPlatformError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 409, options);
  }
}

export class ResourceNotFoundError extends OperatorError {}

export class StructuralValidationError extends OperatorError {
  constructor(readonly errors: string[], subject = 'topology') {
    super(`invalid ${subject}: ${errors.join('; ')}`);
  }
}

/** The stored resource does not match the schema; carries the parts that did */
export class InvalidResourceError extends StructuralValidationError {
  constructor(errors: string[], readonly resource: ClusterHeader) {
    super(errors, 'resource');
  }
}

export class ExternalProtocolError extends OperatorError {}

export class AuthError extends ExternalProtocolError {}
export class ConnectionError extends ExternalProtocolError {}
export class TimeoutError extends ExternalProtocolError {}
export class QueryError extends ExternalProtocolError {}

/** Rejected without a call because the cluster's breaker is open */
export class CircuitOpenError extends ExternalProtocolError {}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
