/**
 * Chaos Errors
 *
 * Creation-path errors propagate to the caller. TransportError raised on
 * the stop path is caught by ExperimentHandle.close() and only logged.
 */

import { AppError, ExternalServiceError, ValidationError } from '@chaosline/utils';

export { ValidationError };

/**
 * Missing or malformed chaos configuration (endpoint, env file)
 */
export class ConfigError extends AppError {
  public readonly key?: string;

  constructor(message: string, key?: string) {
    super(message, 'CHAOS_CONFIG_ERROR', 500, false, key ? { key } : undefined);
    this.key = key;
  }
}

/**
 * Thrown when a chaos action is attempted against a production environment
 * without an explicit override
 */
export class SafetyViolationError extends AppError {
  public readonly environment: string;

  constructor(environment: string) {
    super(
      `Chaos experiments are not allowed in ${environment}. ` +
        'Set an explicit production override to run chaos in this environment.',
      'CHAOS_SAFETY_VIOLATION',
      403,
      true,
      { environment }
    );
    this.environment = environment;
  }
}

export type TransportOperation = 'start' | 'stop';

/**
 * Non-2xx response, timeout or I/O failure talking to the control plane
 */
export class TransportError extends ExternalServiceError {
  public readonly operation: TransportOperation;
  public readonly experimentId: string;
  public readonly status?: number;

  constructor(
    operation: TransportOperation,
    experimentId: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(
      'chaos-control-plane',
      message,
      { operation, experimentId, status: options.status },
      'CHAOS_TRANSPORT_ERROR'
    );
    this.operation = operation;
    this.experimentId = experimentId;
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised on demand by CleanupHealth when one or more rollbacks failed
 */
export class RollbackFailedError extends AppError {
  public readonly experimentIds: string[];

  constructor(experimentIds: string[]) {
    super(
      `Failed to roll back ${experimentIds.length} chaos experiment(s): ${experimentIds.join(', ')}`,
      'CHAOS_ROLLBACK_FAILED',
      500,
      true,
      { experimentIds }
    );
    this.experimentIds = experimentIds;
  }
}
