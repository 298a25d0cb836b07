/**
 * Error taxonomy for the relay.
 *
 * Only ModelServiceError and LoopLimitExceededError end a run. The rest are
 * absorbed where they happen: tool failures become result payloads, sink and
 * audit failures are logged and dropped.
 */

export type RelayErrorCode =
  | 'unknown_session'
  | 'duplicate_session'
  | 'tool_execution_failed'
  | 'model_service_failed'
  | 'loop_limit_exceeded'
  | 'sink_delivery_failed'
  | 'audit_log_failed';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownSessionError extends RelayError {
  readonly code = 'unknown_session';

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is not open`);
  }
}

export class DuplicateSessionError extends RelayError {
  readonly code = 'duplicate_session';

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is already active`);
  }
}

export class ToolExecutionError extends RelayError {
  readonly code = 'tool_execution_failed';

  constructor(readonly toolName: string, cause: unknown) {
    super(`Tool ${toolName} failed: ${describeError(cause)}`, { cause });
  }
}

export class ModelServiceError extends RelayError {
  readonly code = 'model_service_failed';

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }

  /** HTTP status from the model service, when there was a response at all. */
  readonly status: number | undefined;
}

export class LoopLimitExceededError extends RelayError {
  readonly code = 'loop_limit_exceeded';

  constructor(readonly limit: number) {
    super(`Model still requested tools after ${limit} round-trips`);
  }
}

export class SinkDeliveryError extends RelayError {
  readonly code = 'sink_delivery_failed';

  constructor(readonly sessionId: string, cause: unknown) {
    super(`Could not deliver notification to session ${sessionId}: ${describeError(cause)}`, { cause });
  }
}

export class AuditLogError extends RelayError {
  readonly code = 'audit_log_failed';

  constructor(readonly operation: string, cause: unknown) {
    super(`Audit ${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(value: unknown): string {
  if (value instanceof Error) {
    return value.message || value.name;
  }
  if (typeof value === 'string') {
    return value;
  }
  return 'Unknown error';
}
