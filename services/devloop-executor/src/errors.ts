/**
 * Executor error taxonomy
 *
 * Operational errors are expected failures (sandbox cap reached, planner
 * down) whose message is safe to send to the front-end. Anything else is a
 * bug and goes out as `internal_error` with a generic message.
 */

import { ProtocolError } from '@devloop/sdk';
import type { WireErrorCode } from '@devloop/sdk';

export class ExecutorError extends Error {
  constructor(
    public readonly code: WireErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly isOperational: boolean = true
  ) {
    super(message);
    this.name = 'ExecutorError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ProvisionFailure = 'resource_exhausted' | 'environment_unavailable';

export class ProvisionError extends ExecutorError {
  constructor(
    public readonly reason: ProvisionFailure,
    message: string,
    public readonly cause?: unknown
  ) {
    super('provision_failed', message, { reason });
    this.name = 'ProvisionError';
  }
}

/**
 * A command could not be run or did not succeed.
 * The only error class eligible for automatic recovery through replanning.
 */
export class CommandError extends ExecutorError {
  constructor(
    message: string,
    public readonly commandId?: string,
    details?: Record<string, unknown>
  ) {
    super('protocol_error', message, { commandId, ...details });
    this.name = 'CommandError';
  }
}

export class PlanningUnavailableError extends ExecutorError {
  constructor(
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('planning_unavailable', `Planner unavailable after ${attempts} attempts${detail}`, { attempts });
    this.name = 'PlanningUnavailableError';
  }
}

export class PreferenceStoreError extends ExecutorError {
  constructor(message: string, public readonly cause?: unknown) {
    super('preference_store_unavailable', message);
    this.name = 'PreferenceStoreError';
  }
}

export class InvalidStateError extends ExecutorError {
  constructor(message: string) {
    super('invalid_state', message);
    this.name = 'InvalidStateError';
  }
}

export interface WireError {
  code: WireErrorCode;
  message: string;
  fatal: boolean;
}

/**
 * Map any thrown value to a message that is safe to put on the wire
 */
export function toWireError(error: unknown, fatal: boolean = false): WireError {
  if (error instanceof ProtocolError) {
    return { code: error.code, message: error.message, fatal: fatal || error.fatal };
  }
  if (error instanceof ExecutorError && error.isOperational) {
    return { code: error.code, message: error.message, fatal };
  }
  return { code: 'internal_error', message: 'Internal executor error', fatal };
}
