import { AgentErrorKind } from '../interfaces/common';

export type AgentErrorCode =
  | 'INVALID_MODE'
  | 'INVALID_PAYLOAD'
  | 'INVALID_JSON'
  | 'MODE_MISMATCH'
  | 'PROBE_TIMEOUT'
  | 'PROBE_FAILED';

/**
 * Error raised by the agent. `kind` decides how the HTTP boundary reports it;
 * `code` is the machine-readable reason.
 */
export class AgentError extends Error {
  readonly kind: AgentErrorKind;
  readonly code: AgentErrorCode;
  readonly context: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(kind: AgentErrorKind, code: AgentErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AgentError';
    this.kind = kind;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
  }

  toJSON(): { kind: AgentErrorKind; code: AgentErrorCode; message: string } {
    return { kind: this.kind, code: this.code, message: this.message };
  }
}

export function invalidInput(code: AgentErrorCode, message: string, context?: Record<string, unknown>): AgentError {
  return new AgentError('InvalidInput', code, message, context);
}

export function invalidOperation(code: AgentErrorCode, message: string, context?: Record<string, unknown>): AgentError {
  return new AgentError('InvalidOperation', code, message, context);
}

export function probeUnavailable(code: AgentErrorCode, message: string, context?: Record<string, unknown>): AgentError {
  return new AgentError('ProbeUnavailable', code, message, context);
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
