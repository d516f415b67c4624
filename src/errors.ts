import { sanitizeMessage } from './security/redaction.js';

export type ErrorCode =
  | 'AUTH'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'BAD_REQUEST'
  | 'UPSTREAM'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'VALIDATION'
  | 'INTERNAL'
  | 'UNKNOWN';

export interface SuggestedToolCall {
  name: string;
  args?: Record<string, unknown>;
}

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
  suggestedNextToolCalls: SuggestedToolCall[];
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  AUTH: {
    retryable: false,
    fixHint: 'Verify the Mender Personal Access Token is valid and not expired.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  FORBIDDEN: {
    retryable: false,
    fixHint: 'Grant the token the required roles (Device Management, Deployment Management) and retry.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  NOT_FOUND: {
    retryable: false,
    fixHint: 'List the resource again and retry with an existing ID or name.',
    suggestedNextToolCalls: [
      { name: 'mender.devices.list', args: { limit: 20 } },
      { name: 'mender.deployments.list', args: { limit: 10 } }
    ]
  },
  RATE_LIMITED: {
    retryable: true,
    fixHint: 'Wait before issuing more requests to the Mender server.',
    suggestedNextToolCalls: []
  },
  BAD_REQUEST: {
    retryable: false,
    fixHint: 'Check the filter values sent to the Mender server.',
    suggestedNextToolCalls: []
  },
  UPSTREAM: {
    retryable: true,
    fixHint: 'The Mender service reported a server-side failure; retry later.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  NETWORK: {
    retryable: true,
    fixHint: 'Check the Mender server URL and network connectivity, then retry.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  TIMEOUT: {
    retryable: true,
    fixHint: 'Retry the operation and increase MENDER_TIMEOUT_MS if latency is high.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  INVALID_RESPONSE: {
    retryable: false,
    fixHint: 'The Mender server answered in an unexpected format; verify the server URL points at the management API.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  },
  VALIDATION: {
    retryable: false,
    fixHint: 'Fix tool arguments to match the input schema and required fields.',
    suggestedNextToolCalls: []
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the server logs.',
    suggestedNextToolCalls: []
  },
  UNKNOWN: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the server logs.',
    suggestedNextToolCalls: [{ name: 'mender.health.get' }]
  }
};

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[code] ?? ACTIONABLE_ERROR_DEFAULTS.UNKNOWN;
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint,
    suggestedNextToolCalls: defaults.suggestedNextToolCalls.map((item) => ({
      name: item.name,
      ...(item.args ? { args: { ...item.args } } : {})
    }))
  };
}

/**
 * Failure raised by the Mender client. The message is always safe to show to
 * the caller; `statusCode` is set only when the Mender server answered.
 */
export class MenderApiError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'MenderApiError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export class ValidationError extends MenderApiError {
  public readonly field: string;
  public readonly rule: string;

  constructor(field: string, rule: string, message: string) {
    super('VALIDATION', message, { details: { field, rule } });
    this.name = 'ValidationError';
    this.field = field;
    this.rule = rule;
  }
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof MenderApiError && error.statusCode === 404;
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asMenderApiError(value: unknown): MenderApiError {
  if (value instanceof MenderApiError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new MenderApiError('TIMEOUT', 'Network error: the request to the Mender server timed out.', { cause: err });
  }

  return new MenderApiError('INTERNAL', `Unexpected error: ${sanitizeMessage(err.message)}`, { cause: err });
}
