import type { ErrorCode } from '../errors.js';

const STATUS_MESSAGES: Record<number, string> = {
  400: 'Invalid request parameters provided.',
  401: 'Authentication failed - please check your access token.',
  403: 'Access denied - insufficient permissions for this operation.',
  404: 'Requested resource not found.',
  408: 'Request timeout - the operation took too long.',
  429: 'Rate limit exceeded - please wait before making more requests.',
  500: 'Internal server error occurred.',
  502: 'Bad gateway - upstream service unavailable.',
  503: 'Service temporarily unavailable.',
  504: 'Gateway timeout - upstream service did not respond.'
};

const NOT_FOUND_HINTS: ReadonlyArray<{ marker: string; hint: string }> = [
  { marker: 'releases', hint: 'The release may not exist in your tenant.' },
  { marker: 'auditlogs', hint: 'Audit logs may not be available on your Mender plan or version.' },
  { marker: 'devices', hint: 'The device ID may not exist or you lack access to it.' },
  { marker: 'deployments', hint: 'The deployment ID may not exist or logs may not be available.' }
];

const GENERIC_NOT_FOUND_HINT = 'The requested endpoint may not be available in your Mender version.';
const SERVER_SIDE_HINT = 'This appears to be a temporary issue with the Mender service.';

function notFoundHint(path: string): string {
  const lower = path.toLowerCase();
  const match = NOT_FOUND_HINTS.find((candidate) => lower.includes(candidate.marker));
  return match?.hint ?? GENERIC_NOT_FOUND_HINT;
}

/**
 * Caller-facing text for a failed Mender response. Built from the status and
 * the request path only; the response body never contributes.
 */
export function describeHttpFailure(statusCode: number, path = ''): string {
  const base = STATUS_MESSAGES[statusCode] ?? `Unrecognized status ${statusCode} from the Mender service.`;

  if (statusCode === 401) {
    return `${base} Verify your Personal Access Token is valid and has appropriate permissions.`;
  }
  if (statusCode === 403) {
    return `${base} Your token may lack required permissions (Device Management, Deployment Management).`;
  }
  if (statusCode === 404) {
    return `${base} ${notFoundHint(path)}`;
  }
  if (statusCode === 429) {
    return `${base} The Mender API rate limit has been exceeded.`;
  }
  if (statusCode >= 500) {
    return `${base} ${SERVER_SIDE_HINT}`;
  }

  return base;
}

export function errorCodeForStatus(statusCode: number): ErrorCode {
  if (statusCode === 401) {
    return 'AUTH';
  }
  if (statusCode === 403) {
    return 'FORBIDDEN';
  }
  if (statusCode === 404) {
    return 'NOT_FOUND';
  }
  if (statusCode === 408) {
    return 'TIMEOUT';
  }
  if (statusCode === 429) {
    return 'RATE_LIMITED';
  }
  if (statusCode >= 500) {
    return 'UPSTREAM';
  }
  return 'BAD_REQUEST';
}
