import { describe, expect, test } from 'vitest';

import { MenderApiError, ValidationError } from '../../src/errors.js';
import {
  deploymentDeviceLogArgsSchema,
  deviceIdArgsSchema,
  listAuditLogsArgsSchema,
  listDeploymentsArgsSchema,
  listDevicesArgsSchema,
  listReleasesArgsSchema,
  releaseNameArgsSchema,
  validateArgs
} from '../../src/security/validation.js';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('identifier validation', () => {
  test('accepts a well-formed identifier', () => {
    expect(validateArgs(deviceIdArgsSchema, { device_id: 'abc-123.def' })).toEqual({ device_id: 'abc-123.def' });
  });

  test.each([
    ['../etc', 'pattern'],
    ['/abc', 'pattern'],
    ['abc/', 'pattern'],
    ['', 'min_length'],
    ['a..b', 'path_traversal'],
    ['x'.repeat(129), 'max_length']
  ])('rejects %j with rule %s', (value, rule) => {
    const error = captureValidationError(() => validateArgs(deviceIdArgsSchema, { device_id: value }));

    expect(error.field).toBe('device_id');
    expect(error.rule).toBe(rule);
    expect(error.code).toBe('VALIDATION');
    expect(error.details).toEqual({ field: 'device_id', rule });
  });

  test('reports the first failing field of a multi-field schema', () => {
    const error = captureValidationError(() =>
      validateArgs(deploymentDeviceLogArgsSchema, { deployment_id: 'dep-1', device_id: 'a..b' })
    );

    expect(error.field).toBe('device_id');
    expect(error.message).toBe("Input validation failed for 'device_id': device ID must not contain '..' or start or end with '/'");
  });

  test('reports missing required fields', () => {
    const error = captureValidationError(() => validateArgs(deviceIdArgsSchema, {}));

    expect(error.field).toBe('device_id');
    expect(error.rule).toBe('type');
    expect(error.message).toBe("Input validation failed for 'device_id': device_id is required");
  });

  test('rejects unknown arguments', () => {
    const error = captureValidationError(() => validateArgs(deviceIdArgsSchema, { device_id: 'abc', extra: 1 }));

    expect(error.field).toBe('extra');
    expect(error.rule).toBe('unknown_key');
    expect(error.message).toBe("Input validation failed for 'extra': unknown argument 'extra'");
  });
});

describe('list argument validation', () => {
  test('applies defaults', () => {
    expect(validateArgs(listDevicesArgsSchema, {})).toEqual({ limit: 20 });
    expect(validateArgs(listDevicesArgsSchema, undefined)).toEqual({ limit: 20 });
    expect(validateArgs(listDeploymentsArgsSchema, {})).toEqual({ limit: 10 });
  });

  test('accepts a status filter from the allow-list', () => {
    expect(validateArgs(listDevicesArgsSchema, { status: 'accepted', limit: 10 })).toEqual({
      status: 'accepted',
      limit: 10
    });
  });

  test('rejects a status outside the allow-list', () => {
    const error = captureValidationError(() => validateArgs(listDevicesArgsSchema, { status: 'online' }));

    expect(error.field).toBe('status');
    expect(error.rule).toBe('allowed_values');
    expect(error.message).toBe(
      "Input validation failed for 'status': status must be one of: accepted, rejected, pending, noauth, preauth"
    );
  });

  test.each([
    [0, 'minimum'],
    [501, 'maximum']
  ])('rejects limit %d with rule %s', (limit, rule) => {
    const error = captureValidationError(() => validateArgs(listDevicesArgsSchema, { limit }));

    expect(error.field).toBe('limit');
    expect(error.rule).toBe(rule);
  });

  test('deployments cap the limit at 100', () => {
    const error = captureValidationError(() => validateArgs(listDeploymentsArgsSchema, { limit: 101 }));

    expect(error.rule).toBe('maximum');
    expect(error.message).toBe("Input validation failed for 'limit': limit must be at most 100");
  });

  test('does not coerce numeric strings', () => {
    const error = captureValidationError(() => validateArgs(listDevicesArgsSchema, { limit: '10' }));

    expect(error.field).toBe('limit');
    expect(error.rule).toBe('type');
  });

  test('rejects a negative skip', () => {
    const error = captureValidationError(() => validateArgs(listDevicesArgsSchema, { skip: -1 }));

    expect(error.field).toBe('skip');
    expect(error.rule).toBe('minimum');
  });

  test('rejects control characters in free-text filters', () => {
    const error = captureValidationError(() => validateArgs(listReleasesArgsSchema, { name: 'bad\u0007name' }));

    expect(error.field).toBe('name');
    expect(error.rule).toBe('pattern');
  });
});

describe('release name validation', () => {
  test('allows spaces and dots', () => {
    expect(validateArgs(releaseNameArgsSchema, { release_name: 'my release v1.0' })).toEqual({
      release_name: 'my release v1.0'
    });
  });

  test('rejects traversal', () => {
    const error = captureValidationError(() => validateArgs(releaseNameArgsSchema, { release_name: '../x' }));

    expect(error.rule).toBe('path_traversal');
  });
});

describe('audit log argument validation', () => {
  test('accepts ISO dates in order', () => {
    expect(
      validateArgs(listAuditLogsArgsSchema, {
        start_date: '2024-05-01',
        end_date: '2024-05-02T10:00:00Z'
      })
    ).toEqual({ start_date: '2024-05-01', end_date: '2024-05-02T10:00:00Z', limit: 20 });
  });

  test('rejects a malformed date', () => {
    const error = captureValidationError(() => validateArgs(listAuditLogsArgsSchema, { start_date: 'yesterday' }));

    expect(error.field).toBe('start_date');
    expect(error.rule).toBe('iso_date');
  });

  test('rejects an end date before the start date', () => {
    const error = captureValidationError(() =>
      validateArgs(listAuditLogsArgsSchema, { start_date: '2024-05-02', end_date: '2024-05-01' })
    );

    expect(error.field).toBe('end_date');
    expect(error.rule).toBe('date_order');
  });
});

test('ValidationError is a MenderApiError', () => {
  const error = new ValidationError('limit', 'maximum', 'too big');

  expect(error).toBeInstanceOf(MenderApiError);
  expect(error.name).toBe('ValidationError');
  expect(error.statusCode).toBeUndefined();
});
