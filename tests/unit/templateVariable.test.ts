import { describe, expect, test } from 'vitest';

import { ValidationError } from '../../src/errors.js';
import { templateVariable } from '../../src/mcp/server.js';

describe('templateVariable', () => {
  test('decodes percent-encoded values', () => {
    expect(templateVariable({ releaseName: 'rel%202' }, 'releaseName')).toBe('rel 2');
  });

  test('uses the first value of a list', () => {
    expect(templateVariable({ deviceId: ['dev-1', 'dev-2'] }, 'deviceId')).toBe('dev-1');
  });

  test('returns an empty string for a missing variable', () => {
    expect(templateVariable({}, 'deviceId')).toBe('');
  });

  test('reports malformed percent-encoding as a validation error', () => {
    let caught: unknown;
    try {
      templateVariable({ deviceId: '%E0%A4%A' }, 'deviceId');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      code: 'VALIDATION',
      field: 'deviceId',
      rule: 'encoding',
      message: "Input validation failed for 'deviceId': malformed percent-encoding"
    });
  });
});
