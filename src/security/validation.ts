import { z } from 'zod/v4';

import { ValidationError } from '../errors.js';

export const DEVICE_STATUSES = ['accepted', 'rejected', 'pending', 'noauth', 'preauth'] as const;
export const DEPLOYMENT_STATUSES = ['inprogress', 'finished', 'pending', 'scheduled'] as const;

const IDENTIFIER_PATTERN = /^[A-Za-z0-9._-]+$/;
const DEVICE_TYPE_PATTERN = /^[A-Za-z0-9._\s-]+$/;
const NO_CONTROL_CHARS_PATTERN = /^[^\p{Cc}]+$/u;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

function hasTraversal(value: string): boolean {
  return value.includes('..') || value.startsWith('/') || value.endsWith('/');
}

export function identifierSchema(label: string) {
  return z
    .string()
    .min(1, `${label} must not be empty`)
    .max(128, `${label} must be at most 128 characters`)
    .regex(IDENTIFIER_PATTERN, `${label} may only contain letters, digits, '.', '_' and '-'`)
    .refine((value) => !hasTraversal(value), {
      message: `${label} must not contain '..' or start or end with '/'`,
      params: { rule: 'path_traversal' }
    });
}

export const releaseNameSchema = z
  .string()
  .min(1, 'release name must not be empty')
  .max(256, 'release name must be at most 256 characters')
  .refine((value) => !value.includes('..') && !value.startsWith('/'), {
    message: "release name must not contain '..' or start with '/'",
    params: { rule: 'path_traversal' }
  });

export function limitSchema(max: number) {
  return z
    .number()
    .int('limit must be an integer')
    .min(1, 'limit must be at least 1')
    .max(max, `limit must be at most ${max}`);
}

export const skipSchema = z.number().int('skip must be an integer').min(0, 'skip must not be negative');

export const deviceStatusSchema = z.enum(DEVICE_STATUSES, {
  error: `status must be one of: ${DEVICE_STATUSES.join(', ')}`
});

export const deploymentStatusSchema = z.enum(DEPLOYMENT_STATUSES, {
  error: `status must be one of: ${DEPLOYMENT_STATUSES.join(', ')}`
});

export const deviceTypeSchema = z
  .string()
  .min(1, 'device type must not be empty')
  .max(128, 'device type must be at most 128 characters')
  .regex(DEVICE_TYPE_PATTERN, "device type may only contain letters, digits, spaces, '.', '_' and '-'");

export function freeTextSchema(label: string) {
  return z
    .string()
    .min(1, `${label} must not be empty`)
    .max(128, `${label} must be at most 128 characters`)
    .regex(NO_CONTROL_CHARS_PATTERN, `${label} must not contain control characters`);
}

export function isoDateSchema(label: string) {
  return z.string().refine((value) => ISO_DATE_PATTERN.test(value) && Number.isFinite(Date.parse(value)), {
    message: `${label} must be an ISO-8601 date or date-time`,
    params: { rule: 'iso_date' }
  });
}

export const deviceIdArgsSchema = z.strictObject({
  device_id: identifierSchema('device ID')
});

export const deploymentIdArgsSchema = z.strictObject({
  deployment_id: identifierSchema('deployment ID')
});

export const artifactIdArgsSchema = z.strictObject({
  artifact_id: identifierSchema('artifact ID')
});

export const deploymentDeviceLogArgsSchema = z.strictObject({
  deployment_id: identifierSchema('deployment ID'),
  device_id: identifierSchema('device ID')
});

export const releaseNameArgsSchema = z.strictObject({
  release_name: releaseNameSchema
});

export const listDevicesArgsSchema = z.strictObject({
  status: deviceStatusSchema.optional(),
  device_type: deviceTypeSchema.optional(),
  limit: limitSchema(500).default(20),
  skip: skipSchema.optional()
});

export const listDeploymentsArgsSchema = z.strictObject({
  status: deploymentStatusSchema.optional(),
  limit: limitSchema(100).default(10),
  skip: skipSchema.optional()
});

export const listReleasesArgsSchema = z.strictObject({
  name: freeTextSchema('name filter').optional(),
  tag: freeTextSchema('tag filter').optional(),
  limit: limitSchema(100).default(20)
});

export const listInventoryArgsSchema = z.strictObject({
  limit: limitSchema(500).default(20),
  has_attribute: freeTextSchema('attribute name').optional()
});

export const listAuditLogsArgsSchema = z
  .strictObject({
    user: freeTextSchema('user').optional(),
    action: freeTextSchema('action').optional(),
    object_type: freeTextSchema('object type').optional(),
    start_date: isoDateSchema('start date').optional(),
    end_date: isoDateSchema('end date').optional(),
    limit: limitSchema(500).default(20)
  })
  .refine(
    (value) =>
      value.start_date === undefined ||
      value.end_date === undefined ||
      Date.parse(value.start_date) <= Date.parse(value.end_date),
    {
      message: 'end date must not be earlier than start date',
      path: ['end_date'],
      params: { rule: 'date_order' }
    }
  );

type Issue = z.core.$ZodIssue;

function issueField(issue: Issue): string {
  if (issue.code === 'unrecognized_keys') {
    return issue.keys[0] ?? '(root)';
  }
  const path = issue.path.map((segment) => String(segment)).join('.');
  return path || '(root)';
}

function issueRule(issue: Issue): string {
  switch (issue.code) {
    case 'too_small':
      return issue.origin === 'string' ? 'min_length' : 'minimum';
    case 'too_big':
      return issue.origin === 'string' ? 'max_length' : 'maximum';
    case 'invalid_format':
      return issue.format === 'regex' ? 'pattern' : issue.format;
    case 'invalid_value':
      return 'allowed_values';
    case 'invalid_type':
      return 'type';
    case 'unrecognized_keys':
      return 'unknown_key';
    case 'custom': {
      const rule = issue.params?.rule;
      return typeof rule === 'string' ? rule : 'custom';
    }
    default:
      return issue.code;
  }
}

function valueAtPath(raw: unknown, path: ReadonlyArray<PropertyKey>): unknown {
  let current: unknown = raw;
  for (const segment of path) {
    if (!current || typeof current !== 'object' || typeof segment === 'symbol') {
      return undefined;
    }
    const next: unknown = Reflect.get(current, segment);
    current = next;
  }
  return current;
}

function issueMessage(issue: Issue, field: string, raw: unknown): string {
  if (issue.code === 'unrecognized_keys') {
    return `unknown argument '${field}'`;
  }
  if (issue.code === 'invalid_type' && valueAtPath(raw, issue.path) === undefined) {
    return `${field} is required`;
  }
  return issue.message;
}

/**
 * Checks raw tool arguments against a schema. Returns the parsed value or
 * throws a ValidationError naming the first offending field and rule.
 */
export function validateArgs<T extends z.ZodType>(schema: T, raw: unknown): z.output<T> {
  const input = raw ?? {};
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (!issue) {
    throw new ValidationError('(root)', 'unknown', 'Input validation failed.');
  }

  const field = issueField(issue);
  const rule = issueRule(issue);
  throw new ValidationError(field, rule, `Input validation failed for '${field}': ${issueMessage(issue, field, input)}`);
}

export type DeviceStatus = (typeof DEVICE_STATUSES)[number];
