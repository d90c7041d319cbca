import { z } from 'zod';

export type ResourceField = 'table-bucket' | 'namespace' | 'table';

export class ValidationError extends Error {
  readonly field: ResourceField;
  readonly reason: string;

  constructor(field: ResourceField, reason: string) {
    super(`invalid ${field}: ${reason}`);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }
}

const tableBucketSchema = z
  .string()
  .min(3, 'must be at least 3 characters')
  .max(63, 'must be at most 63 characters')
  .regex(/^[0-9a-z-]+$/, 'must contain only lowercase letters, numbers, and hyphens');

const namespaceSchema = z
  .string()
  .min(1, 'must be at least 1 character')
  .max(255, 'must be at most 255 characters')
  .regex(/^[0-9a-z_]+$/, 'must contain only lowercase letters, numbers, and underscores');

// Table names follow the namespace rules.
const tableSchema = namespaceSchema;

function check(field: ResourceField, schema: z.ZodString, value: string): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    const [firstIssue] = result.error.issues;
    throw new ValidationError(field, firstIssue?.message ?? 'is not valid');
  }
}

export function validateTableBucketName(name: string): void {
  check('table-bucket', tableBucketSchema, name);
}

export function validateNamespaceName(name: string): void {
  check('namespace', namespaceSchema, name);
}

export function validateTableName(name: string): void {
  check('table', tableSchema, name);
}

export function validateAll(tableBucket: string, namespace: string, table: string): void {
  validateTableBucketName(tableBucket);
  validateNamespaceName(namespace);
  validateTableName(table);
}
