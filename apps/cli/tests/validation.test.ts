import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  ValidationError,
  validateAll,
  validateNamespaceName,
  validateTableBucketName,
  validateTableName
} from '../src/lib/validation';

function reasonOf(run: () => void): string {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.message;
    }
    throw error;
  }
  return 'valid';
}

test('table bucket names are 3 to 63 lowercase letters, digits or hyphens', () => {
  assert.equal(reasonOf(() => validateTableBucketName('abc')), 'valid');
  assert.equal(reasonOf(() => validateTableBucketName('a'.repeat(63))), 'valid');
  assert.equal(reasonOf(() => validateTableBucketName('sales-2024')), 'valid');
  assert.equal(reasonOf(() => validateTableBucketName('ab')), 'invalid table-bucket: must be at least 3 characters');
  assert.equal(
    reasonOf(() => validateTableBucketName('a'.repeat(64))),
    'invalid table-bucket: must be at most 63 characters'
  );
  assert.equal(
    reasonOf(() => validateTableBucketName('Sales')),
    'invalid table-bucket: must contain only lowercase letters, numbers, and hyphens'
  );
  assert.equal(
    reasonOf(() => validateTableBucketName('sales_2024')),
    'invalid table-bucket: must contain only lowercase letters, numbers, and hyphens'
  );
});

test('namespace and table names are 1 to 255 lowercase letters, digits or underscores', () => {
  assert.equal(reasonOf(() => validateNamespaceName('a')), 'valid');
  assert.equal(reasonOf(() => validateNamespaceName('daily_sales_2024')), 'valid');
  assert.equal(reasonOf(() => validateTableName('b'.repeat(255))), 'valid');
  assert.equal(reasonOf(() => validateNamespaceName('')), 'invalid namespace: must be at least 1 character');
  assert.equal(reasonOf(() => validateTableName('b'.repeat(256))), 'invalid table: must be at most 255 characters');
  assert.equal(
    reasonOf(() => validateNamespaceName('daily-sales')),
    'invalid namespace: must contain only lowercase letters, numbers, and underscores'
  );
  assert.equal(
    reasonOf(() => validateTableName('Orders')),
    'invalid table: must contain only lowercase letters, numbers, and underscores'
  );
});

test('validateAll reports the first invalid argument', () => {
  assert.equal(reasonOf(() => validateAll('analytics', 'sales', 'orders')), 'valid');
  assert.equal(reasonOf(() => validateAll('x', 'Bad-Ns', 'Bad-Table')), 'invalid table-bucket: must be at least 3 characters');
  assert.equal(
    reasonOf(() => validateAll('analytics', 'sales', 'order-lines')),
    'invalid table: must contain only lowercase letters, numbers, and underscores'
  );
});

test('validation errors expose the field and reason', () => {
  assert.throws(
    () => validateNamespaceName('a.b'),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.field === 'namespace' &&
      error.reason === 'must contain only lowercase letters, numbers, and underscores'
  );
});
