import assert from 'node:assert/strict';
import { test } from 'node:test';
import { InMemoryTableCatalog } from '@s3t/tables-mock';
import { TableCatalogError } from '../errors';
import { checkNamespaceExists, checkTableBucketExists, checkTableExists, resolveTableBucketArn } from '../existence';

test('table bucket lookup only accepts an exact name', async () => {
  const catalog = new InMemoryTableCatalog();
  catalog.addTableBucket('sales-archive').addTableBucket('sales-2024');

  const prefixOnly = await checkTableBucketExists(catalog, 'sales');
  assert.deepEqual(prefixOnly, { exists: false, arn: '' });
  assert.deepEqual(catalog.calls[0].args, ['sales']);

  catalog.addTableBucket('sales');
  const exact = await checkTableBucketExists(catalog, 'sales');
  assert.deepEqual(exact, { exists: true, arn: 'arn:aws:s3tables:us-east-1:111122223333:bucket/sales' });
});

test('table bucket lookup scans every page of candidates', async () => {
  const catalog = new InMemoryTableCatalog({ pageSize: 1 });
  catalog.addTableBucket('logs-a').addTableBucket('logs-b').addTableBucket('logs');

  const result = await checkTableBucketExists(catalog, 'logs');

  assert.equal(result.exists, true);
  assert.equal(catalog.calls.length, 3);
});

test('table bucket lookup propagates listing failures', async () => {
  const catalog = new InMemoryTableCatalog().failWith('listTableBuckets', 'UnrecognizedClientException');

  await assert.rejects(checkTableBucketExists(catalog, 'sales'), { kind: 'CredentialsMissing' });
});

test('namespace lookup turns not found into absence', async () => {
  const catalog = new InMemoryTableCatalog().addNamespace('analytics', 'sales');
  const arn = catalog.bucketArn('analytics');

  assert.deepEqual(await checkNamespaceExists(catalog, arn, 'sales'), { exists: true, arn: '' });
  assert.deepEqual(await checkNamespaceExists(catalog, arn, 'hr'), { exists: false, arn: '' });
});

test('namespace lookup propagates other failures', async () => {
  const catalog = new InMemoryTableCatalog().addNamespace('analytics', 'sales').failWith('getNamespace', 'ForbiddenException');

  await assert.rejects(checkNamespaceExists(catalog, catalog.bucketArn('analytics'), 'sales'), {
    kind: 'Forbidden',
    operation: 'GetNamespace'
  });
});

test('table lookup returns the table ARN', async () => {
  const catalog = new InMemoryTableCatalog().addTable('analytics', 'sales', 'orders');
  const arn = catalog.bucketArn('analytics');

  assert.deepEqual(await checkTableExists(catalog, arn, 'sales', 'orders'), {
    exists: true,
    arn: 'arn:aws:s3tables:us-east-1:111122223333:bucket/analytics/table/sales.orders'
  });
  assert.deepEqual(await checkTableExists(catalog, arn, 'sales', 'refunds'), { exists: false, arn: '' });
  assert.deepEqual(await checkTableExists(catalog, arn, 'missing', 'orders'), { exists: false, arn: '' });
});

test('table lookup propagates other failures', async () => {
  const catalog = new InMemoryTableCatalog().addTable('analytics', 'sales', 'orders').failWith('getTable', 'InternalServerErrorException');

  await assert.rejects(checkTableExists(catalog, catalog.bucketArn('analytics'), 'sales', 'orders'), {
    kind: 'InternalServiceError'
  });
});

test('resolveTableBucketArn reports a missing bucket by name', async () => {
  const catalog = new InMemoryTableCatalog().addTableBucket('analytics');

  assert.equal(await resolveTableBucketArn(catalog, 'analytics'), catalog.bucketArn('analytics'));
  await assert.rejects(resolveTableBucketArn(catalog, 'analytic'), (error: unknown) => {
    assert.ok(error instanceof TableCatalogError);
    assert.equal(error.kind, 'NotFound');
    assert.equal(
      error.message,
      "GetTableBucketARN: table bucket 'analytic' not found - verify the table bucket name and try again"
    );
    return true;
  });
});
