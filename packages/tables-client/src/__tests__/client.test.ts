import assert from 'node:assert/strict';
import { test, type TestContext } from 'node:test';
import {
  CreateNamespaceCommand,
  CreateTableBucketCommand,
  CreateTableCommand,
  GetNamespaceCommand,
  GetTableCommand,
  ListNamespacesCommand,
  ListTableBucketsCommand,
  ListTablesCommand,
  NotFoundException,
  S3TablesClient
} from '@aws-sdk/client-s3tables';
import { S3TablesCatalogClient } from '../client';
import { TableCatalogError } from '../errors';

const BUCKET_ARN = 'arn:aws:s3tables:us-east-1:111122223333:bucket/analytics';
const CREATED_AT = new Date('2024-05-01T12:00:00.000Z');

type SentCommand = {
  command: unknown;
  options: unknown;
};

function createStubbedClient(t: TestContext, respond: (command: unknown) => unknown) {
  const client = new S3TablesClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' }
  });
  const sent: SentCommand[] = [];
  t.mock.method(client, 'send', async (command: unknown, options?: unknown) => {
    sent.push({ command, options });
    return respond(command);
  });
  return { catalog: new S3TablesCatalogClient({ client }), sent };
}

test('listTableBuckets sends the page input and maps summaries', async (t) => {
  const { catalog, sent } = createStubbedClient(t, () => ({
    tableBuckets: [
      { name: 'analytics', arn: BUCKET_ARN, ownerAccountId: '111122223333', createdAt: CREATED_AT },
      { name: 'partial' }
    ],
    continuationToken: 'next-page'
  }));
  const controller = new AbortController();

  const page = await catalog.listTableBuckets(
    { prefix: 'a', continuationToken: 'this-page' },
    { signal: controller.signal }
  );

  assert.equal(sent.length, 1);
  const { command, options } = sent[0];
  assert.ok(command instanceof ListTableBucketsCommand);
  assert.deepEqual(command.input, { prefix: 'a', continuationToken: 'this-page' });
  assert.deepEqual(options, { abortSignal: controller.signal });
  assert.deepEqual(page, {
    items: [
      { name: 'analytics', arn: BUCKET_ARN, ownerAccountId: '111122223333', createdAt: CREATED_AT },
      { name: 'partial', arn: '', ownerAccountId: null, createdAt: null }
    ],
    continuationToken: 'next-page'
  });
});

test('a last page has a null continuation token', async (t) => {
  const { catalog } = createStubbedClient(t, () => ({ tableBuckets: [] }));

  const page = await catalog.listTableBuckets({});

  assert.deepEqual(page, { items: [], continuationToken: null });
});

test('create calls send the resource names', async (t) => {
  const { catalog, sent } = createStubbedClient(t, (command) => {
    if (command instanceof CreateTableBucketCommand) {
      return { arn: BUCKET_ARN };
    }
    if (command instanceof CreateTableCommand) {
      return { tableARN: `${BUCKET_ARN}/table/orders-id` };
    }
    return { tableBucketARN: BUCKET_ARN, namespace: ['sales'] };
  });

  assert.deepEqual(await catalog.createTableBucket('analytics'), { arn: BUCKET_ARN });
  await catalog.createNamespace(BUCKET_ARN, 'sales');
  assert.deepEqual(await catalog.createTable(BUCKET_ARN, 'sales', 'orders', 'ICEBERG'), {
    arn: `${BUCKET_ARN}/table/orders-id`
  });

  const [bucket, namespace, table] = sent.map((entry) => entry.command);
  assert.ok(bucket instanceof CreateTableBucketCommand);
  assert.deepEqual(bucket.input, { name: 'analytics' });
  assert.ok(namespace instanceof CreateNamespaceCommand);
  assert.deepEqual(namespace.input, { tableBucketARN: BUCKET_ARN, namespace: ['sales'] });
  assert.ok(table instanceof CreateTableCommand);
  assert.deepEqual(table.input, { tableBucketARN: BUCKET_ARN, namespace: 'sales', name: 'orders', format: 'ICEBERG' });
});

test('namespace listings read the first namespace segment', async (t) => {
  const { catalog, sent } = createStubbedClient(t, (command) => {
    if (command instanceof GetNamespaceCommand) {
      return { namespace: ['sales'], createdAt: CREATED_AT };
    }
    return {
      namespaces: [
        { namespace: ['sales'], createdAt: CREATED_AT },
        { namespace: [] }
      ]
    };
  });

  const page = await catalog.listNamespaces(BUCKET_ARN, { prefix: 's' });
  const single = await catalog.getNamespace(BUCKET_ARN, 'sales');

  assert.deepEqual(page.items, [
    { name: 'sales', createdAt: CREATED_AT },
    { name: '', createdAt: null }
  ]);
  assert.deepEqual(single, { name: 'sales', createdAt: CREATED_AT });
  const [list, get] = sent.map((entry) => entry.command);
  assert.ok(list instanceof ListNamespacesCommand);
  assert.deepEqual(list.input, { tableBucketARN: BUCKET_ARN, prefix: 's', continuationToken: undefined });
  assert.ok(get instanceof GetNamespaceCommand);
  assert.deepEqual(get.input, { tableBucketARN: BUCKET_ARN, namespace: 'sales' });
});

test('table listings and lookups map table fields', async (t) => {
  const tableArn = `${BUCKET_ARN}/table/orders-id`;
  const { catalog, sent } = createStubbedClient(t, (command) => {
    if (command instanceof ListTablesCommand) {
      return {
        tables: [{ name: 'orders', tableARN: tableArn, namespace: ['sales'], createdAt: CREATED_AT, type: 'customer' }],
        continuationToken: ''
      };
    }
    return {
      name: 'orders',
      tableARN: tableArn,
      namespace: ['sales'],
      createdAt: CREATED_AT,
      modifiedAt: CREATED_AT,
      type: 'customer',
      format: 'ICEBERG',
      metadataLocation: 's3://metadata/orders.json',
      warehouseLocation: 's3://warehouse-orders',
      versionToken: 'v7'
    };
  });

  const page = await catalog.listTables(BUCKET_ARN, 'sales', {});
  const summary = await catalog.getTable(BUCKET_ARN, 'sales', 'orders');
  const details = await catalog.getTableDetails(BUCKET_ARN, 'sales', 'orders');

  const expectedSummary = { name: 'orders', arn: tableArn, namespace: 'sales', createdAt: CREATED_AT, type: 'customer' };
  assert.deepEqual(page, { items: [expectedSummary], continuationToken: '' });
  assert.deepEqual(summary, expectedSummary);
  assert.deepEqual(details, {
    ...expectedSummary,
    format: 'ICEBERG',
    metadataLocation: 's3://metadata/orders.json',
    warehouseLocation: 's3://warehouse-orders',
    modifiedAt: CREATED_AT,
    versionToken: 'v7'
  });

  const [list, get] = sent.map((entry) => entry.command);
  assert.ok(list instanceof ListTablesCommand);
  assert.deepEqual(list.input, {
    tableBucketARN: BUCKET_ARN,
    namespace: 'sales',
    prefix: undefined,
    continuationToken: undefined
  });
  assert.ok(get instanceof GetTableCommand);
  assert.deepEqual(get.input, { tableBucketARN: BUCKET_ARN, namespace: 'sales', name: 'orders' });
});

test('service failures are wrapped with the operation name', async (t) => {
  const { catalog } = createStubbedClient(t, () => {
    throw new NotFoundException({ message: 'The specified table does not exist', $metadata: {} });
  });

  await assert.rejects(catalog.getTable(BUCKET_ARN, 'sales', 'orders'), (error: unknown) => {
    assert.ok(error instanceof TableCatalogError);
    assert.equal(error.kind, 'NotFound');
    assert.equal(error.operation, 'GetTable');
    assert.ok(error.cause instanceof NotFoundException);
    return true;
  });
});
