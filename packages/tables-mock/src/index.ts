import {
  wrapCatalogError,
  type CallOptions,
  type ListPageInput,
  type NamespaceSummary,
  type OpenTableFormat,
  type Page,
  type TableBucketSummary,
  type TableCatalog,
  type TableDetails,
  type TableSummary
} from '@s3t/tables-client';

export type CatalogMethod = Exclude<keyof TableCatalog, symbol>;

export type RecordedCall = {
  method: CatalogMethod;
  args: string[];
  signal?: AbortSignal;
};

export type InMemoryTableCatalogOptions = {
  pageSize?: number;
  accountId?: string;
  region?: string;
  createdAt?: Date;
};

type TableRecord = TableDetails;

type NamespaceRecord = {
  summary: NamespaceSummary;
  tables: Map<string, TableRecord>;
};

type BucketRecord = {
  summary: TableBucketSummary;
  namespaces: Map<string, NamespaceRecord>;
};

const DEFAULT_CREATED_AT = new Date('2024-05-01T12:00:00.000Z');

class MockServiceError extends Error {
  constructor(name: string, message: string) {
    super(message);
    this.name = name;
  }
}

function paginate<T>(items: T[], pageSize: number, continuationToken: string | undefined): Page<T> {
  const offset = continuationToken ? Number.parseInt(continuationToken, 10) : 0;
  const slice = items.slice(offset, offset + pageSize);
  const nextOffset = offset + slice.length;
  return {
    items: slice,
    continuationToken: nextOffset < items.length ? String(nextOffset) : null
  };
}

function matchesPrefix(name: string, prefix: string | undefined): boolean {
  return !prefix || name.startsWith(prefix);
}

/**
 * Deterministic in-process table catalog. Records every call in order and can be
 * told to fail a given method with a service error name.
 */
export class InMemoryTableCatalog implements TableCatalog {
  readonly calls: RecordedCall[] = [];

  private readonly buckets = new Map<string, BucketRecord>();
  private readonly failures = new Map<CatalogMethod, string>();
  private readonly pageSize: number;
  private readonly accountId: string;
  private readonly region: string;
  private readonly createdAt: Date;

  constructor(options: InMemoryTableCatalogOptions = {}) {
    this.pageSize = Math.max(1, options.pageSize ?? 1000);
    this.accountId = options.accountId ?? '111122223333';
    this.region = options.region ?? 'us-east-1';
    this.createdAt = options.createdAt ?? DEFAULT_CREATED_AT;
  }

  bucketArn(name: string): string {
    return `arn:aws:s3tables:${this.region}:${this.accountId}:bucket/${name}`;
  }

  tableArn(bucketName: string, namespace: string, name: string): string {
    return `${this.bucketArn(bucketName)}/table/${namespace}.${name}`;
  }

  addTableBucket(name: string): this {
    if (!this.buckets.has(name)) {
      this.buckets.set(name, {
        summary: { name, arn: this.bucketArn(name), ownerAccountId: this.accountId, createdAt: this.createdAt },
        namespaces: new Map()
      });
    }
    return this;
  }

  addNamespace(bucketName: string, namespace: string): this {
    const bucket = this.addTableBucket(bucketName).requireBucketByName(bucketName);
    if (!bucket.namespaces.has(namespace)) {
      bucket.namespaces.set(namespace, {
        summary: { name: namespace, createdAt: this.createdAt },
        tables: new Map()
      });
    }
    return this;
  }

  addTable(bucketName: string, namespace: string, name: string): this {
    const record = this.addNamespace(bucketName, namespace).requireBucketByName(bucketName).namespaces.get(namespace);
    if (record && !record.tables.has(name)) {
      record.tables.set(name, {
        name,
        arn: this.tableArn(bucketName, namespace, name),
        namespace,
        createdAt: this.createdAt,
        type: 'customer',
        format: 'ICEBERG',
        metadataLocation: null,
        warehouseLocation: `s3://${namespace}-${name}--table-s3`,
        modifiedAt: this.createdAt,
        versionToken: 'v1'
      });
    }
    return this;
  }

  /** Makes every later call to `method` reject with a service error of the given name. */
  failWith(method: CatalogMethod, errorName: string): this {
    this.failures.set(method, errorName);
    return this;
  }

  clearFailures(): this {
    this.failures.clear();
    return this;
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  callNames(): CatalogMethod[] {
    return this.calls.map((call) => call.method);
  }

  async listTableBuckets(input: ListPageInput, options: CallOptions = {}): Promise<Page<TableBucketSummary>> {
    this.enter('listTableBuckets', 'ListTableBuckets', [input.prefix ?? ''], options);
    const matches = Array.from(this.buckets.values())
      .map((bucket) => bucket.summary)
      .filter((bucket) => matchesPrefix(bucket.name, input.prefix));
    return paginate(matches, this.pageSize, input.continuationToken);
  }

  async createTableBucket(name: string, options: CallOptions = {}): Promise<{ arn: string }> {
    this.enter('createTableBucket', 'CreateTableBucket', [name], options);
    if (this.buckets.has(name)) {
      throw wrapCatalogError('CreateTableBucket', new MockServiceError('ConflictException', 'bucket exists'));
    }
    this.addTableBucket(name);
    return { arn: this.bucketArn(name) };
  }

  async getNamespace(tableBucketArn: string, namespace: string, options: CallOptions = {}): Promise<NamespaceSummary> {
    this.enter('getNamespace', 'GetNamespace', [tableBucketArn, namespace], options);
    const record = this.requireBucket(tableBucketArn, 'GetNamespace').namespaces.get(namespace);
    if (!record) {
      throw this.notFound('GetNamespace');
    }
    return record.summary;
  }

  async createNamespace(tableBucketArn: string, namespace: string, options: CallOptions = {}): Promise<void> {
    this.enter('createNamespace', 'CreateNamespace', [tableBucketArn, namespace], options);
    const bucket = this.requireBucket(tableBucketArn, 'CreateNamespace');
    if (bucket.namespaces.has(namespace)) {
      throw wrapCatalogError('CreateNamespace', new MockServiceError('ConflictException', 'namespace exists'));
    }
    this.addNamespace(bucket.summary.name, namespace);
  }

  async getTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    options: CallOptions = {}
  ): Promise<TableSummary> {
    this.enter('getTable', 'GetTable', [tableBucketArn, namespace, name], options);
    const { name: tableName, arn, createdAt, type } = this.requireTable(tableBucketArn, namespace, name, 'GetTable');
    return { name: tableName, arn, namespace, createdAt, type };
  }

  async createTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    format: OpenTableFormat,
    options: CallOptions = {}
  ): Promise<{ arn: string }> {
    this.enter('createTable', 'CreateTable', [tableBucketArn, namespace, name, format], options);
    const bucket = this.requireBucket(tableBucketArn, 'CreateTable');
    const record = bucket.namespaces.get(namespace);
    if (!record) {
      throw this.notFound('CreateTable');
    }
    if (record.tables.has(name)) {
      throw wrapCatalogError('CreateTable', new MockServiceError('ConflictException', 'table exists'));
    }
    this.addTable(bucket.summary.name, namespace, name);
    return { arn: this.tableArn(bucket.summary.name, namespace, name) };
  }

  async listNamespaces(
    tableBucketArn: string,
    input: ListPageInput,
    options: CallOptions = {}
  ): Promise<Page<NamespaceSummary>> {
    this.enter('listNamespaces', 'ListNamespaces', [tableBucketArn, input.prefix ?? ''], options);
    const bucket = this.requireBucket(tableBucketArn, 'ListNamespaces');
    const matches = Array.from(bucket.namespaces.values())
      .map((record) => record.summary)
      .filter((summary) => matchesPrefix(summary.name, input.prefix));
    return paginate(matches, this.pageSize, input.continuationToken);
  }

  async listTables(
    tableBucketArn: string,
    namespace: string,
    input: ListPageInput,
    options: CallOptions = {}
  ): Promise<Page<TableSummary>> {
    this.enter('listTables', 'ListTables', [tableBucketArn, namespace, input.prefix ?? ''], options);
    const record = this.requireBucket(tableBucketArn, 'ListTables').namespaces.get(namespace);
    if (!record) {
      throw this.notFound('ListTables');
    }
    const matches = Array.from(record.tables.values())
      .filter((table) => matchesPrefix(table.name, input.prefix))
      .map(({ name, arn, createdAt, type }) => ({ name, arn, namespace, createdAt, type }));
    return paginate(matches, this.pageSize, input.continuationToken);
  }

  async getTableDetails(
    tableBucketArn: string,
    namespace: string,
    name: string,
    options: CallOptions = {}
  ): Promise<TableDetails> {
    this.enter('getTableDetails', 'GetTable', [tableBucketArn, namespace, name], options);
    return { ...this.requireTable(tableBucketArn, namespace, name, 'GetTable') };
  }

  private enter(method: CatalogMethod, operation: string, args: string[], options: CallOptions): void {
    this.calls.push({ method, args, signal: options.signal });
    const failure = this.failures.get(method);
    if (failure) {
      throw wrapCatalogError(operation, new MockServiceError(failure, `${operation} failed`));
    }
  }

  private notFound(operation: string) {
    return wrapCatalogError(operation, new MockServiceError('NotFoundException', 'not found'));
  }

  private requireBucketByName(name: string): BucketRecord {
    const bucket = this.buckets.get(name);
    if (!bucket) {
      throw this.notFound('GetTableBucket');
    }
    return bucket;
  }

  private requireBucket(arn: string, operation: string): BucketRecord {
    for (const bucket of this.buckets.values()) {
      if (bucket.summary.arn === arn) {
        return bucket;
      }
    }
    throw this.notFound(operation);
  }

  private requireTable(tableBucketArn: string, namespace: string, name: string, operation: string): TableRecord {
    const table = this.requireBucket(tableBucketArn, operation).namespaces.get(namespace)?.tables.get(name);
    if (!table) {
      throw this.notFound(operation);
    }
    return table;
  }
}
