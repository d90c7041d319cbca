export const ICEBERG_FORMAT = 'ICEBERG';

export type OpenTableFormat = typeof ICEBERG_FORMAT;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ListPageInput {
  prefix?: string;
  continuationToken?: string;
}

export interface Page<T> {
  items: T[];
  continuationToken?: string | null;
}

export interface TableBucketSummary {
  name: string;
  arn: string;
  ownerAccountId: string | null;
  createdAt: Date | null;
}

export interface NamespaceSummary {
  name: string;
  createdAt: Date | null;
}

export interface TableSummary {
  name: string;
  arn: string;
  namespace: string;
  createdAt: Date | null;
  type: string;
}

export interface TableDetails extends TableSummary {
  format: string | null;
  metadataLocation: string | null;
  warehouseLocation: string | null;
  modifiedAt: Date | null;
  versionToken: string | null;
}

/**
 * Capability surface of the table catalog service.
 *
 * Every method rejects with a `TableCatalogError`. Implementations must not retry
 * on their own account beyond what the underlying transport does.
 */
export interface TableCatalog {
  listTableBuckets(input: ListPageInput, options?: CallOptions): Promise<Page<TableBucketSummary>>;
  createTableBucket(name: string, options?: CallOptions): Promise<{ arn: string }>;
  getNamespace(tableBucketArn: string, namespace: string, options?: CallOptions): Promise<NamespaceSummary>;
  createNamespace(tableBucketArn: string, namespace: string, options?: CallOptions): Promise<void>;
  getTable(tableBucketArn: string, namespace: string, name: string, options?: CallOptions): Promise<TableSummary>;
  createTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    format: OpenTableFormat,
    options?: CallOptions
  ): Promise<{ arn: string }>;
  listNamespaces(tableBucketArn: string, input: ListPageInput, options?: CallOptions): Promise<Page<NamespaceSummary>>;
  listTables(
    tableBucketArn: string,
    namespace: string,
    input: ListPageInput,
    options?: CallOptions
  ): Promise<Page<TableSummary>>;
  getTableDetails(tableBucketArn: string, namespace: string, name: string, options?: CallOptions): Promise<TableDetails>;
  /** Releases the underlying transport. The catalog is unusable afterwards. */
  destroy?(): void;
}

export interface TableCatalogClientOptions {
  region?: string;
  profile?: string;
  endpoint?: string;
}
