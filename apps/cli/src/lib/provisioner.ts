import {
  ICEBERG_FORMAT,
  checkNamespaceExists,
  checkTableBucketExists,
  checkTableExists,
  type CallOptions,
  type TableCatalog
} from '@s3t/tables-client';
import type { Logger } from '@s3t/shared';

export interface ProvisionResult {
  readonly tableBucketArn: string;
  readonly tableArn: string;
  readonly tableBucketCreated: boolean;
  readonly namespaceCreated: boolean;
  readonly tableCreated: boolean;
  readonly messages: readonly string[];
}

type MutableProvisionResult = {
  tableBucketArn: string;
  tableArn: string;
  tableBucketCreated: boolean;
  namespaceCreated: boolean;
  tableCreated: boolean;
  messages: string[];
};

export interface TableProvisionerOptions {
  catalog: TableCatalog;
  logger: Logger;
}

/**
 * Creates the table bucket, namespace and table that do not exist yet, strictly in
 * that order. The first failure rejects; resources created before it are kept, and
 * running `ensure` again with the same names picks up where it stopped.
 */
export class TableProvisioner {
  private readonly catalog: TableCatalog;
  private readonly logger: Logger;

  constructor(options: TableProvisionerOptions) {
    this.catalog = options.catalog;
    this.logger = options.logger;
  }

  async ensure(
    tableBucket: string,
    namespace: string,
    table: string,
    options: CallOptions = {}
  ): Promise<ProvisionResult> {
    const result: MutableProvisionResult = {
      tableBucketArn: '',
      tableArn: '',
      tableBucketCreated: false,
      namespaceCreated: false,
      tableCreated: false,
      messages: []
    };

    const tableBucketArn = await this.ensureTableBucket(tableBucket, result, options);
    await this.ensureNamespace(tableBucketArn, namespace, result, options);
    await this.ensureTable(tableBucketArn, namespace, table, result, options);

    return Object.freeze({ ...result, messages: Object.freeze([...result.messages]) });
  }

  private async ensureTableBucket(
    tableBucket: string,
    result: MutableProvisionResult,
    options: CallOptions
  ): Promise<string> {
    this.logger.debug({ tableBucket }, 'Checking table bucket');
    const existing = await checkTableBucketExists(this.catalog, tableBucket, options);
    if (existing.exists) {
      result.tableBucketArn = existing.arn;
      result.messages.push(`Table Bucket '${tableBucket}' already exists`);
      return existing.arn;
    }

    const { arn } = await this.catalog.createTableBucket(tableBucket, options);
    result.tableBucketCreated = true;
    result.tableBucketArn = arn;
    result.messages.push(`Table Bucket '${tableBucket}' created`);
    this.logger.info({ tableBucket, arn }, 'Created table bucket');
    return arn;
  }

  private async ensureNamespace(
    tableBucketArn: string,
    namespace: string,
    result: MutableProvisionResult,
    options: CallOptions
  ): Promise<void> {
    this.logger.debug({ tableBucketArn, namespace }, 'Checking namespace');
    const existing = await checkNamespaceExists(this.catalog, tableBucketArn, namespace, options);
    if (existing.exists) {
      result.messages.push(`Namespace '${namespace}' already exists`);
      return;
    }

    await this.catalog.createNamespace(tableBucketArn, namespace, options);
    result.namespaceCreated = true;
    result.messages.push(`Namespace '${namespace}' created`);
    this.logger.info({ tableBucketArn, namespace }, 'Created namespace');
  }

  private async ensureTable(
    tableBucketArn: string,
    namespace: string,
    table: string,
    result: MutableProvisionResult,
    options: CallOptions
  ): Promise<void> {
    this.logger.debug({ tableBucketArn, namespace, table }, 'Checking table');
    const existing = await checkTableExists(this.catalog, tableBucketArn, namespace, table, options);
    if (existing.exists) {
      result.tableArn = existing.arn;
      result.messages.push(`Table '${table}' already exists`);
      return;
    }

    const { arn } = await this.catalog.createTable(tableBucketArn, namespace, table, ICEBERG_FORMAT, options);
    result.tableCreated = true;
    result.tableArn = arn;
    result.messages.push(`Table '${table}' created`);
    this.logger.info({ tableBucketArn, namespace, table, arn }, 'Created table');
  }
}
