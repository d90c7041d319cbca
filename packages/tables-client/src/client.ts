import {
  CreateNamespaceCommand,
  CreateTableBucketCommand,
  CreateTableCommand,
  GetNamespaceCommand,
  GetTableCommand,
  ListNamespacesCommand,
  ListTableBucketsCommand,
  ListTablesCommand,
  S3TablesClient,
  type GetTableCommandOutput,
  type S3TablesClientConfig
} from '@aws-sdk/client-s3tables';
import { wrapCatalogError } from './errors';
import type {
  CallOptions,
  ListPageInput,
  NamespaceSummary,
  OpenTableFormat,
  Page,
  TableBucketSummary,
  TableCatalog,
  TableCatalogClientOptions,
  TableDetails,
  TableSummary
} from './types';

export interface S3TablesCatalogClientOptions extends TableCatalogClientOptions {
  client?: S3TablesClient;
}

function firstSegment(path: string[] | undefined): string {
  return path && path.length > 0 ? path[0] : '';
}

function toSummary(output: GetTableCommandOutput, namespace: string): TableSummary {
  return {
    name: output.name ?? '',
    arn: output.tableARN ?? '',
    namespace: firstSegment(output.namespace) || namespace,
    createdAt: output.createdAt ?? null,
    type: output.type ?? ''
  };
}

export function createS3TablesClient(options: TableCatalogClientOptions = {}): S3TablesClient {
  const config: S3TablesClientConfig = {};
  if (options.region) {
    config.region = options.region;
  }
  if (options.profile) {
    config.profile = options.profile;
  }
  if (options.endpoint) {
    config.endpoint = options.endpoint;
  }
  return new S3TablesClient(config);
}

/**
 * `TableCatalog` backed by the AWS S3 Tables API. Retries are left to the SDK's
 * own retry strategy.
 */
export class S3TablesCatalogClient implements TableCatalog {
  private readonly client: S3TablesClient;

  constructor(options: S3TablesCatalogClientOptions = {}) {
    this.client = options.client ?? createS3TablesClient(options);
  }

  async listTableBuckets(input: ListPageInput, options: CallOptions = {}): Promise<Page<TableBucketSummary>> {
    const output = await this.call('ListTableBuckets', () =>
      this.client.send(
        new ListTableBucketsCommand({ prefix: input.prefix, continuationToken: input.continuationToken }),
        { abortSignal: options.signal }
      )
    );
    return {
      items: (output.tableBuckets ?? []).map((bucket) => ({
        name: bucket.name ?? '',
        arn: bucket.arn ?? '',
        ownerAccountId: bucket.ownerAccountId ?? null,
        createdAt: bucket.createdAt ?? null
      })),
      continuationToken: output.continuationToken ?? null
    };
  }

  async createTableBucket(name: string, options: CallOptions = {}): Promise<{ arn: string }> {
    const output = await this.call('CreateTableBucket', () =>
      this.client.send(new CreateTableBucketCommand({ name }), { abortSignal: options.signal })
    );
    return { arn: output.arn ?? '' };
  }

  async getNamespace(tableBucketArn: string, namespace: string, options: CallOptions = {}): Promise<NamespaceSummary> {
    const output = await this.call('GetNamespace', () =>
      this.client.send(new GetNamespaceCommand({ tableBucketARN: tableBucketArn, namespace }), {
        abortSignal: options.signal
      })
    );
    return {
      name: firstSegment(output.namespace) || namespace,
      createdAt: output.createdAt ?? null
    };
  }

  async createNamespace(tableBucketArn: string, namespace: string, options: CallOptions = {}): Promise<void> {
    await this.call('CreateNamespace', () =>
      this.client.send(new CreateNamespaceCommand({ tableBucketARN: tableBucketArn, namespace: [namespace] }), {
        abortSignal: options.signal
      })
    );
  }

  async getTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    options: CallOptions = {}
  ): Promise<TableSummary> {
    const output = await this.fetchTable(tableBucketArn, namespace, name, options);
    return toSummary(output, namespace);
  }

  async createTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    format: OpenTableFormat,
    options: CallOptions = {}
  ): Promise<{ arn: string }> {
    const output = await this.call('CreateTable', () =>
      this.client.send(new CreateTableCommand({ tableBucketARN: tableBucketArn, namespace, name, format }), {
        abortSignal: options.signal
      })
    );
    return { arn: output.tableARN ?? '' };
  }

  async listNamespaces(
    tableBucketArn: string,
    input: ListPageInput,
    options: CallOptions = {}
  ): Promise<Page<NamespaceSummary>> {
    const output = await this.call('ListNamespaces', () =>
      this.client.send(
        new ListNamespacesCommand({
          tableBucketARN: tableBucketArn,
          prefix: input.prefix,
          continuationToken: input.continuationToken
        }),
        { abortSignal: options.signal }
      )
    );
    return {
      items: (output.namespaces ?? []).map((entry) => ({
        name: firstSegment(entry.namespace),
        createdAt: entry.createdAt ?? null
      })),
      continuationToken: output.continuationToken ?? null
    };
  }

  async listTables(
    tableBucketArn: string,
    namespace: string,
    input: ListPageInput,
    options: CallOptions = {}
  ): Promise<Page<TableSummary>> {
    const output = await this.call('ListTables', () =>
      this.client.send(
        new ListTablesCommand({
          tableBucketARN: tableBucketArn,
          namespace,
          prefix: input.prefix,
          continuationToken: input.continuationToken
        }),
        { abortSignal: options.signal }
      )
    );
    return {
      items: (output.tables ?? []).map((table) => ({
        name: table.name ?? '',
        arn: table.tableARN ?? '',
        namespace: firstSegment(table.namespace),
        createdAt: table.createdAt ?? null,
        type: table.type ?? ''
      })),
      continuationToken: output.continuationToken ?? null
    };
  }

  async getTableDetails(
    tableBucketArn: string,
    namespace: string,
    name: string,
    options: CallOptions = {}
  ): Promise<TableDetails> {
    const output = await this.fetchTable(tableBucketArn, namespace, name, options);
    return {
      ...toSummary(output, namespace),
      format: output.format ?? null,
      metadataLocation: output.metadataLocation ?? null,
      warehouseLocation: output.warehouseLocation ?? null,
      modifiedAt: output.modifiedAt ?? null,
      versionToken: output.versionToken ?? null
    };
  }

  destroy(): void {
    this.client.destroy();
  }

  private fetchTable(
    tableBucketArn: string,
    namespace: string,
    name: string,
    options: CallOptions
  ): Promise<GetTableCommandOutput> {
    return this.call('GetTable', () =>
      this.client.send(new GetTableCommand({ tableBucketARN: tableBucketArn, namespace, name }), {
        abortSignal: options.signal
      })
    );
  }

  private async call<T>(operation: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      throw wrapCatalogError(operation, error);
    }
  }
}
