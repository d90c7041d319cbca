import { isNotFoundError, TableCatalogError } from './errors';
import { listAllTableBuckets } from './pagination';
import type { CallOptions, TableCatalog } from './types';

export interface ExistenceResult {
  exists: boolean;
  arn: string;
}

const ABSENT: ExistenceResult = { exists: false, arn: '' };

/**
 * Table buckets have no get-by-name call, so the lookup lists buckets whose name
 * starts with `name` and keeps only an exact match.
 */
export async function checkTableBucketExists(
  catalog: TableCatalog,
  name: string,
  options: CallOptions = {}
): Promise<ExistenceResult> {
  const candidates = await listAllTableBuckets(catalog, name, options);
  const match = candidates.find((bucket) => bucket.name === name);
  return match ? { exists: true, arn: match.arn } : ABSENT;
}

export async function checkNamespaceExists(
  catalog: TableCatalog,
  tableBucketArn: string,
  namespace: string,
  options: CallOptions = {}
): Promise<ExistenceResult> {
  try {
    await catalog.getNamespace(tableBucketArn, namespace, options);
    // Namespaces carry no ARN of their own; the bucket ARN scopes them.
    return { exists: true, arn: '' };
  } catch (error) {
    if (isNotFoundError(error)) {
      return ABSENT;
    }
    throw error;
  }
}

export async function checkTableExists(
  catalog: TableCatalog,
  tableBucketArn: string,
  namespace: string,
  name: string,
  options: CallOptions = {}
): Promise<ExistenceResult> {
  try {
    const table = await catalog.getTable(tableBucketArn, namespace, name, options);
    return { exists: true, arn: table.arn };
  } catch (error) {
    if (isNotFoundError(error)) {
      return ABSENT;
    }
    throw error;
  }
}

export async function resolveTableBucketArn(
  catalog: TableCatalog,
  name: string,
  options: CallOptions = {}
): Promise<string> {
  const result = await checkTableBucketExists(catalog, name, options);
  if (!result.exists) {
    throw new TableCatalogError('GetTableBucketARN', {
      kind: 'NotFound',
      message: `table bucket '${name}' not found`,
      suggestion: 'verify the table bucket name and try again'
    });
  }
  return result.arn;
}
