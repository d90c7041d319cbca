export { S3TablesCatalogClient, createS3TablesClient, type S3TablesCatalogClientOptions } from './client';
export {
  TableCatalogError,
  isNotFoundError,
  wrapCatalogError,
  type TableCatalogErrorKind
} from './errors';
export {
  checkNamespaceExists,
  checkTableBucketExists,
  checkTableExists,
  resolveTableBucketArn,
  type ExistenceResult
} from './existence';
export { collectPages, listAllNamespaces, listAllTableBuckets, listAllTables, type PageFetcher } from './pagination';
export * from './types';
