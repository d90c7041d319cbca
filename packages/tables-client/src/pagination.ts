import type {
  CallOptions,
  NamespaceSummary,
  Page,
  TableBucketSummary,
  TableCatalog,
  TableSummary
} from './types';

export type PageFetcher<T> = (continuationToken: string | undefined) => Promise<Page<T>>;

/**
 * Drains a cursor-paginated listing. Pages are concatenated in the order the
 * service returned them; the first rejected page rejects the whole call.
 */
export async function collectPages<T>(fetchPage: PageFetcher<T>): Promise<T[]> {
  const items: T[] = [];
  let continuationToken: string | undefined;

  for (;;) {
    const page = await fetchPage(continuationToken);
    items.push(...page.items);
    if (!page.continuationToken) {
      break;
    }
    continuationToken = page.continuationToken;
  }

  return items;
}

function withPrefix(prefix: string | undefined, continuationToken: string | undefined) {
  return {
    prefix: prefix ? prefix : undefined,
    continuationToken
  };
}

export function listAllTableBuckets(
  catalog: TableCatalog,
  prefix?: string,
  options: CallOptions = {}
): Promise<TableBucketSummary[]> {
  return collectPages((continuationToken) =>
    catalog.listTableBuckets(withPrefix(prefix, continuationToken), options)
  );
}

export function listAllNamespaces(
  catalog: TableCatalog,
  tableBucketArn: string,
  prefix?: string,
  options: CallOptions = {}
): Promise<NamespaceSummary[]> {
  return collectPages((continuationToken) =>
    catalog.listNamespaces(tableBucketArn, withPrefix(prefix, continuationToken), options)
  );
}

export function listAllTables(
  catalog: TableCatalog,
  tableBucketArn: string,
  namespace: string,
  prefix?: string,
  options: CallOptions = {}
): Promise<TableSummary[]> {
  return collectPages((continuationToken) =>
    catalog.listTables(tableBucketArn, namespace, withPrefix(prefix, continuationToken), options)
  );
}
