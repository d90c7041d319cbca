import {
  listAllNamespaces,
  listAllTableBuckets,
  listAllTables,
  type NamespaceSummary,
  type TableBucketSummary,
  type TableCatalog,
  type TableSummary
} from '@s3t/tables-client';
import type { Logger } from '@s3t/shared';
import { formatTableDetails } from './output';
import type { SelectionPort } from './picker';

export type NavigationLevel = 'TableBucket' | 'Namespace' | 'Table';

export type NavigationAction = 'select' | 'back' | 'exit';

export interface NavigationState {
  level: NavigationLevel;
  tableBuckets?: TableBucketSummary[];
  namespaces?: NamespaceSummary[];
  tables?: TableSummary[];
  selectedBucket: string;
  selectedBucketArn: string;
  selectedNamespace: string;
}

export interface NavigationSeed {
  bucketName?: string;
  bucketArn?: string;
  namespace?: string;
}

export type NavigationOutcome =
  | { reason: 'table-selected'; table: TableSummary }
  | { reason: 'exit' }
  | { reason: 'empty' };

export interface NavigationControllerOptions {
  catalog: TableCatalog;
  picker: SelectionPort;
  logger: Logger;
  signal?: AbortSignal;
  output?: (line: string) => void;
}

type StepResult = { action: NavigationAction; empty?: boolean };

/**
 * Interactive browse over table buckets, namespaces and tables.
 *
 * Each level's listing is fetched once per parent and kept in the state, so going
 * back never calls the catalog again. Selecting a new parent drops the deeper
 * caches. One controller drives one session.
 */
export class NavigationController {
  private readonly catalog: TableCatalog;
  private readonly picker: SelectionPort;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;
  private readonly output: (line: string) => void;
  private readonly state: NavigationState = {
    level: 'TableBucket',
    selectedBucket: '',
    selectedBucketArn: '',
    selectedNamespace: ''
  };
  private selectedTable: TableSummary | null = null;

  constructor(options: NavigationControllerOptions) {
    this.catalog = options.catalog;
    this.picker = options.picker;
    this.logger = options.logger;
    this.signal = options.signal;
    this.output = options.output ?? ((line) => console.log(line));
  }

  getState(): Readonly<NavigationState> {
    return this.state;
  }

  getSelectedTable(): TableSummary | null {
    return this.selectedTable;
  }

  async runSession(startLevel: NavigationLevel = 'TableBucket', seed: NavigationSeed = {}): Promise<NavigationOutcome> {
    this.seed(startLevel, seed);
    this.state.level = startLevel;

    for (;;) {
      switch (this.state.level) {
        case 'TableBucket': {
          const step = await this.navigateTableBuckets();
          if (step.empty) {
            return { reason: 'empty' };
          }
          if (step.action !== 'select') {
            return { reason: 'exit' };
          }
          this.state.level = 'Namespace';
          break;
        }
        case 'Namespace': {
          const { action } = await this.navigateNamespaces();
          if (action === 'exit') {
            return { reason: 'exit' };
          }
          this.state.level = action === 'back' ? 'TableBucket' : 'Table';
          break;
        }
        case 'Table': {
          const { action } = await this.navigateTables();
          if (action === 'exit') {
            return { reason: 'exit' };
          }
          if (action === 'back') {
            this.state.level = 'Namespace';
            break;
          }
          if (!this.selectedTable) {
            return { reason: 'exit' };
          }
          return { reason: 'table-selected', table: this.selectedTable };
        }
      }
    }
  }

  private seed(startLevel: NavigationLevel, seed: NavigationSeed): void {
    if (startLevel !== 'TableBucket' && !seed.bucketArn) {
      throw new Error(`A table bucket ARN is required to start at the ${startLevel} level`);
    }
    if (startLevel === 'Table' && !seed.namespace) {
      throw new Error('A namespace is required to start at the Table level');
    }
    this.state.selectedBucket = seed.bucketName ?? '';
    this.state.selectedBucketArn = seed.bucketArn ?? '';
    this.state.selectedNamespace = seed.namespace ?? '';
  }

  private async navigateTableBuckets(): Promise<StepResult> {
    if (this.state.tableBuckets === undefined) {
      this.logger.debug('Listing table buckets');
      this.state.tableBuckets = await listAllTableBuckets(this.catalog, undefined, { signal: this.signal });
    }
    const buckets = this.state.tableBuckets;

    if (buckets.length === 0) {
      this.output('No table buckets found');
      return { action: 'exit', empty: true };
    }

    const result = await this.picker.selectWithBack(
      'Select Table Bucket',
      buckets.map((bucket) => bucket.name),
      false
    );
    if (result.kind !== 'selected') {
      return { action: 'exit' };
    }

    const bucket = buckets.find((candidate) => candidate.name === result.item);
    if (!bucket) {
      return { action: 'exit' };
    }

    this.state.selectedBucket = bucket.name;
    this.state.selectedBucketArn = bucket.arn;
    this.state.namespaces = undefined;
    this.state.tables = undefined;
    return { action: 'select' };
  }

  private async navigateNamespaces(): Promise<StepResult> {
    if (this.state.namespaces === undefined) {
      this.logger.debug({ tableBucketArn: this.state.selectedBucketArn }, 'Listing namespaces');
      this.state.namespaces = await listAllNamespaces(this.catalog, this.state.selectedBucketArn, undefined, {
        signal: this.signal
      });
    }
    const namespaces = this.state.namespaces;

    if (namespaces.length === 0) {
      this.output(`No namespaces found in table bucket '${this.state.selectedBucket}'`);
      return { action: 'back', empty: true };
    }

    const result = await this.picker.selectWithBack(
      'Select Namespace',
      namespaces.map((namespace) => namespace.name),
      true
    );
    if (result.kind === 'back') {
      return { action: 'back' };
    }
    if (result.kind === 'aborted') {
      return { action: 'exit' };
    }

    this.state.selectedNamespace = result.item;
    this.state.tables = undefined;
    return { action: 'select' };
  }

  private async navigateTables(): Promise<StepResult> {
    if (this.state.tables === undefined) {
      this.logger.debug(
        { tableBucketArn: this.state.selectedBucketArn, namespace: this.state.selectedNamespace },
        'Listing tables'
      );
      this.state.tables = await listAllTables(
        this.catalog,
        this.state.selectedBucketArn,
        this.state.selectedNamespace,
        undefined,
        { signal: this.signal }
      );
    }
    const tables = this.state.tables;

    if (tables.length === 0) {
      this.output(`No tables found in namespace '${this.state.selectedNamespace}'`);
      return { action: 'back', empty: true };
    }

    const result = await this.picker.selectWithBack(
      'Select Table',
      tables.map((table) => table.name),
      true
    );
    if (result.kind === 'back') {
      return { action: 'back' };
    }
    if (result.kind === 'aborted') {
      return { action: 'exit' };
    }

    const table = tables.find((candidate) => candidate.name === result.item);
    if (table) {
      this.selectedTable = table;
      this.output(formatTableDetails(table).join('\n'));
    }
    return { action: 'select' };
  }
}
