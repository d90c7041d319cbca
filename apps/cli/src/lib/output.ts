import type { TableDetails, TableSummary } from '@s3t/tables-client';
import type { ProvisionResult } from './provisioner';

export function formatTimestamp(value: Date | null): string {
  if (!value || Number.isNaN(value.getTime())) {
    return '-';
  }
  return value.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatProvisionSummary(result: ProvisionResult): string[] {
  const lines = ['', '=== S3 Tables Resource Creation Summary ===', ''];
  for (const message of result.messages) {
    lines.push(`  • ${message}`);
  }
  lines.push('');

  // The created flags are the only source of truth; ARNs are set for both outcomes.
  const created = [result.tableBucketCreated, result.namespaceCreated, result.tableCreated].filter(Boolean).length;
  const existed = 3 - created;
  if (created > 0) {
    lines.push(`Created: ${created} resource(s)`);
  }
  if (existed > 0) {
    lines.push(`Already existed: ${existed} resource(s)`);
  }

  if (result.tableBucketArn) {
    lines.push('', `Table Bucket ARN: ${result.tableBucketArn}`);
  }
  if (result.tableArn) {
    lines.push(`Table ARN: ${result.tableArn}`);
  }
  return lines;
}

export function formatTableDetails(table: TableSummary | TableDetails): string[] {
  const lines = [
    '',
    'Table Details:',
    `  Name:      ${table.name}`,
    `  Namespace: ${table.namespace}`,
    `  ARN:       ${table.arn}`,
    `  Type:      ${table.type}`,
    `  Created:   ${formatTimestamp(table.createdAt)}`
  ];
  if ('format' in table) {
    if (table.format) {
      lines.push(`  Format:    ${table.format}`);
    }
    if (table.metadataLocation) {
      lines.push(`  Metadata:  ${table.metadataLocation}`);
    }
    if (table.warehouseLocation) {
      lines.push(`  Warehouse: ${table.warehouseLocation}`);
    }
  }
  return lines;
}

export function printLines(lines: string[]): void {
  console.log(lines.join('\n'));
}
