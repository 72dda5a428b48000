import type { CellValue, TabularDataset } from '@retail-etl/types';
import { getColumn, rowCount } from '../dataset/TabularDataset';

export interface CsvWriterOptions {
  /** Warehouse COPY expects data rows only, so headers are off by default */
  header?: boolean;
}

function escapeCsvValue(value: string): string {
  if (!value) return '';

  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return escapeCsvValue(String(value));
}

/**
 * Serialize a dataset to CSV text, one `\n`-terminated line per row.
 */
export function toCsv(dataset: TabularDataset, options: CsvWriterOptions = {}): string {
  const lines: string[] = [];

  if (options.header) {
    lines.push(dataset.columns.map(escapeCsvValue).join(','));
  }

  const columns = dataset.columns.map(column => getColumn(dataset, column));
  const count = rowCount(dataset);
  for (let i = 0; i < count; i++) {
    lines.push(columns.map(values => formatCell(values[i])).join(','));
  }

  return lines.map(line => `${line}\n`).join('');
}
