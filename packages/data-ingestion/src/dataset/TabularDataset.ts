import type { CellValue, Column, DatasetShape, TabularDataset } from '@retail-etl/types';
import { MissingColumnError, StructuralMismatchError } from '../utils/errorUtils';

/**
 * Prototype-free record keyed by column name, so headers and one-hot tokens
 * such as `__proto__` or `constructor` stay plain keys.
 */
export function columnRecord<T>(): Record<string, T> {
  return Object.create(null);
}

/**
 * Build a dataset, checking that column names are unique and that every
 * column has the same number of rows.
 */
export function createDataset(
  columns: readonly string[],
  data: Readonly<Record<string, Column>>
): TabularDataset {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new StructuralMismatchError(`Duplicate column "${column}"`, { column });
    }
    seen.add(column);
  }

  const frozen = columnRecord<Column>();
  let length: number | undefined;

  for (const column of columns) {
    const values = data[column];
    if (values === undefined) {
      throw new StructuralMismatchError(`Column "${column}" has no data`, { column });
    }
    if (length !== undefined && values.length !== length) {
      throw new StructuralMismatchError(
        `Column "${column}" has ${values.length} rows, expected ${length}`,
        { column, rows: values.length, expected: length }
      );
    }
    length = values.length;
    frozen[column] = values;
  }

  return { columns: [...columns], data: frozen };
}

export function emptyDataset(): TabularDataset {
  return createDataset([], {});
}

/**
 * Build a dataset from row records. Column order follows `columns` when
 * given, otherwise first appearance across rows. Absent keys become null.
 */
export function fromRows(
  rows: readonly Record<string, CellValue>[],
  columns?: readonly string[]
): TabularDataset {
  const order: string[] = columns ? [...columns] : [];
  if (!columns) {
    const seen = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          order.push(key);
        }
      }
    }
  }

  const data = columnRecord<CellValue[]>();
  for (const column of order) {
    data[column] = rows.map(row => (Object.prototype.hasOwnProperty.call(row, column) ? row[column] ?? null : null));
  }
  return createDataset(order, data);
}

export function toRows(dataset: TabularDataset): Record<string, CellValue>[] {
  const rows: Record<string, CellValue>[] = [];
  const count = rowCount(dataset);

  for (let i = 0; i < count; i++) {
    const row = columnRecord<CellValue>();
    for (const column of dataset.columns) {
      row[column] = getColumn(dataset, column)[i];
    }
    rows.push(row);
  }
  return rows;
}

export function rowCount(dataset: TabularDataset): number {
  const first = dataset.columns[0];
  return first === undefined ? 0 : getColumn(dataset, first).length;
}

export function shapeOf(dataset: TabularDataset): DatasetShape {
  return { rows: rowCount(dataset), columns: dataset.columns.length };
}

export function hasColumn(dataset: TabularDataset, column: string): boolean {
  return dataset.columns.includes(column);
}

/**
 * Column values, or MissingColumnError naming who asked for it.
 */
export function getColumn(dataset: TabularDataset, column: string, context = 'dataset access'): Column {
  const values = dataset.data[column];
  if (!hasColumn(dataset, column) || values === undefined) {
    throw new MissingColumnError(column, context, dataset.columns);
  }
  return values;
}
