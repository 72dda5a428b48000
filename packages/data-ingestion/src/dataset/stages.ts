import type { CellValue, Column, TabularDataset } from '@retail-etl/types';
import { columnRecord, createDataset, getColumn, hasColumn, rowCount } from './TabularDataset';
import { isMissing } from '../validation/DataNormalizer';
import { MissingColumnError, StructuralMismatchError } from '../utils/errorUtils';

/**
 * A pure transform from one dataset to the next. `context` names the caller
 * (usually the cleaner) and ends up in error messages.
 */
export type Stage = (dataset: TabularDataset, context: string) => TabularDataset;

export type CellRule = (value: CellValue) => CellValue;

export function runStages(dataset: TabularDataset, stages: readonly Stage[], context: string): TabularDataset {
  return stages.reduce((current, stage) => stage(current, context), dataset);
}

function withColumn(dataset: TabularDataset, column: string, values: Column): TabularDataset {
  const columns = hasColumn(dataset, column) ? dataset.columns : [...dataset.columns, column];
  const data = columnRecord<Column>();
  for (const existing of dataset.columns) {
    data[existing] = getColumn(dataset, existing);
  }
  data[column] = values;
  return createDataset(columns, data);
}

// Row filtering slices every column with the same index list
function keepRows(dataset: TabularDataset, keep: (index: number) => boolean): TabularDataset {
  const indices: number[] = [];
  const count = rowCount(dataset);
  for (let i = 0; i < count; i++) {
    if (keep(i)) indices.push(i);
  }

  if (indices.length === count) {
    return dataset;
  }

  const data = columnRecord<Column>();
  for (const column of dataset.columns) {
    const values = getColumn(dataset, column);
    data[column] = indices.map(i => values[i]);
  }
  return createDataset(dataset.columns, data);
}

/**
 * Rename `from` to `to`. With `ifPresent`, a missing `from` is accepted when
 * `to` already exists (the file was already fixed upstream).
 */
export function renameColumn(from: string, to: string, options: { ifPresent?: boolean } = {}): Stage {
  return (dataset, context) => {
    if (from === to) {
      return dataset;
    }
    if (!hasColumn(dataset, from) && options.ifPresent && hasColumn(dataset, to)) {
      return dataset;
    }

    const values = getColumn(dataset, from, context);
    if (hasColumn(dataset, to)) {
      throw new StructuralMismatchError(
        `Cannot rename "${from}" to "${to}" in ${context}: "${to}" already exists`,
        { from, to, context }
      );
    }

    const columns = dataset.columns.map(column => (column === from ? to : column));
    const data = columnRecord<Column>();
    for (const column of dataset.columns) {
      data[column === from ? to : column] = column === from ? values : getColumn(dataset, column);
    }
    return createDataset(columns, data);
  };
}

export function renameLastColumn(to: string): Stage {
  return (dataset, context) => {
    const last = dataset.columns[dataset.columns.length - 1];
    if (last === undefined) {
      throw new MissingColumnError(to, context, dataset.columns);
    }
    return renameColumn(last, to)(dataset, context);
  };
}

/**
 * Same value on every row. Creates the column when it does not exist.
 */
export function setConstant(column: string, value: CellValue): Stage {
  return dataset => withColumn(dataset, column, new Array<CellValue>(rowCount(dataset)).fill(value));
}

export function mapColumn(column: string, rule: CellRule): Stage {
  return (dataset, context) => withColumn(dataset, column, getColumn(dataset, column, context).map(rule));
}

/**
 * Exact-match replacement of string cells; everything else passes through.
 */
export function replaceValues(column: string, mapping: Readonly<Record<string, CellValue>>): Stage {
  const lookup = new Map<string, CellValue>(Object.entries(mapping));
  return mapColumn(column, value => {
    if (typeof value === 'string' && lookup.has(value)) {
      return lookup.get(value) ?? null;
    }
    return value;
  });
}

export function fillMissing(column: string, fill: CellValue): Stage {
  return mapColumn(column, value => (isMissing(value) ? fill : value));
}

export function dropRowsWhere(column: string, predicate: (value: CellValue) => boolean): Stage {
  return (dataset, context) => {
    const values = getColumn(dataset, column, context);
    return keepRows(dataset, i => !predicate(values[i]));
  };
}

export function dropMissing(column: string): Stage {
  return dropRowsWhere(column, isMissing);
}

export function deriveColumn(target: string, source: string, rule: CellRule): Stage {
  return (dataset, context) => withColumn(dataset, target, getColumn(dataset, source, context).map(rule));
}

export function selectColumns(columns: readonly string[]): Stage {
  return (dataset, context) => {
    const data = columnRecord<Column>();
    for (const column of columns) {
      data[column] = getColumn(dataset, column, context);
    }
    return createDataset(columns, data);
  };
}

/**
 * Split a multi-valued text column on `separator` and replace it with one
 * boolean column per distinct token, sorted by name. Only `keep` columns
 * survive next to the indicators, so the output schema depends on the data.
 */
export function oneHotExpand(column: string, separator: string, keep: readonly string[]): Stage {
  return (dataset, context) => {
    const values = getColumn(dataset, column, context);
    const tokensPerRow = values.map(value =>
      isMissing(value)
        ? []
        : String(value)
            .split(separator)
            .map(token => token.trim())
            .filter(token => token !== '')
    );

    const distinct = [...new Set(tokensPerRow.flat())].sort();
    const clashing = distinct.filter(token => keep.includes(token));
    if (clashing.length > 0) {
      throw new StructuralMismatchError(
        `Indicator columns collide with kept columns in ${context}: ${clashing.join(', ')}`,
        { column, clashing, context }
      );
    }

    const data = columnRecord<Column>();
    for (const kept of keep) {
      data[kept] = getColumn(dataset, kept, context);
    }
    for (const token of distinct) {
      data[token] = tokensPerRow.map(tokens => tokens.includes(token));
    }
    return createDataset([...keep, ...distinct], data);
  };
}
