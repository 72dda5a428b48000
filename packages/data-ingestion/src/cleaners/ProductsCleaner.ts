import { DatasetKind } from '@retail-etl/types';
import type { DatasetCleaner } from './DatasetCleaner';
import { dropMissing, fillMissing, mapColumn, replaceValues, Stage } from '../dataset/stages';
import { normalizeNumeric } from '../validation/DataNormalizer';

const NUMERIC_COLUMNS = ['ProductKey', 'ProductSubcategoryKey', 'ProductCost', 'ProductPrice'];

const DEFAULTS: ReadonlyArray<[column: string, fill: string]> = [
  ['ProductSKU', 'Unknown'],
  ['ProductName', 'Unknown'],
  ['ModelName', 'Unknown'],
  ['ProductDescription', 'No Description'],
  ['ProductColor', 'NA'],
  ['ProductSize', 'NA'],
  ['ProductStyle', 'NA']
];

// Numeric columns stay digit strings
export const productsCleaner: DatasetCleaner = {
  kind: DatasetKind.PRODUCTS,
  label: 'products',
  stages: [
    dropMissing('ProductKey'),
    ...NUMERIC_COLUMNS.map((column): Stage => mapColumn(column, normalizeNumeric)),
    ...DEFAULTS.map(([column, fill]): Stage => fillMissing(column, fill)),
    replaceValues('ProductSize', { '0': 'NA' }),
    replaceValues('ProductStyle', { '0': 'NA' })
  ]
};
