import { DatasetKind } from '@retail-etl/types';
import type { DatasetCleaner } from './DatasetCleaner';
import { dropRowsWhere, mapColumn } from '../dataset/stages';
import { normalizeDate, normalizeNumeric, parseQuantity } from '../validation/DataNormalizer';

export const returnsCleaner: DatasetCleaner = {
  kind: DatasetKind.RETURNS,
  label: 'returns',
  stages: [
    mapColumn('ReturnDate', normalizeDate),
    mapColumn('TerritoryKey', normalizeNumeric),
    mapColumn('ProductKey', normalizeNumeric),
    mapColumn('ReturnQuantity', parseQuantity),
    dropRowsWhere('ReturnQuantity', quantity => typeof quantity !== 'number' || quantity < 1)
  ]
};
