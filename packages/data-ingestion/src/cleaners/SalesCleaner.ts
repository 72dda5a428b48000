import { DatasetKind } from '@retail-etl/types';
import type { DatasetCleaner } from './DatasetCleaner';
import { deriveColumn, dropMissing, mapColumn, renameLastColumn } from '../dataset/stages';
import { extractYear, normalizeDate, normalizeNumeric } from '../validation/DataNormalizer';

// Shared by every yearly sales file
export const salesCleaner: DatasetCleaner = {
  kind: DatasetKind.SALES,
  label: 'sales',
  stages: [
    renameLastColumn('OrderQuantity'),
    dropMissing('OrderQuantity'),
    mapColumn('OrderQuantity', normalizeNumeric),
    mapColumn('ProductKey', normalizeNumeric),
    mapColumn('CustomerKey', normalizeNumeric),
    mapColumn('TerritoryKey', normalizeNumeric),
    mapColumn('OrderLineItem', normalizeNumeric),
    mapColumn('OrderDate', normalizeDate),
    mapColumn('StockDate', normalizeDate),
    // OrderDate is ISO by now, invalid dates included
    deriveColumn('OrderYear', 'OrderDate', extractYear)
  ]
};
