// Core data model types shared by the ingestion and warehouse packages

/**
 * A single cell. `null` marks a missing value (an empty CSV field).
 */
export type CellValue = string | number | boolean | null;

export type Column = readonly CellValue[];

/**
 * Column-oriented table. `columns` fixes the column order; `data` holds one
 * array per column, all of the same length (row alignment).
 */
export interface TabularDataset {
  readonly columns: readonly string[];
  readonly data: Readonly<Record<string, Column>>;
}

export interface DatasetShape {
  rows: number;
  columns: number;
}

// Dataset kinds are a closed set; every kind has exactly one cleaner
export const DatasetKind = {
  CUSTOMERS: 'customers' as const,
  CUSTOMER_SOCIAL: 'customer_social' as const,
  SALES: 'sales' as const,
  RETURNS: 'returns' as const,
  PRODUCTS: 'products' as const
} as const;

export type DatasetKind = typeof DatasetKind[keyof typeof DatasetKind];

// Source object base names the pipeline recognises
export const DatasetIdentity = {
  CUSTOMERS: 'customers.csv' as const,
  CUSTOMERS_NEW: 'customers_new.csv' as const,
  SALES_2015: 'sales_2015.csv' as const,
  SALES_2016: 'sales_2016.csv' as const,
  SALES_2017: 'sales_2017.csv' as const,
  RETURNS: 'returns.csv' as const,
  PRODUCTS: 'products.csv' as const
} as const;

export type DatasetIdentity = typeof DatasetIdentity[keyof typeof DatasetIdentity];

// Storage notification event (only the fields the pipeline reads)
export interface StorageEventRecord {
  s3: {
    bucket: { name: string };
    object: { key: string };
  };
}

export interface StorageEvent {
  Records: StorageEventRecord[];
}

export interface HandlerResponse {
  statusCode: number;
  body: string;
}
