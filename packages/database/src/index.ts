// Warehouse package exports
// Connection factory and COPY-based bulk loader

export { createWarehousePool, DEFAULT_WAREHOUSE_PORT } from './client'
export { WarehouseLoader, WarehouseLoadError, buildCopyQuery, isValidTableName } from './WarehouseLoader'

export type {
  WarehouseConfig,
  WarehouseClient,
  WarehousePool,
  CopySource,
  TableLoader
} from './types'
