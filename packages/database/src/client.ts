// Warehouse (Redshift) connection factory
// Redshift speaks the PostgreSQL wire protocol, so the pg driver is used as is

import { Pool } from 'pg'
import type { WarehouseConfig } from './types'

export const DEFAULT_WAREHOUSE_PORT = 5439

export function createWarehousePool(config: WarehouseConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port ?? DEFAULT_WAREHOUSE_PORT,
    database: config.database,
    user: config.user,
    password: config.password,
    // One COPY per invocation
    max: 1
  })
}
