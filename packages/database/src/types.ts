// Warehouse connection and loader types

export interface WarehouseConfig {
  host: string
  port?: number
  database: string
  user: string
  password: string
  iamRoleArn: string
}

// Minimal surface of a pooled connection; pg's PoolClient satisfies it
export interface WarehouseClient {
  query(text: string): Promise<unknown>
  // Passing an error discards the connection instead of returning it to the pool
  release(error?: Error | boolean): void
}

export interface WarehousePool {
  connect(): Promise<WarehouseClient>
}

export interface CopySource {
  bucket: string
  key: string
}

/**
 * Bulk-loads a CSV object from S3 into a warehouse table.
 */
export interface TableLoader {
  copyFromS3(table: string, source: CopySource): Promise<void>
}
