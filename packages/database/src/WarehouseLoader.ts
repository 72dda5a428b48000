import type { CopySource, TableLoader, WarehouseClient, WarehousePool } from './types'

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export interface LoaderLogger {
  info(message: string, meta?: Record<string, unknown>): unknown
  error(message: string, meta?: Record<string, unknown>): unknown
}

export class WarehouseLoadError extends Error {
  constructor(
    message: string,
    public table: string,
    public cause?: unknown
  ) {
    super(message)
    this.name = 'WarehouseLoadError'
  }
}

export function isValidTableName(table: string): boolean {
  return TABLE_NAME_PATTERN.test(table)
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/**
 * COPY statement for a headerless, comma-delimited CSV object
 */
export function buildCopyQuery(table: string, source: CopySource, iamRoleArn: string): string {
  if (!isValidTableName(table)) {
    throw new WarehouseLoadError(`Invalid table name: ${table}`, table)
  }

  return [
    `COPY ${table}`,
    `FROM ${quoteLiteral(`s3://${source.bucket}/${source.key}`)}`,
    `IAM_ROLE ${quoteLiteral(iamRoleArn)}`,
    'FORMAT AS CSV',
    `DELIMITER ',';`
  ].join('\n')
}

export class WarehouseLoader implements TableLoader {
  private readonly pool: WarehousePool
  private readonly iamRoleArn: string
  private readonly logger?: LoaderLogger

  constructor(pool: WarehousePool, options: { iamRoleArn: string; logger?: LoaderLogger }) {
    this.pool = pool
    this.iamRoleArn = options.iamRoleArn
    this.logger = options.logger
  }

  /**
   * Run the COPY in its own transaction. The client is released either way.
   */
  async copyFromS3(table: string, source: CopySource): Promise<void> {
    const query = buildCopyQuery(table, source, this.iamRoleArn)
    const client = await this.pool.connect()
    let failure: Error | undefined

    try {
      this.logger?.info('Executing warehouse COPY command', { table, bucket: source.bucket, key: source.key })
      await client.query('begin')
      await client.query(query)
      await client.query('commit')
      this.logger?.info('Data successfully loaded into warehouse table', { table })
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error))
      await this.rollback(client, table)
      this.logger?.error('Warehouse COPY failed', { table, error: failure.message })
      throw new WarehouseLoadError(`COPY into ${table} failed: ${failure.message}`, table, error)
    } finally {
      client.release(failure)
    }
  }

  private async rollback(client: WarehouseClient, table: string): Promise<void> {
    try {
      await client.query('rollback')
    } catch (error) {
      this.logger?.error('Warehouse rollback failed', {
        table,
        error: error instanceof Error ? error.message : 'Unknown error'
      })
    }
  }
}
