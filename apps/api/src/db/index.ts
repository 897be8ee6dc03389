import pg from 'pg'
import type { StructuredLogger } from '@dualdrop/observability'

export function createPool(connectionString: string, logger: StructuredLogger): pg.Pool {
  const pool = new pg.Pool({ connectionString })

  pool.on('error', (err) => {
    logger.error('db_pool_error', {}, err)
  })

  return pool
}

export { PgClaimStore } from './claims'
export type { SqlClient, SqlPool } from './claims'
