import { connectFromEnvironment } from '../config/databricks.js'
import type { TabularResult } from '../types/dashboard.js'
import type { ConnectionFactory, WarehouseConnection, WarehouseCursor } from '../types/warehouse.js'
import { ConnectionError, QueryExecutionError, WarehouseError } from '../utils/errors.js'

export interface QueryRunner {
  runQuery(sql: string): Promise<TabularResult>
}

export const emptyResult = (): TabularResult => ({ columns: [], rows: [] })

const closeCursor = async (cursor: WarehouseCursor): Promise<void> => {
  try {
    await cursor.close()
  } catch (error) {
    console.warn('Failed to close warehouse cursor:', error)
  }
}

/**
 * Owns a single lazily-created warehouse connection and runs one statement
 * at a time against it. A failed connect is not remembered, so the next
 * call tries again; `invalidate()` drops a live connection.
 */
export class QueryExecutor implements QueryRunner {
  private connection: Promise<WarehouseConnection> | null = null

  constructor(private readonly connect: ConnectionFactory) {}

  private getConnection(): Promise<WarehouseConnection> {
    if (!this.connection) {
      const pending = this.connect().catch((error: unknown) => {
        if (this.connection === pending) {
          this.connection = null
        }
        throw error instanceof ConnectionError
          ? error
          : new ConnectionError('Failed to connect to warehouse', error)
      })
      this.connection = pending
    }
    return this.connection
  }

  async runQuery(sql: string): Promise<TabularResult> {
    const connection = await this.getConnection()
    const cursor = connection.cursor()

    try {
      await cursor.execute(sql)
      const result = await cursor.fetchAll()
      return result ?? emptyResult()
    } catch (error) {
      console.error('Query execution error:', error)
      if (error instanceof WarehouseError) throw error
      throw new QueryExecutionError('Query failed', sql, error)
    } finally {
      await closeCursor(cursor)
    }
  }

  /** Closes and forgets the cached connection; the next query reconnects. */
  async invalidate(): Promise<void> {
    const pending = this.connection
    this.connection = null
    if (!pending) return

    try {
      const connection = await pending
      await connection.close()
    } catch (error) {
      console.warn('Failed to close warehouse connection:', error)
    }
  }
}

export default new QueryExecutor(connectFromEnvironment)
