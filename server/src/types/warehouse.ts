import type { TabularResult } from './dashboard.js'

/**
 * Driver seam used by the query executor. A cursor runs one statement and is
 * closed by its owner on every exit path.
 */
export interface WarehouseCursor {
  execute(sql: string): Promise<void>
  fetchAll(): Promise<TabularResult | null>
  close(): Promise<void>
}

export interface WarehouseConnection {
  cursor(): WarehouseCursor
  close(): Promise<void>
}

export type ConnectionFactory = () => Promise<WarehouseConnection>
