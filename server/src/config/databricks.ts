import { DBSQLClient } from '@databricks/sql'
import dotenv from 'dotenv'
import type { CellValue, TabularResult, TabularRow } from '../types/dashboard.js'
import type { ConnectionFactory, WarehouseConnection, WarehouseCursor } from '../types/warehouse.js'
import { ConnectionError } from '../utils/errors.js'

dotenv.config()

type Env = Record<string, string | undefined>

type DatabricksConnectOptions = Parameters<DBSQLClient['connect']>[0]
type DatabricksSession = Awaited<ReturnType<DBSQLClient['openSession']>>
type DatabricksOperation = Awaited<ReturnType<DatabricksSession['executeStatement']>>

export interface WarehouseTarget {
  host: string
  path: string
}

export type WarehouseCredentials =
  | { type: 'token'; token: string }
  | { type: 'service-principal'; clientId: string; clientSecret: string }

export interface WarehouseSettings extends WarehouseTarget {
  credentials: WarehouseCredentials
}

const readEnv = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim()
  return value ? value : undefined
}

export const resolveWarehouseTarget = (env: Env = process.env): WarehouseTarget => {
  const rawHost = readEnv(env, 'DATABRICKS_HOST')
  if (!rawHost) {
    throw new ConnectionError('DATABRICKS_HOST is not set')
  }
  const host = rawHost.replace(/^https?:\/\//, '').replace(/\/+$/, '')

  const httpPath = readEnv(env, 'DATABRICKS_HTTP_PATH')
  const warehouseId = readEnv(env, 'DATABRICKS_WAREHOUSE_ID')
  if (!httpPath && !warehouseId) {
    throw new ConnectionError('DATABRICKS_WAREHOUSE_ID or DATABRICKS_HTTP_PATH must be set')
  }

  return {
    host,
    path: httpPath ?? `/sql/1.0/warehouses/${warehouseId}`
  }
}

export const resolveWarehouseCredentials = (env: Env = process.env): WarehouseCredentials => {
  const token = readEnv(env, 'DATABRICKS_TOKEN')
  if (token) {
    return { type: 'token', token }
  }

  const clientId = readEnv(env, 'DATABRICKS_CLIENT_ID')
  const clientSecret = readEnv(env, 'DATABRICKS_CLIENT_SECRET')
  if (clientId && clientSecret) {
    return { type: 'service-principal', clientId, clientSecret }
  }

  throw new ConnectionError(
    'No warehouse credentials: set DATABRICKS_TOKEN or DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET'
  )
}

export const resolveWarehouseSettings = (env: Env = process.env): WarehouseSettings => ({
  ...resolveWarehouseTarget(env),
  credentials: resolveWarehouseCredentials(env)
})

export const toConnectOptions = (settings: WarehouseSettings): DatabricksConnectOptions => {
  const { host, path, credentials } = settings
  if (credentials.type === 'token') {
    return { host, path, token: credentials.token }
  }
  return {
    host,
    path,
    authType: 'databricks-oauth',
    oauthClientId: credentials.clientId,
    oauthClientSecret: credentials.clientSecret
  }
}

const stringifyNested = (value: unknown): string =>
  JSON.stringify(value, (_key, nested: unknown) =>
    typeof nested === 'bigint' ? nested.toString() : nested
  )

/**
 * Driver values that are not JSON scalars (timestamps, BIGINT, arrays, maps,
 * structs) are flattened so a result can be sent to the browser as is.
 */
export const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value)
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString()
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  return stringifyNested(value)
}

export const toTabularResult = (rows: object[], schemaColumns: string[] | null): TabularResult => {
  const columns = schemaColumns ?? (rows.length > 0 ? Object.keys(rows[0]) : [])
  return {
    columns,
    rows: rows.map(row => {
      const values = new Map<string, unknown>(Object.entries(row))
      const normalized: TabularRow = {}
      for (const column of columns) {
        normalized[column] = normalizeCell(values.get(column))
      }
      return normalized
    })
  }
}

class DatabricksCursor implements WarehouseCursor {
  private operation: DatabricksOperation | null = null

  constructor(private readonly session: DatabricksSession) {}

  async execute(sql: string): Promise<void> {
    this.operation = await this.session.executeStatement(sql)
  }

  async fetchAll(): Promise<TabularResult | null> {
    if (!this.operation) return null
    const rows = await this.operation.fetchAll()
    const schema = await this.operation.getSchema()
    const schemaColumns = schema ? schema.columns.map(column => column.columnName) : null
    return toTabularResult(rows, schemaColumns)
  }

  async close(): Promise<void> {
    const operation = this.operation
    this.operation = null
    if (operation) {
      await operation.close()
    }
  }
}

export const createDatabricksConnection = async (settings: WarehouseSettings): Promise<WarehouseConnection> => {
  const client = new DBSQLClient()
  client.on('error', (error: unknown) => {
    console.error('Databricks client error:', error)
  })

  try {
    await client.connect(toConnectOptions(settings))
    const session = await client.openSession()
    console.log(`Connected to Databricks SQL warehouse at ${settings.host}${settings.path}`)

    return {
      cursor: () => new DatabricksCursor(session),
      close: async () => {
        try {
          await session.close()
        } finally {
          await client.close()
        }
      }
    }
  } catch (error) {
    await client.close()
    throw new ConnectionError('Failed to connect to Databricks SQL warehouse', error)
  }
}

/** Service-principal (or token) connection configured from the environment. */
export const connectFromEnvironment: ConnectionFactory = async () =>
  createDatabricksConnection(resolveWarehouseSettings())

/** Connection that queries on behalf of the user whose token the request forwarded. */
export const connectWithUserToken = (token: string): ConnectionFactory => async () =>
  createDatabricksConnection({
    ...resolveWarehouseTarget(),
    credentials: { type: 'token', token }
  })
