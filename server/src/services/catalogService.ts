import type { TabularResult } from '../types/dashboard.js'
import { QueryExecutionError } from '../utils/errors.js'
import type { QueryRunner } from './queryExecutor.js'

const TABLE_NAME_COLUMN = 'tableName'
const TABLE_NAME_FALLBACK_INDEX = 1

export const showCatalogsQuery = (): string => 'SHOW CATALOGS'

export const showSchemasQuery = (catalog: string): string => `SHOW SCHEMAS IN ${catalog}`

export const showTablesQuery = (catalog: string, schema: string): string =>
  `SHOW TABLES IN ${catalog}.${schema}`

/** Non-null values of one column, stringified, in row order. */
export const columnValues = (result: TabularResult, column: string): string[] =>
  result.rows
    .map(row => row[column])
    .filter((value): value is string | number | boolean => value !== null && value !== undefined)
    .map(value => String(value))

/**
 * `SHOW TABLES` names its table column `tableName` on current warehouses;
 * older shapes are read by position.
 */
export const resolveTableNameColumn = (result: TabularResult, sql: string): string => {
  if (result.columns.includes(TABLE_NAME_COLUMN)) {
    return TABLE_NAME_COLUMN
  }
  if (result.columns.length <= TABLE_NAME_FALLBACK_INDEX) {
    throw new QueryExecutionError(
      `Table listing returned ${result.columns.length} column(s) and no ${TABLE_NAME_COLUMN} column`,
      sql
    )
  }
  return result.columns[TABLE_NAME_FALLBACK_INDEX]
}

const firstColumnValues = (result: TabularResult): string[] =>
  result.columns.length > 0 ? columnValues(result, result.columns[0]) : []

export const listCatalogs = async (runner: QueryRunner): Promise<string[]> => {
  const result = await runner.runQuery(showCatalogsQuery())
  return firstColumnValues(result)
}

export const listSchemas = async (runner: QueryRunner, catalog: string): Promise<string[]> => {
  const result = await runner.runQuery(showSchemasQuery(catalog))
  return firstColumnValues(result)
}

export const listTables = async (runner: QueryRunner, catalog: string, schema: string): Promise<string[]> => {
  const sql = showTablesQuery(catalog, schema)
  const result = await runner.runQuery(sql)
  if (result.rows.length === 0) {
    return []
  }
  return columnValues(result, resolveTableNameColumn(result, sql))
}
