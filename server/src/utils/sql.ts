/** Collapses a multi-line statement to one line so identical inputs give identical text. */
export const compactSql = (sql: string): string => sql.replace(/\s+/g, ' ').trim()

export const qualifiedTableName = (catalog: string, schema: string, table: string): string =>
  `${catalog}.${schema}.${table}`
