export type WarehouseErrorKind = 'connection' | 'query'

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}

/**
 * Failures raised while talking to the warehouse. `status` follows the
 * `error.status` convention the routes use when mapping errors to responses.
 */
export abstract class WarehouseError extends Error {
  abstract readonly kind: WarehouseErrorKind
  abstract readonly status: number

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause })
    this.name = new.target.name
  }
}

export class ConnectionError extends WarehouseError {
  readonly kind = 'connection'
  readonly status = 503
}

export class QueryExecutionError extends WarehouseError {
  readonly kind = 'query'
  readonly status = 502
  readonly sql: string

  constructor(message: string, sql: string, cause?: unknown) {
    super(message, cause)
    this.sql = sql
  }
}

export class BadRequestError extends Error {
  readonly status = 400

  constructor(message: string) {
    super(message)
    this.name = 'BadRequestError'
  }
}
