import type { CellValue } from '../types/dashboard.js'

const currencyFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
})

/** Numeric value of a cell; warehouses return DECIMAL aggregates as text. */
export const toNumber = (value: CellValue | undefined): number => {
  if (value === null || value === undefined) return 0
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : 0
}

export const formatInteger = (value: CellValue | undefined): string =>
  String(Math.trunc(toNumber(value)))

export const formatCurrency = (value: CellValue | undefined): string => {
  const amount = toNumber(value)
  const formatted = currencyFormatter.format(Math.abs(amount))
  return amount < 0 ? `-$${formatted}` : `$${formatted}`
}

export const formatPercent = (ratio: CellValue | undefined): string =>
  `${(toNumber(ratio) * 100).toFixed(1)}%`
