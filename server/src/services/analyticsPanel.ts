import type {
  MetricItem,
  PanelContent,
  PanelView,
  PanelWidth,
  TabularResult
} from '../types/dashboard.js'
import { formatCurrency, formatInteger, formatPercent } from '../utils/format.js'
import { compactSql } from '../utils/sql.js'
import type { QueryRunner } from './queryExecutor.js'

const DENIED_STATUS = 'denied'
const PREVIEW_LIMIT = 100
const TOP_N = 10
const MIN_PROVIDER_CLAIMS = 3
const OUTLIER_STDDEVS = 3

export interface PanelDefinition {
  id: string
  title: string
  width: PanelWidth
  emptyMessage: string
  buildQuery: (tableFqn: string) => string
  present: (result: TabularResult) => PanelContent
}

export const previewQuery = (tableFqn: string): string =>
  `SELECT * FROM ${tableFqn} LIMIT ${PREVIEW_LIMIT}`

export const kpiQuery = (tableFqn: string): string => compactSql(`
  SELECT
    COUNT(*) AS total_claims,
    SUM(COALESCE(total_charge, 0)) AS total_charges,
    COUNT(DISTINCT member_id) AS distinct_members,
    COUNT(DISTINCT provider_id) AS distinct_providers,
    SUM(CASE WHEN claim_status = '${DENIED_STATUS}' THEN 1 ELSE 0 END) / COUNT(*) AS denial_rate
  FROM ${tableFqn}
`)

export const statusBreakdownQuery = (tableFqn: string): string => compactSql(`
  SELECT claim_status, COUNT(*) AS n_claims
  FROM ${tableFqn}
  GROUP BY claim_status
`)

export const monthlyTrendQuery = (tableFqn: string): string => compactSql(`
  SELECT
    substr(claim_date, 1, 7) AS month,
    SUM(total_charge) AS charges,
    SUM(CASE WHEN claim_status = '${DENIED_STATUS}' THEN total_charge ELSE 0 END) AS denied_amt
  FROM ${tableFqn}
  GROUP BY month
  ORDER BY month
`)

export const denialReasonsQuery = (tableFqn: string): string => compactSql(`
  SELECT diagnosis_desc, COUNT(*) AS denied_claims
  FROM ${tableFqn}
  WHERE claim_status = '${DENIED_STATUS}'
  GROUP BY diagnosis_desc
  ORDER BY denied_claims DESC
  LIMIT ${TOP_N}
`)

export const providerDenialRateQuery = (tableFqn: string): string => compactSql(`
  SELECT
    provider_name,
    SUM(CASE WHEN claim_status = '${DENIED_STATUS}' THEN 1 ELSE 0 END) / COUNT(*) AS denial_rate,
    COUNT(*) AS total
  FROM ${tableFqn}
  GROUP BY provider_name
  HAVING COUNT(*) >= ${MIN_PROVIDER_CLAIMS}
  ORDER BY denial_rate DESC
  LIMIT ${TOP_N}
`)

export const diagnosisCostQuery = (tableFqn: string): string => compactSql(`
  SELECT diagnosis_desc, COUNT(*) AS n_claims, SUM(total_charge) AS charges
  FROM ${tableFqn}
  GROUP BY diagnosis_desc
  ORDER BY charges DESC
  LIMIT ${TOP_N}
`)

export const providerChargesQuery = (tableFqn: string): string => compactSql(`
  SELECT provider_name, SUM(total_charge) AS charges, COUNT(*) AS n_claims
  FROM ${tableFqn}
  GROUP BY provider_name
  ORDER BY charges DESC
  LIMIT ${TOP_N}
`)

export const outlierClaimsQuery = (tableFqn: string): string => compactSql(`
  SELECT *
  FROM ${tableFqn}
  WHERE total_charge > (
    SELECT AVG(total_charge) + ${OUTLIER_STDDEVS} * STDDEV(total_charge) FROM ${tableFqn}
  )
  ORDER BY total_charge DESC
  LIMIT ${TOP_N}
`)

export const presentKpis = (result: TabularResult): PanelContent => {
  const [row] = result.rows
  const items: MetricItem[] = [
    { label: 'Total Claims', value: formatInteger(row.total_claims) },
    { label: 'Total Charges', value: formatCurrency(row.total_charges) },
    { label: 'Unique Members', value: formatInteger(row.distinct_members) },
    { label: 'Unique Providers', value: formatInteger(row.distinct_providers) },
    { label: 'Denial Rate', value: formatPercent(row.denial_rate) }
  ]
  return { kind: 'metrics', items }
}

const asTable = (result: TabularResult): PanelContent => ({ kind: 'table', data: result })

const asBar = (x: string, y: string) => (result: TabularResult): PanelContent => ({
  kind: 'bar',
  x,
  y,
  data: result
})

export const ANALYTICS_PANELS: PanelDefinition[] = [
  {
    id: 'preview',
    title: 'Data preview',
    width: 'full',
    emptyMessage: 'No data found.',
    buildQuery: previewQuery,
    present: asTable
  },
  {
    id: 'kpis',
    title: 'Key metrics',
    width: 'full',
    emptyMessage: 'No KPI data.',
    buildQuery: kpiQuery,
    present: presentKpis
  },
  {
    id: 'status',
    title: 'Claims by Status',
    width: 'half',
    emptyMessage: 'No claims status data.',
    buildQuery: statusBreakdownQuery,
    present: asBar('claim_status', 'n_claims')
  },
  {
    id: 'trend',
    title: 'Monthly Charges & Denials',
    width: 'half',
    emptyMessage: 'No trend data.',
    buildQuery: monthlyTrendQuery,
    present: result => ({ kind: 'line', index: 'month', series: ['charges', 'denied_amt'], data: result })
  },
  {
    id: 'denialReasons',
    title: 'Top Denial Reasons (Diagnosis)',
    width: 'half',
    emptyMessage: 'No denials by reason.',
    buildQuery: denialReasonsQuery,
    present: asBar('diagnosis_desc', 'denied_claims')
  },
  {
    id: 'providerDenialRate',
    title: 'Providers with Highest Denial Rate',
    width: 'half',
    emptyMessage: 'No denial/provider data.',
    buildQuery: providerDenialRateQuery,
    present: asBar('provider_name', 'denial_rate')
  },
  {
    id: 'diagnosisCost',
    title: 'Top Diagnoses by Cost',
    width: 'half',
    emptyMessage: 'No diagnoses data.',
    buildQuery: diagnosisCostQuery,
    present: asBar('diagnosis_desc', 'charges')
  },
  {
    id: 'providerCharges',
    title: 'Top Providers by Total Charge',
    width: 'half',
    emptyMessage: 'No provider data.',
    buildQuery: providerChargesQuery,
    present: asTable
  },
  {
    id: 'outliers',
    title: 'Outlier High-Charge Claims',
    width: 'full',
    emptyMessage: 'No outlier claims found.',
    buildQuery: outlierClaimsQuery,
    present: asTable
  }
]

export const presentPanel = (definition: PanelDefinition, sql: string, result: TabularResult): PanelView => ({
  id: definition.id,
  title: definition.title,
  width: definition.width,
  sql,
  content: result.rows.length === 0
    ? { kind: 'placeholder', notice: { level: 'info', message: definition.emptyMessage } }
    : definition.present(result)
})

/**
 * Runs every panel query in order, one at a time. Views are appended as they
 * complete; a failing query stops the loop with the earlier panels kept.
 */
export const runAnalyticsPanels = async (
  runner: QueryRunner,
  tableFqn: string,
  panels: PanelView[],
  definitions: PanelDefinition[] = ANALYTICS_PANELS
): Promise<void> => {
  for (const definition of definitions) {
    const sql = definition.buildQuery(tableFqn)
    const result = await runner.runQuery(sql)
    panels.push(presentPanel(definition, sql, result))
  }
}
