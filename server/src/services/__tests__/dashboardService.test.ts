import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { renderDashboard } from '../dashboardService.js'
import {
  kpiQuery,
  monthlyTrendQuery,
  previewQuery
} from '../analyticsPanel.js'
import type { RenderRequest, TabularResult } from '../../types/dashboard.js'
import { ConnectionError, QueryExecutionError } from '../../utils/errors.js'
import { FakeRunner, table } from '../../__tests__/helpers/fakeRunner.js'

const FQN = 'claims_db.gold.claims_enriched'

const METADATA: Record<string, TabularResult> = {
  'SHOW CATALOGS': table(['catalog'], [['sales'], ['claims_db']]),
  'SHOW SCHEMAS IN claims_db': table(['databaseName'], [['gold'], ['silver']]),
  'SHOW TABLES IN claims_db.gold': table(
    ['database', 'tableName', 'isTemporary'],
    [['gold', 'claims_raw', false], ['gold', 'claims_enriched', false]]
  )
}

const REQUEST: RenderRequest = { filters: { catalog: 'cla' }, selections: {} }

describe('renderDashboard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('resolves the selectors and renders every panel for the chosen table', async () => {
    const runner = FakeRunner.fromMap({
      ...METADATA,
      [previewQuery(FQN)]: table(['claim_id', 'total_charge'], [['c-1', 120.5]])
    })

    const plan = await renderDashboard(runner, REQUEST)

    expect(plan.error).toBeNull()
    expect(plan.tableFqn).toBe(FQN)
    expect(plan.selectors.map(view => view.status === 'ready' && view.selected)).toEqual([
      'claims_db',
      'gold',
      'claims_enriched'
    ])
    expect(plan.panels).toHaveLength(9)
    expect(plan.panels[0].content).toEqual({
      kind: 'table',
      data: { columns: ['claim_id', 'total_charge'], rows: [{ claim_id: 'c-1', total_charge: 120.5 }] }
    })
    expect(plan.panels[1].content).toEqual({
      kind: 'placeholder',
      notice: { level: 'info', message: 'No KPI data.' }
    })
  })

  test('an empty schema list halts before the table stage', async () => {
    const runner = FakeRunner.fromMap({
      'SHOW CATALOGS': table(['catalog'], [['claims_db']])
    })

    const plan = await renderDashboard(runner, REQUEST)

    expect(plan.selectors.map(view => view.stage)).toEqual(['catalog', 'schema'])
    expect(plan.selectors[1]).toMatchObject({
      status: 'no-candidates',
      notice: { level: 'error', message: 'No schemas found.' }
    })
    expect(plan.tableFqn).toBeNull()
    expect(plan.panels).toEqual([])
    expect(runner.calls).toEqual(['SHOW CATALOGS', 'SHOW SCHEMAS IN claims_db'])
  })

  test('a zero-row table keeps the preview placeholder and stops at the KPI failure', async () => {
    const runner = FakeRunner.fromMap({
      ...METADATA,
      [kpiQuery(FQN)]: new QueryExecutionError('Query failed', kpiQuery(FQN), new Error('[DIVIDE_BY_ZERO] Division by zero'))
    })

    const plan = await renderDashboard(runner, REQUEST)

    expect(plan.panels).toHaveLength(1)
    expect(plan.panels[0]).toMatchObject({
      id: 'preview',
      content: { kind: 'placeholder', notice: { message: 'No data found.' } }
    })
    expect(plan.error).toEqual({
      kind: 'query',
      message: 'Query failed: [DIVIDE_BY_ZERO] Division by zero'
    })
    expect(runner.calls.at(-1)).toBe(kpiQuery(FQN))
  })

  test('monthly trend rows keep the order the warehouse returned', async () => {
    const trend = table(
      ['month', 'charges', 'denied_amt'],
      [['2023-01', 100.0, 10.0], ['2023-02', 50.0, 0.0]]
    )
    const runner = FakeRunner.fromMap({ ...METADATA, [monthlyTrendQuery(FQN)]: trend })

    const plan = await renderDashboard(runner, REQUEST)
    const trendPanel = plan.panels.find(panel => panel.id === 'trend')

    expect(trendPanel?.content).toEqual({
      kind: 'line',
      index: 'month',
      series: ['charges', 'denied_amt'],
      data: trend
    })
  })

  test('a connection failure renders nothing but the error', async () => {
    const runner = new FakeRunner(() => new ConnectionError('DATABRICKS_HOST is not set'))

    const plan = await renderDashboard(runner, REQUEST)

    expect(plan).toEqual({
      selectors: [],
      tableFqn: null,
      panels: [],
      error: { kind: 'connection', message: 'DATABRICKS_HOST is not set' }
    })
  })

  test('a prior selection survives while it still matches', async () => {
    const runner = FakeRunner.fromMap(METADATA)

    const plan = await renderDashboard(runner, {
      filters: {},
      selections: { catalog: 'claims_db', schema: 'gold', table: 'claims_raw' }
    })

    expect(plan.tableFqn).toBe('claims_db.gold.claims_raw')
  })

  test('identical requests issue identical statements and plans', async () => {
    const runner = FakeRunner.fromMap(METADATA)

    const first = await renderDashboard(runner, REQUEST)
    const firstCalls = [...runner.calls]
    runner.calls.length = 0
    const second = await renderDashboard(runner, REQUEST)

    expect(runner.calls).toEqual(firstCalls)
    expect(second).toEqual(first)
  })

  test('unexpected errors are not turned into plan errors', async () => {
    const runner = new FakeRunner(() => new TypeError('boom'))
    await expect(renderDashboard(runner, REQUEST)).rejects.toThrow('boom')
  })
})
