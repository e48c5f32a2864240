import { describe, test, expect } from 'vitest'
import { barTraces, formatCell, lineTraces, selectionsFromPlan } from '../planHelpers'
import type { RenderPlan } from '../../types'

describe('planHelpers', () => {
  test('selectionsFromPlan keeps only resolved stages', () => {
    const plan: RenderPlan = {
      selectors: [
        {
          stage: 'catalog',
          label: 'Catalog',
          filterLabel: 'Catalog filter',
          filterKey: 'catalog_filter',
          selectKey: 'catalog_select',
          status: 'ready',
          filter: '',
          options: ['claims_db'],
          selectedIndex: 0,
          selected: 'claims_db'
        },
        {
          stage: 'schema',
          label: 'Schema',
          filterLabel: 'Schema filter',
          filterKey: 'schema_filter',
          selectKey: 'schema_select',
          status: 'no-matches',
          filter: 'zzz',
          notice: { level: 'warning', message: 'No schemas match.' }
        }
      ],
      tableFqn: null,
      panels: [],
      error: null
    }

    expect(selectionsFromPlan(plan)).toEqual({ catalog: 'claims_db' })
    expect(selectionsFromPlan(null)).toEqual({})
  })

  test('lineTraces plots months in the order they were returned', () => {
    const traces = lineTraces({
      kind: 'line',
      index: 'month',
      series: ['charges', 'denied_amt'],
      data: {
        columns: ['month', 'charges', 'denied_amt'],
        rows: [
          { month: '2023-01', charges: 100.0, denied_amt: 10.0 },
          { month: '2023-02', charges: 50.0, denied_amt: 0.0 }
        ]
      }
    })

    expect(traces).toEqual([
      {
        type: 'scatter',
        mode: 'lines+markers',
        name: 'charges',
        x: ['2023-01', '2023-02'],
        y: [100, 50],
        line: { color: '#1976D2' }
      },
      {
        type: 'scatter',
        mode: 'lines+markers',
        name: 'denied_amt',
        x: ['2023-01', '2023-02'],
        y: [10, 0],
        line: { color: '#E53935' }
      }
    ])
  })

  test('barTraces labels null categories and parses numeric text', () => {
    const [trace] = barTraces({
      kind: 'bar',
      x: 'claim_status',
      y: 'n_claims',
      data: {
        columns: ['claim_status', 'n_claims'],
        rows: [
          { claim_status: 'denied', n_claims: '12' },
          { claim_status: null, n_claims: 3 }
        ]
      }
    })

    expect(trace).toMatchObject({
      type: 'bar',
      x: ['denied', '(null)'],
      y: [12, 3]
    })
  })

  test('formatCell shows NULL for missing values', () => {
    expect(formatCell(null)).toBe('NULL')
    expect(formatCell(false)).toBe('false')
    expect(formatCell(12.5)).toBe('12.5')
  })
})
