import { describe, test, expect } from 'vitest'
import {
  defaultSelectionIndex,
  filterCandidates,
  resolveStage,
  runCascadingSelector,
  stageDefinition
} from '../cascadingSelector.js'
import type { SelectorStageView } from '../../types/dashboard.js'
import { FakeRunner, table } from '../../__tests__/helpers/fakeRunner.js'

describe('filterCandidates', () => {
  test('keeps exactly the case-insensitive substring matches in their original order', () => {
    const candidates = ['Claims_DB', 'sales', 'old_claims', 'CLAIMS', 'marketing']
    expect(filterCandidates(candidates, 'cLaImS')).toEqual(['Claims_DB', 'old_claims', 'CLAIMS'])
  })

  test('empty filter matches everything', () => {
    expect(filterCandidates(['b', 'a'], '')).toEqual(['b', 'a'])
  })

  test('treats glob and regex characters literally', () => {
    const candidates = ['claims', 'claims_v2', 'c.aims', 'cl*']
    expect(filterCandidates(candidates, 'c.a')).toEqual(['c.aims'])
    expect(filterCandidates(candidates, 'cl*')).toEqual(['cl*'])
  })

  test('catalog filter "cla" narrows to claims_db', () => {
    expect(filterCandidates(['sales', 'claims_db'], 'cla')).toEqual(['claims_db'])
  })
})

describe('defaultSelectionIndex', () => {
  test('picks the preferred name regardless of position', () => {
    expect(defaultSelectionIndex(['claims_raw', 'claims_staging', 'claims_enriched'], 'claims_enriched')).toBe(2)
  })

  test('falls back to the first option', () => {
    expect(defaultSelectionIndex(['claims_raw', 'claims_staging'], 'claims_enriched')).toBe(0)
    expect(defaultSelectionIndex(['claims_enriched'], null)).toBe(0)
  })
})

describe('resolveStage', () => {
  const tableStage = stageDefinition('table')
  const catalogStage = stageDefinition('catalog')

  test('table stage pre-selects claims_enriched', () => {
    const view = resolveStage(
      tableStage,
      ['claims_enriched', 'claims_raw', 'claims_staging'],
      'claims',
      undefined
    )
    expect(view).toEqual({
      stage: 'table',
      label: 'Table',
      filterLabel: 'Table filter',
      filterKey: 'table_filter',
      selectKey: 'table_select',
      status: 'ready',
      filter: 'claims',
      options: ['claims_enriched', 'claims_raw', 'claims_staging'],
      selectedIndex: 0,
      selected: 'claims_enriched'
    })
  })

  test('only the table stage prefers claims_enriched', () => {
    const view = resolveStage(catalogStage, ['main', 'claims_enriched'], '', undefined)
    expect(view.status === 'ready' && view.selected).toBe('main')
  })

  test('keeps a prior selection that still passes the filter', () => {
    const view = resolveStage(tableStage, ['claims_enriched', 'claims_raw'], '', 'claims_raw')
    expect(view.status === 'ready' && view.selectedIndex).toBe(1)
  })

  test('drops a prior selection the filter excludes', () => {
    const view = resolveStage(tableStage, ['claims_enriched', 'claims_raw', 'members'], 'claims', 'members')
    expect(view.status === 'ready' && view.selected).toBe('claims_enriched')
  })

  test('reports an empty candidate list with the stage notice', () => {
    expect(resolveStage(catalogStage, [], 'x', undefined)).toMatchObject({
      status: 'no-candidates',
      notice: { level: 'error', message: 'No catalogs available; check permissions.' }
    })
  })

  test('reports an empty filter result with a warning', () => {
    expect(resolveStage(catalogStage, ['sales'], 'zzz', undefined)).toMatchObject({
      status: 'no-matches',
      filter: 'zzz',
      notice: { level: 'warning', message: 'No catalogs match.' }
    })
  })
})

describe('runCascadingSelector', () => {
  const warehouse = () =>
    FakeRunner.fromMap({
      'SHOW CATALOGS': table(['catalog'], [['sales'], ['claims_db']]),
      'SHOW SCHEMAS IN claims_db': table(['databaseName'], [['bronze'], ['gold']]),
      'SHOW TABLES IN claims_db.gold': table(
        ['database', 'tableName', 'isTemporary'],
        [['gold', 'claims_raw', false], ['gold', 'claims_enriched', false]]
      )
    })

  test('resolves the full path and records a view per stage', async () => {
    const runner = warehouse()
    const views: SelectorStageView[] = []

    const path = await runCascadingSelector(
      runner,
      { filters: { catalog: 'cla', schema: 'GOLD' }, selections: {} },
      views
    )

    expect(path).toEqual({ catalog: 'claims_db', schema: 'gold', table: 'claims_enriched' })
    expect(views.map(view => view.status)).toEqual(['ready', 'ready', 'ready'])
    expect(runner.calls).toEqual([
      'SHOW CATALOGS',
      'SHOW SCHEMAS IN claims_db',
      'SHOW TABLES IN claims_db.gold'
    ])
  })

  test('stops at the first stage that has no matches', async () => {
    const runner = warehouse()
    const views: SelectorStageView[] = []

    const path = await runCascadingSelector(
      runner,
      { filters: { catalog: 'cla', schema: 'silver' }, selections: {} },
      views
    )

    expect(path).toBeNull()
    expect(views.map(view => view.stage)).toEqual(['catalog', 'schema'])
    expect(views[1]).toMatchObject({ status: 'no-matches', notice: { message: 'No schemas match.' } })
    expect(runner.calls).toHaveLength(2)
  })
})
