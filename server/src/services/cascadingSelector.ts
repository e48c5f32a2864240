import type {
  Notice,
  RenderRequest,
  SelectorStage,
  SelectorStageView
} from '../types/dashboard.js'
import { listCatalogs, listSchemas, listTables } from './catalogService.js'
import type { QueryRunner } from './queryExecutor.js'

export const PREFERRED_TABLE = 'claims_enriched'

export interface ResolvedPath {
  catalog: string
  schema: string
  table: string
}

interface StageDefinition {
  stage: SelectorStage
  label: string
  noCandidates: Notice
  noMatches: Notice
  preferred: string | null
  listCandidates: (runner: QueryRunner, parents: string[]) => Promise<string[]>
}

const STAGES: StageDefinition[] = [
  {
    stage: 'catalog',
    label: 'Catalog',
    noCandidates: { level: 'error', message: 'No catalogs available; check permissions.' },
    noMatches: { level: 'warning', message: 'No catalogs match.' },
    preferred: null,
    listCandidates: runner => listCatalogs(runner)
  },
  {
    stage: 'schema',
    label: 'Schema',
    noCandidates: { level: 'error', message: 'No schemas found.' },
    noMatches: { level: 'warning', message: 'No schemas match.' },
    preferred: null,
    listCandidates: (runner, [catalog]) => listSchemas(runner, catalog)
  },
  {
    stage: 'table',
    label: 'Table',
    noCandidates: { level: 'warning', message: 'No tables in this schema.' },
    noMatches: { level: 'warning', message: 'No tables match.' },
    preferred: PREFERRED_TABLE,
    listCandidates: (runner, [catalog, schema]) => listTables(runner, catalog, schema)
  }
]

/** Plain, case-insensitive substring containment. Order is preserved. */
export const filterCandidates = (candidates: string[], filter: string): string[] => {
  const needle = filter.toLowerCase()
  return candidates.filter(candidate => candidate.toLowerCase().includes(needle))
}

export const defaultSelectionIndex = (options: string[], preferred: string | null): number => {
  if (preferred === null) return 0
  const index = options.indexOf(preferred)
  return index >= 0 ? index : 0
}

export const resolveStage = (
  definition: StageDefinition,
  candidates: string[],
  filter: string,
  prior: string | undefined
): SelectorStageView => {
  const base = {
    stage: definition.stage,
    label: definition.label,
    filterLabel: `${definition.label} filter`,
    filterKey: `${definition.stage}_filter`,
    selectKey: `${definition.stage}_select`
  }

  if (candidates.length === 0) {
    return { ...base, status: 'no-candidates', notice: definition.noCandidates }
  }

  const options = filterCandidates(candidates, filter)
  if (options.length === 0) {
    return { ...base, status: 'no-matches', filter, notice: definition.noMatches }
  }

  const priorIndex = prior === undefined ? -1 : options.indexOf(prior)
  const selectedIndex = priorIndex >= 0 ? priorIndex : defaultSelectionIndex(options, definition.preferred)

  return {
    ...base,
    status: 'ready',
    filter,
    options,
    selectedIndex,
    selected: options[selectedIndex]
  }
}

export const stageDefinition = (stage: SelectorStage): StageDefinition => {
  const definition = STAGES.find(candidate => candidate.stage === stage)
  if (!definition) {
    throw new Error(`Unknown selector stage: ${stage}`)
  }
  return definition
}

/**
 * Runs the catalog → schema → table chain. Each view is pushed to `views`
 * as soon as it is resolved, so a failure further down still leaves the
 * stages above it in place. Returns the resolved path, or null when a stage
 * halted the pass.
 */
export const runCascadingSelector = async (
  runner: QueryRunner,
  request: RenderRequest,
  views: SelectorStageView[]
): Promise<ResolvedPath | null> => {
  const parents: string[] = []

  for (const definition of STAGES) {
    const candidates = await definition.listCandidates(runner, parents)
    const view = resolveStage(
      definition,
      candidates,
      request.filters[definition.stage] ?? '',
      request.selections[definition.stage]
    )
    views.push(view)

    if (view.status !== 'ready') {
      return null
    }
    parents.push(view.selected)
  }

  const [catalog, schema, table] = parents
  return { catalog, schema, table }
}
