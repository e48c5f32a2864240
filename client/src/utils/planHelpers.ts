import type { Data } from 'plotly.js'
import type {
  BarContent,
  CellValue,
  LineContent,
  RenderPlan,
  SelectorStage,
  SelectorStageView,
  StageInputs,
  TabularResult
} from '../types'

const BAR_COLOR = '#2196F3'
const LINE_COLORS = ['#1976D2', '#E53935', '#43A047', '#FB8C00']

/** Selections the last plan resolved; sent back so widget state survives a re-render. */
export const selectionsFromPlan = (plan: RenderPlan | null): StageInputs => {
  const selections: StageInputs = {}
  for (const view of plan?.selectors ?? []) {
    if (view.status === 'ready') {
      selections[view.stage] = view.selected
    }
  }
  return selections
}

export const findStageView = (
  plan: RenderPlan | null,
  stage: SelectorStage
): SelectorStageView | undefined => plan?.selectors.find(view => view.stage === stage)

export const columnValues = (data: TabularResult, column: string): CellValue[] =>
  data.rows.map(row => row[column] ?? null)

export const categoryLabel = (value: CellValue): string =>
  value === null ? '(null)' : String(value)

const numericValue = (value: CellValue): number | null => {
  if (value === null) return null
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

export const barTraces = (content: BarContent): Data[] => [{
  type: 'bar',
  x: columnValues(content.data, content.x).map(categoryLabel),
  y: columnValues(content.data, content.y).map(numericValue),
  marker: { color: BAR_COLOR },
  hovertemplate: `%{x}<br>${content.y}: %{y}<extra></extra>`
}]

// Rows are plotted in the order the query returned them.
export const lineTraces = (content: LineContent): Data[] => {
  const index = columnValues(content.data, content.index).map(categoryLabel)
  return content.series.map((series, position): Data => ({
    type: 'scatter',
    mode: 'lines+markers',
    name: series,
    x: index,
    y: columnValues(content.data, series).map(numericValue),
    line: { color: LINE_COLORS[position % LINE_COLORS.length] }
  }))
}

export const formatCell = (value: CellValue): string => {
  if (value === null) return 'NULL'
  return String(value)
}
