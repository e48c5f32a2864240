// Shapes returned by POST /api/dashboard/render.

export type CellValue = string | number | boolean | null

export type TabularRow = Record<string, CellValue>

export interface TabularResult {
  columns: string[]
  rows: TabularRow[]
}

export type SelectorStage = 'catalog' | 'schema' | 'table'

export const SELECTOR_STAGES: SelectorStage[] = ['catalog', 'schema', 'table']

export type StageInputs = Partial<Record<SelectorStage, string>>

export interface RenderRequest {
  filters: StageInputs
  selections: StageInputs
}

export type NoticeLevel = 'error' | 'warning' | 'info'

export interface Notice {
  level: NoticeLevel
  message: string
}

interface StageViewBase {
  stage: SelectorStage
  label: string
  filterLabel: string
  filterKey: string
  selectKey: string
}

export type SelectorStageView =
  | (StageViewBase & {
      status: 'ready'
      filter: string
      options: string[]
      selectedIndex: number
      selected: string
    })
  | (StageViewBase & { status: 'no-candidates'; notice: Notice })
  | (StageViewBase & { status: 'no-matches'; filter: string; notice: Notice })

export interface MetricItem {
  label: string
  value: string
}

export type PanelContent =
  | { kind: 'metrics'; items: MetricItem[] }
  | { kind: 'bar'; x: string; y: string; data: TabularResult }
  | { kind: 'line'; index: string; series: string[]; data: TabularResult }
  | { kind: 'table'; data: TabularResult }
  | { kind: 'placeholder'; notice: Notice }

export type BarContent = Extract<PanelContent, { kind: 'bar' }>
export type LineContent = Extract<PanelContent, { kind: 'line' }>

export interface PanelView {
  id: string
  title: string
  width: 'full' | 'half'
  sql: string
  content: PanelContent
}

export interface PassError {
  kind: 'connection' | 'query'
  message: string
}

export interface RenderPlan {
  selectors: SelectorStageView[]
  tableFqn: string | null
  panels: PanelView[]
  error: PassError | null
}
