export type CellValue = string | number | boolean | null

export type TabularRow = Record<string, CellValue>

export interface TabularResult {
  columns: string[]
  rows: TabularRow[]
}

export type SelectorStage = 'catalog' | 'schema' | 'table'

export interface StageInputs {
  catalog?: string
  schema?: string
  table?: string
}

/**
 * Widget state sent by the client on every interaction.
 * `selections` are the values the user last saw selected; the server keeps
 * them only while they still pass the current filter.
 */
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

export type PanelWidth = 'full' | 'half'

export interface PanelView {
  id: string
  title: string
  width: PanelWidth
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
