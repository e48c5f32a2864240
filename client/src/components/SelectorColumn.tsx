import type { SelectorStage, SelectorStageView } from '../types'
import NoticeBanner from './NoticeBanner'

interface SelectorColumnProps {
  view?: SelectorStageView
  draft: string
  onDraftChange: (stage: SelectorStage, value: string) => void
  onCommitFilter: (stage: SelectorStage) => void
  onSelect: (stage: SelectorStage, value: string) => void
}

/**
 * One level of the catalog → schema → table picker. Stages the last render
 * pass never reached are left empty.
 */
export default function SelectorColumn({
  view,
  draft,
  onDraftChange,
  onCommitFilter,
  onSelect
}: SelectorColumnProps) {
  if (!view) {
    return <div className="selector-column" />
  }

  if (view.status === 'no-candidates') {
    return (
      <div className="selector-column">
        <NoticeBanner notice={view.notice} />
      </div>
    )
  }

  return (
    <div className="selector-column">
      <label className="selector-field" htmlFor={view.filterKey}>
        <span>{view.filterLabel}</span>
        <input
          id={view.filterKey}
          type="text"
          value={draft}
          placeholder="Type and press Enter"
          onChange={event => onDraftChange(view.stage, event.target.value)}
          onBlur={() => onCommitFilter(view.stage)}
          onKeyDown={event => {
            if (event.key === 'Enter') {
              onCommitFilter(view.stage)
            }
          }}
        />
      </label>

      {view.status === 'no-matches' ? (
        <NoticeBanner notice={view.notice} />
      ) : (
        <label className="selector-field" htmlFor={view.selectKey}>
          <span>{view.label}</span>
          <select
            id={view.selectKey}
            value={view.selected}
            onChange={event => onSelect(view.stage, event.target.value)}
          >
            {view.options.map(option => (
              <option key={option} value={option}>{option}</option>
            ))}
          </select>
        </label>
      )}
    </div>
  )
}
