import { useCallback, useEffect, useRef, useState } from 'react'
import { isAxiosError } from 'axios'
import NoticeBanner from '../components/NoticeBanner'
import PanelCard from '../components/PanelCard'
import SelectorColumn from '../components/SelectorColumn'
import { fetchRenderPlan, reconnectWarehouse } from '../services/dashboardApi'
import {
  SELECTOR_STAGES,
  type RenderPlan,
  type RenderRequest,
  type SelectorStage,
  type StageInputs
} from '../types'
import { findStageView, selectionsFromPlan } from '../utils/planHelpers'
import './ClaimsExplorer.css'

const describeRequestError = (error: unknown): string => {
  if (isAxiosError<{ message?: string; error?: string }>(error)) {
    return error.response?.data?.message ?? error.response?.data?.error ?? error.message
  }
  return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Every interaction re-runs the whole dashboard on the server: the widget
 * state goes up, a complete render plan comes back and replaces the page.
 */
export default function ClaimsExplorer() {
  const [request, setRequest] = useState<RenderRequest>({ filters: {}, selections: {} })
  const [drafts, setDrafts] = useState<StageInputs>({})
  const [plan, setPlan] = useState<RenderPlan | null>(null)
  const [loading, setLoading] = useState(false)
  const [requestError, setRequestError] = useState<string | null>(null)
  const latestRequestId = useRef(0)

  useEffect(() => {
    const requestId = ++latestRequestId.current

    const loadPlan = async () => {
      setLoading(true)
      try {
        const nextPlan = await fetchRenderPlan(request)
        if (requestId !== latestRequestId.current) return
        setPlan(nextPlan)
        setRequestError(null)
      } catch (error) {
        if (requestId !== latestRequestId.current) return
        console.error('Failed to render dashboard:', error)
        setRequestError(describeRequestError(error))
      } finally {
        if (requestId === latestRequestId.current) {
          setLoading(false)
        }
      }
    }

    void loadPlan()
  }, [request])

  const handleDraftChange = useCallback((stage: SelectorStage, value: string) => {
    setDrafts(prev => ({ ...prev, [stage]: value }))
  }, [])

  const handleCommitFilter = useCallback((stage: SelectorStage) => {
    const value = drafts[stage]
    if (value === undefined) return
    setRequest(current => {
      if ((current.filters[stage] ?? '') === value) return current
      return {
        filters: { ...current.filters, [stage]: value },
        selections: selectionsFromPlan(plan)
      }
    })
  }, [drafts, plan])

  const handleSelect = useCallback((stage: SelectorStage, value: string) => {
    setRequest(current => ({
      filters: current.filters,
      selections: { ...selectionsFromPlan(plan), [stage]: value }
    }))
  }, [plan])

  const handleReconnect = async () => {
    try {
      await reconnectWarehouse()
      setRequest(current => ({ ...current }))
    } catch (error) {
      console.error('Failed to reconnect:', error)
      setRequestError(describeRequestError(error))
    }
  }

  return (
    <div className="claims-explorer">
      <header className="explorer-header">
        <h1>Claims Enriched Table Explorer</h1>
        {loading && <span className="explorer-loading">Running queries…</span>}
      </header>

      <div className="selector-row">
        {SELECTOR_STAGES.map(stage => (
          <SelectorColumn
            key={stage}
            view={findStageView(plan, stage)}
            draft={drafts[stage] ?? request.filters[stage] ?? ''}
            onDraftChange={handleDraftChange}
            onCommitFilter={handleCommitFilter}
            onSelect={handleSelect}
          />
        ))}
      </div>

      {plan?.tableFqn && (
        <h2 className="explorer-subheading">
          Data from <code>{plan.tableFqn}</code>
        </h2>
      )}

      {plan && plan.panels.length > 0 && (
        <div className="panel-grid">
          {plan.panels.map(panel => (
            <PanelCard key={panel.id} panel={panel} />
          ))}
        </div>
      )}

      {plan?.error && (
        <NoticeBanner notice={{ level: 'error', message: plan.error.message }}>
          {plan.error.kind === 'connection' && (
            <button type="button" className="notice-action" onClick={handleReconnect}>
              Reconnect
            </button>
          )}
        </NoticeBanner>
      )}

      {requestError && (
        <NoticeBanner notice={{ level: 'error', message: `Could not load the dashboard: ${requestError}` }} />
      )}
    </div>
  )
}
