import type { RenderPlan, RenderRequest } from '../types/dashboard.js'
import { WarehouseError } from '../utils/errors.js'
import { qualifiedTableName } from '../utils/sql.js'
import { runAnalyticsPanels } from './analyticsPanel.js'
import { runCascadingSelector } from './cascadingSelector.js'
import type { QueryRunner } from './queryExecutor.js'

export const emptyRenderRequest = (): RenderRequest => ({ filters: {}, selections: {} })

/**
 * One full render pass: selector stages, then every analytics panel, all
 * re-derived from the request. Warehouse failures end the pass where they
 * happen and are reported in `plan.error`; whatever was resolved before the
 * failure stays in the plan.
 */
export const renderDashboard = async (runner: QueryRunner, request: RenderRequest): Promise<RenderPlan> => {
  const plan: RenderPlan = {
    selectors: [],
    tableFqn: null,
    panels: [],
    error: null
  }

  try {
    const path = await runCascadingSelector(runner, request, plan.selectors)
    if (!path) {
      return plan
    }

    plan.tableFqn = qualifiedTableName(path.catalog, path.schema, path.table)
    await runAnalyticsPanels(runner, plan.tableFqn, plan.panels)
  } catch (error) {
    if (!(error instanceof WarehouseError)) {
      throw error
    }
    console.error(`Render pass aborted (${error.kind}):`, error.message)
    plan.error = { kind: error.kind, message: error.message }
  }

  return plan
}
