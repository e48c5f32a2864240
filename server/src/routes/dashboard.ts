import express, { type Request } from 'express'
import { connectWithUserToken } from '../config/databricks.js'
import { loadServerSettings } from '../config/server.js'
import { emptyRenderRequest, renderDashboard } from '../services/dashboardService.js'
import sharedExecutor, { QueryExecutor } from '../services/queryExecutor.js'
import type { RenderRequest, SelectorStage, StageInputs } from '../types/dashboard.js'
import { BadRequestError, errorMessage } from '../utils/errors.js'

const router = express.Router()

const USER_TOKEN_HEADER = 'x-forwarded-access-token'
const STAGES: SelectorStage[] = ['catalog', 'schema', 'table']

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const parseStageInputs = (value: unknown, field: string): StageInputs => {
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) {
    throw new BadRequestError(`${field} must be an object`)
  }

  const inputs: StageInputs = {}
  for (const stage of STAGES) {
    const entry = value[stage]
    if (entry === undefined || entry === null) continue
    if (typeof entry !== 'string') {
      throw new BadRequestError(`${field}.${stage} must be a string`)
    }
    inputs[stage] = entry
  }
  return inputs
}

export const parseRenderRequest = (body: unknown): RenderRequest => {
  if (body === undefined || body === null) return emptyRenderRequest()
  if (!isRecord(body)) {
    throw new BadRequestError('Request body must be an object')
  }
  return {
    filters: parseStageInputs(body.filters, 'filters'),
    selections: parseStageInputs(body.selections, 'selections')
  }
}

// Requests forwarded with a user token query as that user when enabled;
// everything else shares the process-wide connection.
const resolveExecutorForRequest = (req: Request) => {
  const token = req.get(USER_TOKEN_HEADER)
  if (!token || !loadServerSettings().useUserToken) {
    return { executor: sharedExecutor, shouldClose: false }
  }
  return {
    executor: new QueryExecutor(connectWithUserToken(token)),
    shouldClose: true
  }
}

router.post('/render', async (req, res) => {
  try {
    const request = parseRenderRequest(req.body)
    const { executor, shouldClose } = resolveExecutorForRequest(req)

    try {
      const plan = await renderDashboard(executor, request)
      res.json({ plan })
    } finally {
      if (shouldClose) {
        await executor.invalidate()
      }
    }
  } catch (error) {
    if (error instanceof BadRequestError) {
      return res.status(400).json({ error: 'Invalid render request', message: error.message })
    }
    console.error('Render dashboard error:', error)
    res.status(500).json({ error: 'Failed to render dashboard', message: errorMessage(error) })
  }
})

// Drops the shared connection so the next render reconnects (e.g. after a
// credential rotation or warehouse restart).
router.post('/reconnect', async (_req, res) => {
  await sharedExecutor.invalidate()
  res.json({ success: true })
})

export default router
