import { Router } from 'express'
import sharedExecutor from '../services/queryExecutor.js'
import { errorMessage } from '../utils/errors.js'

const router = Router()

router.get('/', async (_req, res) => {
  try {
    await sharedExecutor.runQuery('SELECT 1')
    return res.json({ status: 'ok' })
  } catch (error) {
    console.error('Warehouse health check failed:', error)
    return res.status(503).json({ status: 'unavailable', message: errorMessage(error) })
  }
})

export default router
