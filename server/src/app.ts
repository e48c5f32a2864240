import path from 'path'
import express from 'express'
import type { ServerSettings } from './config/server.js'
import dashboardRouter from './routes/dashboard.js'
import healthRouter from './routes/health.js'

export const createApp = (settings: Pick<ServerSettings, 'clientDistDir'>) => {
  const app = express()

  app.use(express.json())
  app.use('/api/health', healthRouter)
  app.use('/api/dashboard', dashboardRouter)

  if (settings.clientDistDir) {
    const clientDir = path.resolve(settings.clientDistDir)
    app.use(express.static(clientDir))
    app.get('*', (_req, res) => {
      res.sendFile(path.join(clientDir, 'index.html'))
    })
  }

  return app
}
