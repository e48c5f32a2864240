import { createApp } from './app.js'
import { loadServerSettings } from './config/server.js'
import sharedExecutor from './services/queryExecutor.js'

const settings = loadServerSettings()
const app = createApp(settings)

const server = app.listen(settings.port, () => {
  console.log(`Claims explorer API listening on port ${settings.port}`)
  if (settings.useUserToken) {
    console.log('Queries run on behalf of the forwarding user when a token is present')
  }
})

const shutdown = (signal: string) => {
  console.log(`${signal} received, closing warehouse connection`)
  server.close()
  sharedExecutor
    .invalidate()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Shutdown failed:', error)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
