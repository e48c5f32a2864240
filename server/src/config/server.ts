import dotenv from 'dotenv'

dotenv.config()

type Env = Record<string, string | undefined>

export interface ServerSettings {
  port: number
  useUserToken: boolean
  clientDistDir: string | null
}

const DEFAULT_PORT = 3001

export const loadServerSettings = (env: Env = process.env): ServerSettings => {
  const parsedPort = Number.parseInt(env.PORT ?? '', 10)
  return {
    port: Number.isInteger(parsedPort) && parsedPort > 0 ? parsedPort : DEFAULT_PORT,
    useUserToken: (env.DATABRICKS_USE_USER_TOKEN ?? '').trim().toLowerCase() === 'true',
    clientDistDir: env.CLIENT_DIST_DIR?.trim() || null
  }
}
