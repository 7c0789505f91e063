import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createDatabase, createPool } from '@shiftdesk/db'
import { createApp } from './app'
import { loadApiConfig } from './config'
import { log } from './lib/log'

const config = loadApiConfig(process.env)
const pool = createPool(config.database)
const app = createApp({ db: createDatabase(pool), config })

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    log(`shiftdesk API http://localhost:${info.port}`)
  },
)

function shutdown(signal: string) {
  log(`${signal} received, closing`)
  server.close()
  pool.end().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
