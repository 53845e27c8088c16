// src/app.ts
import express from 'express'
import http from 'http'
import cors from 'cors'
import morgan from 'morgan'
import healthRouter from './routes/health'
import statsRouter from './routes/stats'
import { StatsTracker } from './services/stats'
import { StreamProcessor } from './services/processor'
import { SERVICE_DESCRIPTION, SERVICE_TITLE, SERVICE_VERSION } from './config'

export interface ServerDeps {
  stats: StatsTracker
  processor: Pick<StreamProcessor, 'getStatus'>
}

export function createApp({ stats, processor }: ServerDeps) {
  const app = express()
  app.use(cors())
  app.use(express.json())
  app.use(morgan('tiny'))

  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_TITLE,
      description: SERVICE_DESCRIPTION,
      version: SERVICE_VERSION,
      status: 'running'
    })
  })

  // API routes
  app.use('/api/v1/health', healthRouter(processor))
  app.use('/api/v1/stats', statsRouter(stats))

  return app
}

// createServer exported so index.ts controls listen/close
export function createServer(deps: ServerDeps) {
  const app = createApp(deps)
  const httpServer = http.createServer(app)
  return { app, httpServer }
}
