// src/routes/health.ts
import express from 'express'
import { StreamProcessor } from '../services/processor'

// Health check used by load balancers. "degraded" once the stream transport
// has been failing past the escalation threshold; the process keeps retrying.
export default function healthRouter(processor: Pick<StreamProcessor, 'getStatus'>) {
  const router = express.Router()

  router.get('/', (_req, res) => {
    const status = processor.getStatus()
    return res.json({
      status: status.escalated ? 'degraded' : 'ok',
      processor: status.state,
      uptime_seconds: Math.floor(process.uptime()),
      timestamp: Date.now()
    })
  })

  return router
}
