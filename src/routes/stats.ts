// src/routes/stats.ts
import express from 'express'
import { StatsTracker } from '../services/stats'

// read-only snapshot of processing counters
export default function statsRouter(stats: StatsTracker) {
  const router = express.Router()

  router.get('/', (_req, res) => {
    return res.json(stats.snapshot())
  })

  return router
}
