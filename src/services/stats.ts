// src/services/stats.ts
import { StatsSnapshot } from '../types'

export type Outcome = 'success' | 'failure'

// owned by index.ts, written only by the processor, read by the stats route
export class StatsTracker {
  private processed = 0
  private success = 0
  private failure = 0
  private lastProcessedAt: number | null = null

  // one call per message; all counters move together
  record(outcome: Outcome, processedAt: number): void {
    this.processed++
    if (outcome === 'success') this.success++
    else this.failure++
    this.lastProcessedAt = processedAt
  }

  snapshot(): Readonly<StatsSnapshot> {
    return Object.freeze({
      processed_count: this.processed,
      success_count: this.success,
      failure_count: this.failure,
      last_processed_timestamp: this.lastProcessedAt,
    })
  }
}
