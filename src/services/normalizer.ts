// src/services/normalizer.ts
import { ScoreType } from '../types'

// percentile bucket [lower, upper) -> bounded score
export interface PercentileBucket {
  lower: number
  upper: number
  score: number
}

const BOUNDARIES = [0, 1, 5, 10, 25, 50, 75, 90, 95, 99, 100]

function buildBuckets(scores: number[]): PercentileBucket[] {
  return scores.map((score, i) => ({ lower: BOUNDARIES[i], upper: BOUNDARIES[i + 1], score }))
}

// lp and swap differ only in the 75-95 range
export const SCORE_BUCKETS: Record<ScoreType, readonly PercentileBucket[]> = {
  lp_score: buildBuckets([150, 250, 350, 450, 550, 650, 750, 850, 950, 1000]),
  swap_score: buildBuckets([150, 250, 350, 450, 550, 650, 800, 900, 950, 1000]),
}

const TOP_PERCENTILE = 99

/**
 * Map a percentile rank (0-100) of a raw magnitude within the wallet
 * population to a bucketed score. Not used by scoreWallet; the percentile
 * itself has to come from population statistics held elsewhere.
 */
export function normalizeScore(percentile: number, scoreType: ScoreType): number {
  const buckets = SCORE_BUCKETS[scoreType]
  for (const b of buckets) {
    if (b.lower <= percentile && percentile < b.upper) return b.score
  }
  if (percentile >= TOP_PERCENTILE) return buckets[buckets.length - 1].score
  return 0
}
