// src/services/envelope.ts
import { DEX_PROTOCOL_TYPE } from './scoring'
import { FailureEnvelope, ScoreResult, SuccessEnvelope } from '../types'

const ZSCORE_DIGITS = 18

// downstream consumers parse zscore as a fixed-precision decimal
export function formatZScore(score: number): string {
  return score.toFixed(ZSCORE_DIGITS)
}

export function epochSeconds(ms: number): number {
  return Math.floor(ms / 1000)
}

// result === null means the wallet had no dexes block: no category to report
export function buildSuccessEnvelope(walletAddress: string, result: ScoreResult | null, nowMs: number): SuccessEnvelope {
  if (!result) {
    return {
      wallet_address: walletAddress,
      zscore: formatZScore(0),
      timestamp: epochSeconds(nowMs),
      categories: [],
    }
  }

  return {
    wallet_address: walletAddress,
    zscore: formatZScore(result.final_score),
    timestamp: epochSeconds(nowMs),
    categories: [
      {
        category: DEX_PROTOCOL_TYPE,
        score: result.final_score,
        transaction_count: result.features.total_transaction_count,
        features: { ...result.features, user_tags: [...result.features.user_tags] },
      },
    ],
  }
}

export function buildFailureEnvelope(walletAddress: string, error: string, nowMs: number): FailureEnvelope {
  return {
    wallet_address: walletAddress,
    timestamp: epochSeconds(nowMs),
    error,
  }
}

// best-known address of a record that may not have passed validation
export function walletAddressOf(raw: unknown): string {
  if (raw && typeof raw === 'object' && 'wallet_address' in raw) {
    const addr = raw.wallet_address
    if (typeof addr === 'string' && addr.length > 0) return addr
  }
  return 'N/A'
}
