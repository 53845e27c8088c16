// src/services/scoring.ts
import { ScoreFeatures, ScoreResult, Transaction, WalletActivity } from '../types'

export const DEX_PROTOCOL_TYPE = 'dexes'

const LIQUIDITY_ACTIONS = new Set(['add_liquidity', 'remove_liquidity'])
const SWAP_ACTIONS = new Set(['swap'])

const SECONDS_PER_DAY = 86_400

export interface ScoringConfig {
  lpWeight: number
  swapWeight: number
  pointsPerAction: number
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  lpWeight: 0.6,
  swapWeight: 0.4,
  pointsPerAction: 100,
}

// distinct UTC calendar days (floor of epoch seconds / 86400)
export function countActiveDays(transactions: Transaction[]): number {
  const days = new Set<number>()
  for (const tx of transactions) {
    days.add(Math.floor(tx.timestamp / SECONDS_PER_DAY))
  }
  return days.size
}

function freeze(result: ScoreResult): ScoreResult {
  Object.freeze(result.features.user_tags)
  Object.freeze(result.features)
  return Object.freeze(result)
}

/**
 * Score a wallet from its DEX activity.
 *
 * Returns `null` when the wallet has no "dexes" block at all, which callers
 * must keep apart from a present-but-empty block (scored 0, tagged inactive).
 */
export function scoreWallet(activity: WalletActivity, config: ScoringConfig = DEFAULT_SCORING_CONFIG): ScoreResult | null {
  const dex = activity.data.find((p) => p.protocolType === DEX_PROTOCOL_TYPE)
  if (!dex) return null

  const transactions = dex.transactions
  if (transactions.length === 0) {
    return freeze({
      final_score: 0,
      features: {
        active_days: 0,
        lp_score: 0,
        swap_score: 0,
        total_transaction_count: 0,
        user_tags: ['inactive'],
      },
    })
  }

  let lpCount = 0
  let swapCount = 0
  for (const tx of transactions) {
    if (LIQUIDITY_ACTIONS.has(tx.action)) lpCount++
    else if (SWAP_ACTIONS.has(tx.action)) swapCount++
  }

  const tags: string[] = []
  if (lpCount > 0) tags.push('consistent_lp')
  if (swapCount > 0) tags.push('consistent_trader')

  const lpScore = lpCount * config.pointsPerAction
  const swapScore = swapCount * config.pointsPerAction

  let finalScore: number
  if (lpScore > 0 && swapScore > 0) {
    finalScore = lpScore * config.lpWeight + swapScore * config.swapWeight
  } else if (lpScore > 0) {
    finalScore = lpScore
  } else if (swapScore > 0) {
    finalScore = swapScore
  } else {
    finalScore = 0
    if (!tags.includes('inactive')) tags.push('inactive')
  }

  const features: ScoreFeatures = {
    active_days: countActiveDays(transactions),
    lp_score: lpScore,
    swap_score: swapScore,
    total_transaction_count: transactions.length,
    user_tags: tags,
  }

  return freeze({ final_score: finalScore, features })
}
