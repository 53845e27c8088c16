// src/types.ts

// a single on-chain action as delivered by the upstream indexer
export interface Transaction {
  action: string
  timestamp: number // epoch seconds, UTC
  caller: string
  protocol: string
  document_id?: string
  poolId?: string
  poolName?: string
  tokenIn?: Record<string, unknown>
  tokenOut?: Record<string, unknown>
  token_address?: string
  amount?: number | string
  block_number?: number
}

export interface ProtocolActivity {
  protocolType: string
  transactions: Transaction[]
}

// inbound unit of work, one per message
export interface WalletActivity {
  wallet_address: string
  data: ProtocolActivity[]
}

export interface ScoreFeatures {
  active_days: number
  lp_score: number
  swap_score: number
  total_transaction_count: number
  user_tags: string[]
}

export interface ScoreResult {
  final_score: number
  features: ScoreFeatures
}

export type ScoreType = 'lp_score' | 'swap_score'

export interface CategoryScore {
  category: 'dexes'
  score: number
  transaction_count: number
  features: ScoreFeatures
}

export interface SuccessEnvelope {
  wallet_address: string
  zscore: string // fixed 18 decimal digits
  timestamp: number // epoch seconds
  categories: CategoryScore[]
}

export interface FailureEnvelope {
  wallet_address: string
  timestamp: number // epoch seconds
  error: string
}

export type EnvelopeKind = 'success' | 'failure'

export type OutputEnvelope =
  | { kind: 'success'; record: SuccessEnvelope }
  | { kind: 'failure'; record: FailureEnvelope }

// what to publish when a wallet carries no "dexes" block at all
export type NoDexDataPolicy = 'empty-success' | 'failure'

export interface StatsSnapshot {
  processed_count: number
  success_count: number
  failure_count: number
  last_processed_timestamp: number | null
}
