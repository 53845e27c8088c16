// src/config.ts
import dotenv from 'dotenv'
import os from 'os'
import { z } from 'zod'
import { formatIssues } from './validation/schema'
dotenv.config()

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)
const text = (fallback: string) => z.string().min(1).default(fallback)

export const configSchema = z.object({
  PORT: z.coerce.number().int().positive().max(65_535).default(8000),

  SERVICE_TITLE: text('DeFi Reputation Scoring Server'),
  SERVICE_DESCRIPTION: text('Scores wallet reputation from DEX activity'),
  SERVICE_VERSION: text('1.0.0'),

  // redis streams
  REDIS_URL: text('redis://localhost:6379'),
  INPUT_STREAM: text('wallet-transactions'),
  SUCCESS_STREAM: text('wallet-scores-success'),
  FAILURE_STREAM: text('wallet-scores-failure'),
  CONSUMER_GROUP: text('reputation-scorer-group'),
  // stable across restarts so a restarted process resumes its own pending entries
  CONSUMER_NAME: text(os.hostname()),
  PAYLOAD_FIELD: text('payload'),
  READ_COUNT: positiveInt(10),
  READ_BLOCK_MS: positiveInt(1000),
  CLAIM_MIN_IDLE_MS: nonNegativeInt(60_000),

  // reconnect policy
  BACKOFF_STRATEGY: z.enum(['fixed', 'exponential']).default('fixed'),
  BACKOFF_BASE_MS: positiveInt(5000),
  BACKOFF_MAX_MS: positiveInt(60_000),
  ESCALATE_AFTER_ATTEMPTS: positiveInt(5),

  NO_DEX_DATA_POLICY: z.enum(['empty-success', 'failure']).default('empty-success'),
})

export type ServiceConfig = z.infer<typeof configSchema>

// blank variables count as unset, as with `process.env.X ? ... : default`
export function parseConfig(env: Record<string, string | undefined>): ServiceConfig {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value
  }

  const result = configSchema.safeParse(present)
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error).join('; ')}`)
  }
  return result.data
}

const config = parseConfig(process.env)

export const PORT = config.PORT

export const SERVICE_TITLE = config.SERVICE_TITLE
export const SERVICE_DESCRIPTION = config.SERVICE_DESCRIPTION
export const SERVICE_VERSION = config.SERVICE_VERSION

export const REDIS_URL = config.REDIS_URL
export const INPUT_STREAM = config.INPUT_STREAM
export const SUCCESS_STREAM = config.SUCCESS_STREAM
export const FAILURE_STREAM = config.FAILURE_STREAM
export const CONSUMER_GROUP = config.CONSUMER_GROUP
export const CONSUMER_NAME = config.CONSUMER_NAME
export const PAYLOAD_FIELD = config.PAYLOAD_FIELD
export const READ_COUNT = config.READ_COUNT
export const READ_BLOCK_MS = config.READ_BLOCK_MS
export const CLAIM_MIN_IDLE_MS = config.CLAIM_MIN_IDLE_MS

export const BACKOFF_STRATEGY = config.BACKOFF_STRATEGY
export const BACKOFF_BASE_MS = config.BACKOFF_BASE_MS
export const BACKOFF_MAX_MS = config.BACKOFF_MAX_MS
export const ESCALATE_AFTER_ATTEMPTS = config.ESCALATE_AFTER_ATTEMPTS

export const NO_DEX_DATA_POLICY = config.NO_DEX_DATA_POLICY
