// src/validation/schema.ts
import { z } from 'zod'
import { SchemaValidationError } from '../errors'
import { WalletActivity } from '../types'

// epoch seconds; integer strings are accepted and negative epochs are allowed
const epochSeconds = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/, 'expected integer epoch seconds').transform(Number),
])

export const transactionSchema = z.object({
  document_id: z.string().optional(),
  action: z.string(),
  timestamp: epochSeconds,
  caller: z.string(),
  protocol: z.string(),
  poolId: z.string().nullish().transform((v) => v ?? undefined),
  poolName: z.string().nullish().transform((v) => v ?? undefined),
  tokenIn: z.record(z.string(), z.unknown()).nullish().transform((v) => v ?? undefined),
  tokenOut: z.record(z.string(), z.unknown()).nullish().transform((v) => v ?? undefined),
  token_address: z.string().nullish().transform((v) => v ?? undefined),
  // decimals up to 18 places arrive as strings to keep precision
  amount: z.union([z.number(), z.string().regex(/^-?\d+(\.\d{1,18})?$/, 'expected a decimal string')]).nullish().transform((v) => v ?? undefined),
  block_number: z.number().int().nullish().transform((v) => v ?? undefined),
})

export const protocolActivitySchema = z.object({
  protocolType: z.string(),
  transactions: z.array(transactionSchema),
})

export const walletActivitySchema = z.object({
  wallet_address: z.string().min(1),
  data: z.array(protocolActivitySchema),
})

// flatten zod issues into "path: message" strings
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

// validate a decoded inbound record; throws SchemaValidationError
export function parseWalletActivity(raw: unknown): WalletActivity {
  const result = walletActivitySchema.safeParse(raw)
  if (!result.success) {
    throw new SchemaValidationError(formatIssues(result.error))
  }
  return result.data
}

// decode the raw stream payload (JSON text or an already-decoded object)
export function decodePayload(payload: unknown): unknown {
  if (typeof payload !== 'string') return payload
  try {
    return JSON.parse(payload)
  } catch (e) {
    throw new SchemaValidationError([`payload is not valid JSON (${e instanceof Error ? e.message : String(e)})`])
  }
}
