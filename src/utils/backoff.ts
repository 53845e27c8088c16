// src/utils/backoff.ts

export type BackoffStrategy = 'fixed' | 'exponential'

export interface BackoffPolicy {
  strategy: BackoffStrategy
  baseMs: number
  maxMs: number
}

// delay before reconnect attempt `attempt` (1-based)
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const n = Math.max(1, Math.floor(attempt))
  if (policy.strategy === 'fixed') return policy.baseMs
  return Math.min(policy.baseMs * Math.pow(2, n - 1), policy.maxMs)
}

// setTimeout as a promise that resolves early (never rejects) when signal aborts
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve()

    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
