// src/stream/redisClient.ts
import Redis, { RedisOptions } from 'ioredis'
import debug from 'debug'

const log = debug('app:redis')

// the slice of the ioredis client the stream channel relies on
export interface StreamClient {
  readonly status: string
  connect(): Promise<void>
  call(command: string, ...args: (string | number)[]): Promise<unknown>
  quit(): Promise<unknown>
  disconnect(): void
}

// build a lazily-connected client; the stream processor decides when to (re)connect
export function createRedisClient(url: string): Redis {
  const options: RedisOptions = {
    enableReadyCheck: true,
    enableOfflineQueue: false, // fail fast instead of queueing while disconnected
    maxRetriesPerRequest: 1,
    connectTimeout: 10_000,
    lazyConnect: true,
    // reconnects are driven by the processor's backoff policy, not by ioredis
    retryStrategy: () => null,
  }
  if (url.startsWith('rediss://')) options.tls = {}

  const redis = new Redis(url, options)

  redis.on('error', (err: Error) => {
    // eslint-disable-next-line no-console
    console.error('Redis error', err.message)
  })
  redis.on('ready', () => log('Redis ready'))
  redis.on('end', () => log('Redis connection closed'))

  return redis
}

/**
 * Connect with a timeout. Unlike a cache, the stream consumer cannot run
 * without the broker, so failures are thrown to the caller.
 */
export async function connectWithTimeout(redis: StreamClient, timeoutMs = 10_000): Promise<void> {
  if (redis.status === 'ready') return

  let timer: NodeJS.Timeout | undefined
  try {
    await Promise.race([
      redis.connect(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('connect_timeout')), timeoutMs)
      }),
    ])
  } finally {
    if (timer) clearTimeout(timer)
  }
}

export async function closeRedis(redis: StreamClient): Promise<void> {
  try {
    await redis.quit()
  } catch (e) {
    // quit fails on a dead socket; drop it instead
    log('Redis quit failed, disconnecting: %s', e instanceof Error ? e.message : String(e))
    redis.disconnect()
  }
}
