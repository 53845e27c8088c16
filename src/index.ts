// src/index.ts
import debug from 'debug'
import { createServer } from './app'
import {
  BACKOFF_BASE_MS,
  BACKOFF_MAX_MS,
  BACKOFF_STRATEGY,
  CLAIM_MIN_IDLE_MS,
  CONSUMER_GROUP,
  CONSUMER_NAME,
  ESCALATE_AFTER_ATTEMPTS,
  FAILURE_STREAM,
  INPUT_STREAM,
  NO_DEX_DATA_POLICY,
  PAYLOAD_FIELD,
  PORT,
  READ_BLOCK_MS,
  READ_COUNT,
  REDIS_URL,
  SUCCESS_STREAM
} from './config'
import { StatsTracker } from './services/stats'
import { StreamProcessor } from './services/processor'
import { RedisStreamChannel } from './stream/redisStreams'
import { errorMessage } from './errors'

const log = debug('app:main')

function main() {
  const stats = new StatsTracker()
  const channel = new RedisStreamChannel({
    url: REDIS_URL,
    inputStream: INPUT_STREAM,
    successStream: SUCCESS_STREAM,
    failureStream: FAILURE_STREAM,
    group: CONSUMER_GROUP,
    consumer: CONSUMER_NAME,
    payloadField: PAYLOAD_FIELD,
    count: READ_COUNT,
    blockMs: READ_BLOCK_MS,
    claimMinIdleMs: CLAIM_MIN_IDLE_MS
  })
  const processor = new StreamProcessor({
    channel,
    stats,
    backoff: { strategy: BACKOFF_STRATEGY, baseMs: BACKOFF_BASE_MS, maxMs: BACKOFF_MAX_MS },
    noDexDataPolicy: NO_DEX_DATA_POLICY,
    escalateAfterAttempts: ESCALATE_AFTER_ATTEMPTS
  })
  const { httpServer } = createServer({ stats, processor })

  httpServer.listen(PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Server listening on port ${PORT}`)
    processor.start().catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error('Stream processor crashed', errorMessage(e))
      process.exitCode = 1
    })
    log('Server started')
  })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log('Received %s, shutting down', signal)

    // processor first so in-flight publishes complete before the process exits
    await processor.stop()
    await new Promise<void>((resolve) => httpServer.close(() => resolve()))
    log('Shutdown complete')
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((e: unknown) => {
        // eslint-disable-next-line no-console
        console.error('Shutdown failed', errorMessage(e))
        process.exit(1)
      })
    })
  }
}

try {
  main()
} catch (e) {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error', errorMessage(e))
  process.exit(1)
}
