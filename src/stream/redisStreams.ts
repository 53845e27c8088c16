// src/stream/redisStreams.ts
import debug from 'debug'
import { InboundMessage, StreamChannel } from './channel'
import { StreamClient, closeRedis, connectWithTimeout, createRedisClient } from './redisClient'
import { TransportError } from '../errors'
import { OutputEnvelope } from '../types'

const log = debug('app:stream')

export interface RedisStreamOptions {
  url: string
  inputStream: string
  successStream: string
  failureStream: string
  group: string
  consumer: string
  payloadField: string
  count: number
  blockMs: number
  // entries idle this long in any consumer's pending list are taken over on connect
  claimMinIdleMs: number
  // override for tests or custom client settings
  createClient?: (url: string) => StreamClient
}

// upper bound on XAUTOCLAIM pages per connect
const MAX_CLAIM_ROUNDS = 100

// "1700000000000-0" -> 1700000000000
export function streamIdTime(id: string): number {
  const ms = Number(id.split('-')[0])
  return Number.isFinite(ms) ? ms : Date.now()
}

function isArray(v: unknown): v is unknown[] {
  return Array.isArray(v)
}

function fieldValue(fields: unknown, name: string): unknown {
  if (!isArray(fields)) return undefined
  for (let i = 0; i + 1 < fields.length; i += 2) {
    if (fields[i] === name) return fields[i + 1]
  }
  return undefined
}

/**
 * Flatten an XREADGROUP reply:
 *   [[stream, [[id, [field, value, ...]], ...]], ...]  or null on timeout.
 * Entries trimmed from the stream show up with null fields; they are kept so
 * that they can still be answered and acknowledged.
 */
export function parseStreamReply(reply: unknown, payloadField: string): InboundMessage[] {
  if (!isArray(reply)) return []
  const messages: InboundMessage[] = []
  for (const stream of reply) {
    if (!isArray(stream)) continue
    const entries = stream[1]
    if (!isArray(entries)) continue
    for (const entry of entries) {
      if (!isArray(entry)) continue
      const id = entry[0]
      if (typeof id !== 'string') continue
      messages.push({ id, payload: fieldValue(entry[1], payloadField), receivedAt: streamIdTime(id) })
    }
  }
  return messages
}

export class RedisStreamChannel implements StreamChannel {
  private redis: StreamClient | null = null
  // after (re)connecting, drain this consumer's unacknowledged entries first
  private readPending = true

  constructor(private readonly options: RedisStreamOptions) {}

  async connect(): Promise<void> {
    if (this.redis) return
    const factory = this.options.createClient ?? createRedisClient
    const redis = factory(this.options.url)
    this.redis = redis
    this.readPending = true

    try {
      await connectWithTimeout(redis)
      await this.ensureGroup(redis)
      const claimed = await this.claimAbandoned(redis)
      if (claimed > 0) log('Claimed %d idle pending entries', claimed)
    } catch (e) {
      this.redis = null
      await closeRedis(redis)
      throw new TransportError('connect', e)
    }
    log('Connected to %s as %s/%s', this.options.inputStream, this.options.group, this.options.consumer)
  }

  private async ensureGroup(redis: StreamClient): Promise<void> {
    try {
      await redis.call('XGROUP', 'CREATE', this.options.inputStream, this.options.group, '0', 'MKSTREAM')
      log('Created consumer group %s', this.options.group)
    } catch (e) {
      // group already exists
      if (e instanceof Error && e.message.includes('BUSYGROUP')) return
      throw e
    }
  }

  /**
   * Move entries left pending by consumers that went away (crash, restart
   * under another name) into this consumer's pending list, where the
   * pending-first read picks them up before new entries.
   */
  private async claimAbandoned(redis: StreamClient): Promise<number> {
    const { inputStream, group, consumer, claimMinIdleMs, count } = this.options
    let cursor = '0-0'
    let claimed = 0

    for (let round = 0; round < MAX_CLAIM_ROUNDS; round++) {
      const reply = await redis.call('XAUTOCLAIM', inputStream, group, consumer, claimMinIdleMs, cursor, 'COUNT', count)
      if (!isArray(reply)) break
      const next = reply[0]
      const entries = reply[1]
      if (typeof next !== 'string') break
      if (isArray(entries)) claimed += entries.length
      cursor = next
      if (cursor === '0-0') break
    }
    return claimed
  }

  private client(operation: string): StreamClient {
    if (!this.redis) throw new TransportError(operation, new Error('not connected'))
    return this.redis
  }

  async receive(): Promise<InboundMessage[]> {
    const redis = this.client('receive')
    const { group, consumer, count, blockMs, inputStream, payloadField } = this.options
    const startId = this.readPending ? '0' : '>'

    let reply: unknown
    try {
      reply = await redis.call('XREADGROUP', 'GROUP', group, consumer, 'COUNT', count, 'BLOCK', blockMs, 'STREAMS', inputStream, startId)
    } catch (e) {
      throw new TransportError('receive', e)
    }

    const messages = parseStreamReply(reply, payloadField)
    if (this.readPending && messages.length === 0) {
      this.readPending = false
    } else if (this.readPending) {
      log('Redelivering %d pending messages', messages.length)
    }
    return messages
  }

  async publish(envelope: OutputEnvelope): Promise<void> {
    const redis = this.client('publish')
    const stream = envelope.kind === 'success' ? this.options.successStream : this.options.failureStream
    try {
      await redis.call('XADD', stream, '*', this.options.payloadField, JSON.stringify(envelope.record))
    } catch (e) {
      throw new TransportError('publish', e)
    }
  }

  async ack(id: string): Promise<void> {
    const redis = this.client('ack')
    try {
      await redis.call('XACK', this.options.inputStream, this.options.group, id)
    } catch (e) {
      throw new TransportError('ack', e)
    }
  }

  async close(): Promise<void> {
    const redis = this.redis
    this.redis = null
    if (redis) await closeRedis(redis)
  }
}
