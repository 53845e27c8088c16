// src/services/processor.ts
import debug from 'debug'
import { InboundMessage, StreamChannel } from '../stream/channel'
import { StatsTracker } from './stats'
import { DEFAULT_SCORING_CONFIG, ScoringConfig, scoreWallet } from './scoring'
import { buildFailureEnvelope, buildSuccessEnvelope, epochSeconds, walletAddressOf } from './envelope'
import { decodePayload, parseWalletActivity } from '../validation/schema'
import { NoDexDataError, SchemaValidationError, UnexpectedProcessingError, errorMessage } from '../errors'
import { BackoffPolicy, backoffDelay, sleep } from '../utils/backoff'
import { NoDexDataPolicy, OutputEnvelope } from '../types'

const log = debug('app:processor')

export type ProcessorState = 'IDLE' | 'STARTING' | 'RUNNING' | 'RECONNECTING' | 'STOPPING' | 'STOPPED'

export interface ProcessorStatus {
  state: ProcessorState
  consecutiveTransportFailures: number
  escalated: boolean
  lastTransportError: string | null
}

export interface StreamProcessorOptions {
  channel: StreamChannel
  stats: StatsTracker
  backoff: BackoffPolicy
  noDexDataPolicy: NoDexDataPolicy
  // consecutive transport failures before the processor reports itself degraded
  escalateAfterAttempts?: number
  scoringConfig?: ScoringConfig
  clock?: () => number // epoch ms
}

/**
 * Drives consume -> validate -> score -> publish, one message at a time in
 * delivery order. Per-message errors become Failure envelopes; transport
 * errors trigger a backoff and reconnect. Neither ends the loop.
 */
export class StreamProcessor {
  private state: ProcessorState = 'IDLE'
  private consecutiveFailures = 0
  private lastTransportError: string | null = null
  private readonly abort = new AbortController()
  private running: Promise<void> | null = null

  private readonly channel: StreamChannel
  private readonly stats: StatsTracker
  private readonly backoff: BackoffPolicy
  private readonly noDexDataPolicy: NoDexDataPolicy
  private readonly escalateAfterAttempts: number
  private readonly scoringConfig: ScoringConfig
  private readonly clock: () => number

  constructor(options: StreamProcessorOptions) {
    this.channel = options.channel
    this.stats = options.stats
    this.backoff = options.backoff
    this.noDexDataPolicy = options.noDexDataPolicy
    this.escalateAfterAttempts = options.escalateAfterAttempts ?? 5
    this.scoringConfig = options.scoringConfig ?? DEFAULT_SCORING_CONFIG
    this.clock = options.clock ?? Date.now
  }

  getStatus(): ProcessorStatus {
    return {
      state: this.state,
      consecutiveTransportFailures: this.consecutiveFailures,
      escalated: this.consecutiveFailures >= this.escalateAfterAttempts,
      lastTransportError: this.lastTransportError,
    }
  }

  // start the loop (idempotent); resolves once it has stopped
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run()
    }
    return this.running
  }

  // stop pulling new messages, let the in-flight one finish, close the channel
  async stop(): Promise<void> {
    if (this.state === 'IDLE') {
      this.abort.abort()
      this.state = 'STOPPED'
      return
    }
    if (this.state !== 'STOPPED') this.state = 'STOPPING'
    this.abort.abort()
    if (this.running) await this.running
  }

  private get stopping(): boolean {
    return this.abort.signal.aborted
  }

  private async run(): Promise<void> {
    this.state = 'STARTING'
    log('Starting stream processor')

    while (!this.stopping) {
      try {
        await this.channel.connect()
        if (this.stopping) break
        this.state = 'RUNNING'

        while (!this.stopping) {
          const batch = await this.channel.receive()
          this.onTransportRecovered()
          for (const message of batch) {
            if (this.stopping) break // unhandled messages stay pending and are redelivered
            await this.handle(message)
          }
        }
      } catch (err) {
        if (this.stopping) break
        await this.onTransportFailure(err)
      }
    }

    this.state = 'STOPPING'
    try {
      await this.channel.close()
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Error closing stream channel', errorMessage(err))
    }
    this.state = 'STOPPED'
    log('Stream processor stopped')
  }

  private onTransportRecovered(): void {
    if (this.consecutiveFailures > 0) {
      log('Transport recovered after %d failed attempts', this.consecutiveFailures)
    }
    this.consecutiveFailures = 0
    this.lastTransportError = null
  }

  private async onTransportFailure(err: unknown): Promise<void> {
    this.state = 'RECONNECTING'
    this.consecutiveFailures++
    this.lastTransportError = errorMessage(err)

    if (this.consecutiveFailures === this.escalateAfterAttempts) {
      // eslint-disable-next-line no-console
      console.error(`Stream transport still failing after ${this.consecutiveFailures} attempts`, this.lastTransportError)
    } else {
      // eslint-disable-next-line no-console
      console.warn('Stream transport error, reconnecting', this.lastTransportError)
    }

    try {
      await this.channel.close()
    } catch (closeErr) {
      log('Ignoring close error during reconnect: %s', errorMessage(closeErr))
    }

    const delay = backoffDelay(this.backoff, this.consecutiveFailures)
    log('Retrying in %dms (attempt %d)', delay, this.consecutiveFailures)
    await sleep(delay, this.abort.signal)
  }

  /**
   * Score one message and build its envelope. Never throws: every failure is
   * turned into a Failure envelope for the same wallet.
   */
  evaluate(message: InboundMessage): OutputEnvelope {
    let raw: unknown
    try {
      raw = decodePayload(message.payload)
      const activity = parseWalletActivity(raw)
      const result = scoreWallet(activity, this.scoringConfig)

      if (!result && this.noDexDataPolicy === 'failure') {
        throw new NoDexDataError()
      }
      return { kind: 'success', record: buildSuccessEnvelope(activity.wallet_address, result, this.clock()) }
    } catch (err) {
      const error =
        err instanceof SchemaValidationError || err instanceof NoDexDataError ? err : new UnexpectedProcessingError(err)
      return { kind: 'failure', record: buildFailureEnvelope(walletAddressOf(raw), error.message, this.clock()) }
    }
  }

  // publish and ack may throw TransportError; stats only move once both succeed
  private async handle(message: InboundMessage): Promise<void> {
    const envelope = this.evaluate(message)
    const wallet = envelope.record.wallet_address

    if (envelope.kind === 'success') {
      log('Scored %s (zscore=%s)', wallet, envelope.record.zscore)
    } else {
      // eslint-disable-next-line no-console
      console.error('Processing failed', { id: message.id, wallet_address: wallet, error: envelope.record.error })
    }

    await this.channel.publish(envelope)
    await this.channel.ack(message.id)
    this.stats.record(envelope.kind, epochSeconds(message.receivedAt))
  }
}
