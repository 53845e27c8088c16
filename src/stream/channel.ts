// src/stream/channel.ts
import { OutputEnvelope } from '../types'

export interface InboundMessage {
  id: string
  payload: unknown // raw field value, usually JSON text
  receivedAt: number // epoch ms assigned by the broker
}

/**
 * Broker connection used by the processor. Implementations throw
 * TransportError for connect/read/write failures; the processor owns
 * reconnecting.
 */
export interface StreamChannel {
  connect(): Promise<void>
  // resolves [] when nothing arrived within the block interval
  receive(): Promise<InboundMessage[]>
  // success records go to the success stream, failures to the failure stream
  publish(envelope: OutputEnvelope): Promise<void>
  ack(id: string): Promise<void>
  close(): Promise<void>
}
