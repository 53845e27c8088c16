// tests/config.test.ts
import os from 'os'
import { parseConfig } from '../src/config'

describe('parseConfig', () => {
  test('falls back to defaults for unset and blank variables', () => {
    const config = parseConfig({ PORT: '', READ_COUNT: '   ' })

    expect(config).toEqual({
      PORT: 8000,
      SERVICE_TITLE: 'DeFi Reputation Scoring Server',
      SERVICE_DESCRIPTION: 'Scores wallet reputation from DEX activity',
      SERVICE_VERSION: '1.0.0',
      REDIS_URL: 'redis://localhost:6379',
      INPUT_STREAM: 'wallet-transactions',
      SUCCESS_STREAM: 'wallet-scores-success',
      FAILURE_STREAM: 'wallet-scores-failure',
      CONSUMER_GROUP: 'reputation-scorer-group',
      CONSUMER_NAME: os.hostname(),
      PAYLOAD_FIELD: 'payload',
      READ_COUNT: 10,
      READ_BLOCK_MS: 1000,
      CLAIM_MIN_IDLE_MS: 60_000,
      BACKOFF_STRATEGY: 'fixed',
      BACKOFF_BASE_MS: 5000,
      BACKOFF_MAX_MS: 60_000,
      ESCALATE_AFTER_ATTEMPTS: 5,
      NO_DEX_DATA_POLICY: 'empty-success',
    })
  })

  test('coerces numeric variables', () => {
    const config = parseConfig({ BACKOFF_BASE_MS: '250', READ_COUNT: '50', CLAIM_MIN_IDLE_MS: '0', BACKOFF_STRATEGY: 'exponential' })

    expect(config.BACKOFF_BASE_MS).toBe(250)
    expect(config.READ_COUNT).toBe(50)
    expect(config.CLAIM_MIN_IDLE_MS).toBe(0)
    expect(config.BACKOFF_STRATEGY).toBe('exponential')
  })

  test('rejects values that are not numbers', () => {
    expect(() => parseConfig({ BACKOFF_BASE_MS: '5s' })).toThrow('BACKOFF_BASE_MS: Expected number, received nan')
    expect(() => parseConfig({ READ_COUNT: 'ten' })).toThrow('READ_COUNT: Expected number, received nan')
  })

  test('rejects fractional, zero and negative counts', () => {
    expect(() => parseConfig({ READ_COUNT: '1.5' })).toThrow('Invalid configuration: READ_COUNT:')
    expect(() => parseConfig({ READ_BLOCK_MS: '0' })).toThrow('Invalid configuration: READ_BLOCK_MS:')
    expect(() => parseConfig({ ESCALATE_AFTER_ATTEMPTS: '-2' })).toThrow('Invalid configuration: ESCALATE_AFTER_ATTEMPTS:')
    expect(() => parseConfig({ PORT: '70000' })).toThrow('Invalid configuration: PORT:')
  })

  test('rejects unknown enumerated values', () => {
    expect(() => parseConfig({ BACKOFF_STRATEGY: 'linear' })).toThrow('Invalid configuration: BACKOFF_STRATEGY:')
    expect(() => parseConfig({ NO_DEX_DATA_POLICY: 'skip' })).toThrow('Invalid configuration: NO_DEX_DATA_POLICY:')
  })
})
