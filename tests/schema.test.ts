// tests/schema.test.ts
import { decodePayload, parseWalletActivity } from '../src/validation/schema'
import { SchemaValidationError } from '../src/errors'

const valid = {
  wallet_address: '0xabc',
  data: [
    {
      protocolType: 'dexes',
      transactions: [
        {
          document_id: 'doc-1',
          action: 'swap',
          timestamp: 1672531200,
          caller: '0xabc',
          protocol: 'uniswap_v3',
          poolId: null,
          amount: '12.500000000000000001',
          block_number: 123,
          extra_field: 'dropped',
        },
      ],
    },
  ],
}

describe('parseWalletActivity', () => {
  test('accepts a well-formed record and drops unknown keys', () => {
    const activity = parseWalletActivity(valid)
    const t = activity.data[0].transactions[0]

    expect(activity.wallet_address).toBe('0xabc')
    expect(t.amount).toBe('12.500000000000000001')
    expect(t.poolId).toBeUndefined()
    expect('extra_field' in t).toBe(false)
  })

  test('missing wallet_address is a schema validation error', () => {
    const { wallet_address: _omit, ...rest } = valid
    try {
      parseWalletActivity(rest)
      throw new Error('expected parse to fail')
    } catch (e) {
      expect(e).toBeInstanceOf(SchemaValidationError)
      if (e instanceof SchemaValidationError) {
        expect(e.issues).toEqual(['wallet_address: Required'])
        expect(e.message).toBe('invalid wallet record: wallet_address: Required')
      }
    }
  })

  test('reports nested paths for bad transactions', () => {
    const bad = {
      wallet_address: '0xabc',
      data: [{ protocolType: 'dexes', transactions: [{ action: 'swap', timestamp: 1672531200, protocol: 'p' }] }],
    }
    expect(() => parseWalletActivity(bad)).toThrow('invalid wallet record: data.0.transactions.0.caller: Required')
  })

  test('accepts integer-string and negative timestamps', () => {
    const record = {
      wallet_address: '0xabc',
      data: [
        {
          protocolType: 'dexes',
          transactions: [
            { action: 'swap', timestamp: '1672531200', caller: 'c', protocol: 'p' },
            { action: 'swap', timestamp: -86400, caller: 'c', protocol: 'p' },
          ],
        },
      ],
    }
    const timestamps = parseWalletActivity(record).data[0].transactions.map((t) => t.timestamp)
    expect(timestamps).toEqual([1672531200, -86400])
  })

  test('rejects non-integer timestamps', () => {
    for (const timestamp of ['yesterday', '1672531200.5', 1672531200.5]) {
      const record = { wallet_address: '0x1', data: [{ protocolType: 'dexes', transactions: [{ action: 'swap', timestamp, caller: 'c', protocol: 'p' }] }] }
      expect(() => parseWalletActivity(record)).toThrow(SchemaValidationError)
    }
  })

  test('rejects amounts with more than 18 decimal places', () => {
    const tx = { action: 'swap', timestamp: 1, caller: 'c', protocol: 'p', amount: '1.0000000000000000001' }
    expect(() => parseWalletActivity({ wallet_address: '0x1', data: [{ protocolType: 'dexes', transactions: [tx] }] })).toThrow(
      SchemaValidationError,
    )
  })
})

describe('decodePayload', () => {
  test('parses JSON text', () => {
    expect(decodePayload('{"wallet_address":"0x1"}')).toEqual({ wallet_address: '0x1' })
  })

  test('passes through non-string payloads', () => {
    expect(decodePayload(undefined)).toBeUndefined()
  })

  test('invalid JSON is a schema validation error', () => {
    expect(() => decodePayload('{not json')).toThrow(SchemaValidationError)
  })
})
