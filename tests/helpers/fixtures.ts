// tests/helpers/fixtures.ts
import { ProtocolActivity, Transaction, WalletActivity } from '../../src/types'

// 2023-01-01T00:00:00Z
export const DAY0 = 1672531200
export const DAY = 86_400

export function tx(action: string, timestamp: number): Transaction {
  return { action, timestamp, caller: '0xcaller', protocol: 'uniswap_v3' }
}

export function wallet(address: string, ...data: ProtocolActivity[]): WalletActivity {
  return { wallet_address: address, data }
}

export function dexes(transactions: Transaction[]): ProtocolActivity {
  return { protocolType: 'dexes', transactions }
}

// 6 swaps + 4 add_liquidity over 9 distinct days (two actions on day 8)
export function mixedActivity(): Transaction[] {
  return [
    tx('swap', DAY0),
    tx('swap', DAY0 + 1 * DAY),
    tx('add_liquidity', DAY0 + 2 * DAY),
    tx('swap', DAY0 + 3 * DAY),
    tx('add_liquidity', DAY0 + 4 * DAY),
    tx('swap', DAY0 + 5 * DAY),
    tx('add_liquidity', DAY0 + 6 * DAY),
    tx('swap', DAY0 + 7 * DAY),
    tx('add_liquidity', DAY0 + 8 * DAY),
    tx('swap', DAY0 + 8 * DAY + 3600),
  ]
}
