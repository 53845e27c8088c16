// tests/normalizer.test.ts
import { normalizeScore } from '../src/services/normalizer'

describe('normalizeScore', () => {
  test('maps percentiles to lower buckets identically for both score types', () => {
    expect(normalizeScore(0, 'lp_score')).toBe(150)
    expect(normalizeScore(0.5, 'swap_score')).toBe(150)
    expect(normalizeScore(1, 'lp_score')).toBe(250)
    expect(normalizeScore(24.9, 'swap_score')).toBe(450)
    expect(normalizeScore(50, 'lp_score')).toBe(650)
  })

  test('lp and swap tables differ between 75 and 95', () => {
    expect(normalizeScore(80, 'lp_score')).toBe(750)
    expect(normalizeScore(80, 'swap_score')).toBe(800)
    expect(normalizeScore(92, 'lp_score')).toBe(850)
    expect(normalizeScore(92, 'swap_score')).toBe(900)
    expect(normalizeScore(96, 'lp_score')).toBe(950)
    expect(normalizeScore(96, 'swap_score')).toBe(950)
  })

  test('99 and above return the top score', () => {
    expect(normalizeScore(98.999, 'lp_score')).toBe(950)
    expect(normalizeScore(99, 'lp_score')).toBe(1000)
    expect(normalizeScore(100, 'swap_score')).toBe(1000)
    expect(normalizeScore(250, 'lp_score')).toBe(1000)
  })

  test('values below the table return 0', () => {
    expect(normalizeScore(-1, 'lp_score')).toBe(0)
    expect(normalizeScore(Number.NaN, 'swap_score')).toBe(0)
  })
})
