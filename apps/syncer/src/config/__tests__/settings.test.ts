import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadSettings } from '../settings'

describe('loadSettings', () => {
  it('fills defaults for an empty environment', () => {
    expect(loadSettings({})).toMatchObject({
      SYNC_CRON: '0 */6 * * *',
      STORE_BACKEND: 'memory',
      MATCH_HIGH_THRESHOLD: 0.85,
      MATCH_AMBIGUOUS_LOW: 0.6,
      MATCH_MAX_CANDIDATES: 3,
      LINK_FAILURE_THRESHOLD: 3,
      RETAILER_CATEGORIES: ['beer'],
      AUTO_ACCEPT_CORRECTIONS: false,
    })
  })

  it('coerces numbers, lists and flags from strings', () => {
    const settings = loadSettings({
      MATCH_HIGH_THRESHOLD: '0.9',
      MATCH_CONCURRENCY: '8',
      RETAILER_CATEGORIES: 'beer, cider,',
      AUTO_ACCEPT_CORRECTIONS: '1',
    })

    expect(settings.MATCH_HIGH_THRESHOLD).toBe(0.9)
    expect(settings.MATCH_CONCURRENCY).toBe(8)
    expect(settings.RETAILER_CATEGORIES).toEqual(['beer', 'cider'])
    expect(settings.AUTO_ACCEPT_CORRECTIONS).toBe(true)
  })

  it('rejects an ambiguity floor above the link threshold', () => {
    expect(() => loadSettings({ MATCH_AMBIGUOUS_LOW: '0.9', MATCH_HIGH_THRESHOLD: '0.8' })).toThrow(ZodError)
  })

  it('rejects out-of-range and malformed values', () => {
    expect(() => loadSettings({ MATCH_HIGH_THRESHOLD: '1.5' })).toThrow(ZodError)
    expect(() => loadSettings({ AUTO_ACCEPT_CORRECTIONS: 'yes' })).toThrow(ZodError)
    expect(() => loadSettings({ BEERDB_BASE_URL: 'not a url' })).toThrow(ZodError)
  })

  it('rejects zero weights for both name and brewery', () => {
    expect(() => loadSettings({ MATCH_WEIGHT_NAME: '0', MATCH_WEIGHT_BREWERY: '0' })).toThrow(
      'Name and brewery weights must not both be zero'
    )
  })
})
