import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { HttpBeerDatabaseAdapter } from '../beerdb/adapter'
import { DataShapeError } from '../../lib/errors'
import type { BudgetToken } from '../../fetch/rate-limiter'
import { T0, beer } from '../../__tests__/fixtures'

const budget: BudgetToken = { key: 'beerdb', acquiredAt: 0 }

const rawBeer = {
  id: 'b-1',
  name: 'Tasty Juice',
  brewery: 'Lervig',
  style: 'IPA - New England',
  rating: 3.9,
  ratingCount: 1200,
  abv: 6.5,
  url: null,
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

describe('HttpBeerDatabaseAdapter', () => {
  let fetchMock: ReturnType<typeof vi.fn>
  let adapter: HttpBeerDatabaseAdapter

  beforeEach(() => {
    fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
    adapter = new HttpBeerDatabaseAdapter({ baseUrl: 'https://beers.test/', apiKey: 'test-key', now: () => T0 })
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('looks up beers by brewery prefix with the api key', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ items: [rawBeer] }))

    const beers = await adapter.lookupByBrewery('lervig', { budget })

    expect(beers).toEqual([beer()])
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://beers.test/v1/beers?brewery=lervig&match=prefix')
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-key', Accept: 'application/json' })
  })

  it('skips malformed beers in a list', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ items: [rawBeer, { id: 'b-2', name: 'No brewery' }] }))

    expect((await adapter.lookupByBrewery('lervig', { budget })).map((b) => b.id)).toEqual(['b-1'])
  })

  it('returns no candidates for an unknown brewery', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }))
    expect(await adapter.lookupByBrewery('nobody', { budget })).toEqual([])
  })

  it('fetches one beer by id and reports a vanished id as null', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ...rawBeer, id: 'a/b', rating: 0, ratingCount: null }))
    const found = await adapter.getById('a/b', { budget })

    expect(fetchMock.mock.calls[0][0]).toBe('https://beers.test/v1/beers/a%2Fb')
    expect(found).toMatchObject({ id: 'a/b', rating: null, ratingCount: 0, fetchedAt: T0 })

    fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }))
    expect(await adapter.getById('gone', { budget })).toBeNull()
  })

  it('rejects a non-JSON body as malformed', async () => {
    fetchMock.mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 }))
    await expect(adapter.getById('b-1', { budget })).rejects.toBeInstanceOf(DataShapeError)
  })

  it('sends no authorization header without an api key', async () => {
    const anonymous = new HttpBeerDatabaseAdapter({ baseUrl: 'https://beers.test', now: () => T0 })
    fetchMock.mockResolvedValue(jsonResponse({ items: [] }))

    await anonymous.lookupByBrewery('lervig', { budget })

    expect(fetchMock.mock.calls[0][1].headers).not.toHaveProperty('Authorization')
  })
})
