/**
 * Community beer database adapter (HTTP).
 *
 * GET {baseUrl}/v1/beers?brewery=<name>&match=prefix → { items }
 * GET {baseUrl}/v1/beers/<id>                        → beer | 404
 */

import type { ExternalBeer } from '../../catalog/types'
import { DataShapeError } from '../../lib/errors'
import { logger } from '../../config/logger'
import type { BeerDatabaseAdapter, CallOptions } from '../types'
import { fetchJson, joinUrl } from '../http'
import { formatIssues, rawRecordId } from '../schema'
import { beerListSchema, beerRecordSchema, toExternalBeer } from './schema'

const log = logger.beerdb

export interface HttpBeerDatabaseAdapterOptions {
  baseUrl: string
  apiKey?: string
  now?: () => Date
}

export class HttpBeerDatabaseAdapter implements BeerDatabaseAdapter {
  private readonly baseUrl: string
  private readonly headers: Record<string, string>
  private readonly now: () => Date

  constructor(options: HttpBeerDatabaseAdapterOptions) {
    this.baseUrl = options.baseUrl
    this.headers = options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}
    this.now = options.now ?? (() => new Date())
  }

  async lookupByBrewery(name: string, options: CallOptions): Promise<ExternalBeer[]> {
    const url = joinUrl(this.baseUrl, '/v1/beers', { brewery: name, match: 'prefix' })
    const body = await fetchJson('beerdb', { url, headers: this.headers, signal: options.signal })
    if (body === null) return []

    const list = beerListSchema.safeParse(body)
    if (!list.success) {
      throw new DataShapeError('beerdb', 'Malformed beer list', formatIssues(list.error))
    }

    const fetchedAt = this.now()
    const beers: ExternalBeer[] = []
    for (const raw of list.data.items) {
      const parsed = beerRecordSchema.safeParse(raw)
      if (!parsed.success) {
        log.warn('BEERDB_RECORD_SKIPPED', {
          event_name: 'BEERDB_RECORD_SKIPPED',
          recordId: rawRecordId(raw),
          issues: formatIssues(parsed.error),
        })
        continue
      }
      beers.push(toExternalBeer(parsed.data, fetchedAt))
    }
    return beers
  }

  async getById(id: string, options: CallOptions): Promise<ExternalBeer | null> {
    const url = joinUrl(this.baseUrl, `/v1/beers/${encodeURIComponent(id)}`)
    const body = await fetchJson('beerdb', { url, headers: this.headers, signal: options.signal })
    if (body === null) return null

    const parsed = beerRecordSchema.safeParse(body)
    if (!parsed.success) {
      throw new DataShapeError('beerdb', 'Malformed beer record', formatIssues(parsed.error), id)
    }
    return toExternalBeer(parsed.data, this.now())
  }
}
