import { z } from 'zod'
import type { ExternalBeer } from '../../catalog/types'
import { externalId, localeNumber, optionalText } from '../schema'

export const beerListSchema = z.object({
  items: z.array(z.unknown()),
})

export const beerRecordSchema = z.object({
  id: externalId,
  name: z.string().trim().min(1),
  brewery: z.string().trim().min(1),
  style: optionalText,
  rating: localeNumber.nullish(),
  ratingCount: z.number().int().min(0).nullish(),
  abv: localeNumber.nullish(),
  url: optionalText,
})

export type BeerRecord = z.infer<typeof beerRecordSchema>

export function toExternalBeer(raw: BeerRecord, fetchedAt: Date): ExternalBeer {
  return {
    id: raw.id,
    name: raw.name,
    brewery: raw.brewery,
    style: raw.style,
    // 0 means "no ratings yet" upstream
    rating: raw.rating ? raw.rating : null,
    ratingCount: raw.ratingCount ?? 0,
    abv: raw.abv ?? null,
    url: raw.url,
    fetchedAt,
  }
}
