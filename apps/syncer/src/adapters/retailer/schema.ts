import { z } from 'zod'
import type { ProductState } from '../../catalog/types'
import { externalId, localeNumber, optionalText } from '../schema'

/**
 * One page of the retailer's product search.
 * Products are validated one by one so a bad record only costs itself.
 */
export const retailerPageSchema = z.object({
  products: z.array(z.unknown()),
  page: z.number().int().positive(),
  totalPages: z.number().int().min(0),
})

export type RetailerPage = z.infer<typeof retailerPageSchema>

export const retailerProductSchema = z.object({
  id: externalId,
  name: z.string().trim().min(1),
  brewery: optionalText,
  style: optionalText,
  abv: localeNumber.nullish(),
  /** Litres */
  volume: localeNumber.nullish(),
  price: localeNumber.nullish(),
  available: z.boolean().optional(),
  stock: z.number().int().optional(),
  releaseDate: optionalText,
  url: optionalText,
})

export type RetailerProduct = z.infer<typeof retailerProductSchema>

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/

export function toProductState(raw: RetailerProduct, category: string): ProductState {
  return {
    id: raw.id,
    name: raw.name,
    brewery: raw.brewery,
    style: raw.style,
    abv: raw.abv ?? null,
    volumeLiters: raw.volume ?? null,
    price: raw.price ?? null,
    // Missing availability: fall back to stock count, else assume listed means available
    available: raw.available ?? (raw.stock !== undefined ? raw.stock > 0 : true),
    releaseDate: raw.releaseDate && ISO_DATE.test(raw.releaseDate) ? raw.releaseDate.slice(0, 10) : null,
    category,
    url: raw.url,
  }
}
