/**
 * zod schemas for values read back from Redis. Dates travel as ISO strings.
 */

import { z } from 'zod'

const date = z.coerce.date()

export const productStateSchema = z.object({
  id: z.string(),
  name: z.string(),
  brewery: z.string().nullable(),
  style: z.string().nullable(),
  abv: z.number().nullable(),
  volumeLiters: z.number().nullable(),
  price: z.number().nullable(),
  available: z.boolean(),
  releaseDate: z.string().nullable(),
  category: z.string(),
  url: z.string().nullable(),
})

export const productSchema = productStateSchema.extend({
  active: z.boolean(),
  firstSeenAt: date,
  lastSeenAt: date,
  lastMatchAttemptAt: date.nullable(),
})

export const beerSchema = z.object({
  id: z.string(),
  name: z.string(),
  brewery: z.string(),
  style: z.string().nullable(),
  rating: z.number().nullable(),
  ratingCount: z.number(),
  abv: z.number().nullable(),
  url: z.string().nullable(),
  fetchedAt: date,
})

export const linkSchema = z.object({
  productId: z.string(),
  externalId: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  method: z.enum(['exact-id', 'fuzzy', 'manual']).nullable(),
  status: z.enum(['active', 'ambiguous', 'rejected']),
  createdAt: date,
  reaffirmedAt: date.nullable(),
  updatedAt: date,
  consecutiveFailures: z.number().int().min(0),
  candidateIds: z.array(z.string()),
  rejection: z
    .object({
      reason: z.string(),
      origin: z.enum(['manual', 'hysteresis']),
      externalId: z.string().nullable(),
      rejectedAt: date,
    })
    .nullable(),
  previousExternalId: z.string().nullable(),
})

export const snapshotSchema = z.object({
  cycleId: z.string(),
  sequence: z.number().int(),
  takenAt: date,
  complete: z.boolean(),
  scope: z.array(z.string()),
  products: z.array(productStateSchema),
})

const eventBase = {
  cycleId: z.string(),
  productId: z.string(),
  pulledAt: date,
}

export const changeEventSchema = z.discriminatedUnion('kind', [
  z.object({ ...eventBase, kind: z.literal('new'), before: z.null(), after: productStateSchema }),
  z.object({ ...eventBase, kind: z.literal('removed'), before: productStateSchema, after: z.null() }),
  z.object({ ...eventBase, kind: z.literal('availability-changed'), before: z.boolean(), after: z.boolean() }),
  z.object({ ...eventBase, kind: z.literal('price-changed'), before: z.number().nullable(), after: z.number().nullable() }),
])

export const correctionSchema = z.object({
  id: z.string(),
  productId: z.string(),
  externalId: z.string(),
  suggestedBy: z.string(),
  note: z.string().nullable(),
  status: z.enum(['pending', 'accepted', 'declined']),
  createdAt: date,
  resolvedAt: date.nullable(),
})

export const cycleSummarySchema = z.object({
  cycleId: z.string(),
  sequence: z.number().int(),
  committedAt: date,
  complete: z.boolean(),
  eventCount: z.number().int(),
})

export const pulledCatalogSchema = z.object({
  pulledAt: date,
  products: z.array(productStateSchema),
  completeCategories: z.array(z.string()),
  incompleteCategories: z.array(z.string()),
  partial: z.boolean(),
})

export const checkpointSchema = z.object({
  cycleId: z.string(),
  startedAt: date,
  failedStage: z.enum(['pulling', 'diffing', 'matching', 'persisting']),
  failedAt: date,
  error: z.string(),
  pulled: pulledCatalogSchema.nullable(),
  changes: z.array(changeEventSchema).nullable(),
  links: z.array(linkSchema).nullable(),
  beers: z.array(beerSchema).nullable(),
  matchAttempts: z.array(z.string()).nullable(),
  retryProductIds: z.array(z.string()).nullable(),
})

export const idListSchema = z.array(z.string())
