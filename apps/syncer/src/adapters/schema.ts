import { z } from 'zod'

/**
 * Number that upstreams sometimes send as a string, with either decimal
 * separator ("7,5", "0.33").
 */
export const localeNumber = z.union([z.number(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value
  const parsed = Number(value.trim().replace(',', '.'))
  if (value.trim() === '' || Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` })
    return z.NEVER
  }
  return parsed
})

export const externalId = z.union([z.string().min(1), z.number().int()]).transform(String)

export const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed ? trimmed : null
  })

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}

/**
 * Best-effort id of a raw record for logs.
 */
export function rawRecordId(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    const id = raw.id
    if (typeof id === 'string' || typeof id === 'number') return String(id)
  }
  return undefined
}
