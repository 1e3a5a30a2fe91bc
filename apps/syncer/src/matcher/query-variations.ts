import { normalize, normalizeBrewery } from '../normalizer'

/** Longest leading-word prefix tried as a brewery query */
const MAX_PREFIX_WORDS = 3

/**
 * Brewery-prefix queries for a product, most specific first.
 *
 * With a brewery field: the normalized brewery, then the same without
 * generic tokens ("lervig aktiebryggeri" → "lervig").
 *
 * Without one, the name usually leads with the brewery:
 * - collaboration names ("Lervig x Omnipollo Sundae") try the part before " x "
 * - then leading-word prefixes, longest first
 */
export function queryVariations(name: string, brewery: string | null): string[] {
  const variations: string[] = []

  const normalizedBrewery = normalizeBrewery(brewery)
  if (normalizedBrewery.tokens.length > 0) {
    variations.push(normalizedBrewery.value)
    const specific = normalizedBrewery.tokens.filter((t) => !normalizedBrewery.genericTokens.includes(t))
    if (specific.length > 0) variations.push(specific.join(' '))
    return dedupe(variations)
  }

  let words = normalize(name).tokens
  const collab = words.indexOf('x')
  if (collab > 0 && collab < words.length - 1) {
    variations.push(words.slice(0, collab).join(' '))
    words = [...words.slice(0, collab), ...words.slice(collab + 1)]
  }

  if (words.length === 1) {
    variations.push(words[0])
  }
  for (let count = Math.min(MAX_PREFIX_WORDS, words.length - 1); count >= 1; count--) {
    variations.push(words.slice(0, count).join(' '))
  }

  return dedupe(variations)
}

function dedupe(values: string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))]
}
