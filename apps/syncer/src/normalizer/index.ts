/**
 * Text normalization shared by the matcher and the differ.
 *
 * Rules:
 * - strip trademark symbols, lowercase, fold diacritics (and letters such as
 *   ø/æ/ß that do not decompose under NFKD)
 * - "&" and "+" become "and"
 * - remove package-size and ABV tokens ("33cl", "0,5 l", "4x33cl", "6-pack",
 *   "7.5%"); those belong to the product's package fields
 * - collapse punctuation/separators to whitespace
 * - expand abbreviations, drop noise tokens ("bottle", "can", "ol")
 *
 * The pipeline is applied until the output stops changing, so
 * normalize(normalize(x).value) equals normalize(x).
 */

import lexicon from './lexicon.json'

export interface NormalizedText {
  value: string
  tokens: string[]
}

export interface NormalizedBrewery extends NormalizedText {
  /** Tokens such as "brewing" or "bryggeri": kept as signal, down-weighted in scoring */
  genericTokens: string[]
}

const SPECIAL_LETTERS = new Map(Object.entries(lexicon.specialLetters))
const ABBREVIATIONS = new Map(Object.entries(lexicon.abbreviations))
const NOISE_TOKENS = new Set(lexicon.noiseTokens)
const LEGAL_SUFFIXES: string[][] = lexicon.legalSuffixes
const STYLE_FAMILIES = lexicon.styleFamilies

export const GENERIC_BREWERY_TOKENS: ReadonlySet<string> = new Set(lexicon.genericBreweryTokens)

const UNIT = '(?:cl|ml|l|ltr|litre|liter|litres|liters)'
const MULTIPACK_PATTERN = new RegExp(`\\b\\d+\\s*x\\s*\\d+(?:[.,]\\d+)?\\s*${UNIT}\\b`, 'g')
const VOLUME_PATTERN = new RegExp(`\\b\\d+(?:[.,]\\d+)?\\s*${UNIT}\\b`, 'g')
const PACK_PATTERN = /\b\d+\s*-?\s*(?:pack|pk|stk|pcs)\b/g
const ABV_PATTERN = /\b\d+(?:[.,]\d+)?\s*%/g

function foldLetters(text: string): string {
  const lowered = text.toLowerCase()
  const mapped = Array.from(lowered, (ch) => SPECIAL_LETTERS.get(ch) ?? ch).join('')
  return mapped.normalize('NFKD').replace(/\p{M}/gu, '').toLowerCase()
}

function normalizePass(text: string): string {
  let normalized = text.replace(/[™®©]/g, ' ')
  normalized = foldLetters(normalized)
  normalized = normalized.replace(/[&+]/g, ' and ')

  normalized = normalized
    .replace(MULTIPACK_PATTERN, ' ')
    .replace(VOLUME_PATTERN, ' ')
    .replace(PACK_PATTERN, ' ')
    .replace(ABV_PATTERN, ' ')

  normalized = normalized.replace(/[^\p{L}\p{N}]+/gu, ' ')

  return normalized
    .split(' ')
    .filter((token) => token.length > 0)
    .flatMap((token) => (ABBREVIATIONS.get(token) ?? token).split(' '))
    .filter((token) => !NOISE_TOKENS.has(token))
    .join(' ')
}

/**
 * Canonicalize free text for matching and comparison.
 */
export function normalize(text: string | null | undefined): NormalizedText {
  // Removing one size token can expose another, so repeat until nothing changes
  let value = (text ?? '').trim()
  let next = normalizePass(value)
  while (next !== value) {
    value = next
    next = normalizePass(value)
  }

  return { value, tokens: value.length > 0 ? value.split(' ') : [] }
}

/**
 * Brewery names additionally lose trailing legal-entity suffixes ("AS",
 * "A/S", "AB", "Ltd", "GmbH"). Generic brewery tokens are retained.
 */
export function normalizeBrewery(name: string | null | undefined): NormalizedBrewery {
  const tokens = [...normalize(name).tokens]

  let stripped = true
  while (stripped) {
    stripped = false
    for (const suffix of LEGAL_SUFFIXES) {
      if (tokens.length > suffix.length && endsWith(tokens, suffix)) {
        tokens.splice(tokens.length - suffix.length, suffix.length)
        stripped = true
        break
      }
    }
  }

  return {
    value: tokens.join(' '),
    tokens,
    genericTokens: tokens.filter((token) => GENERIC_BREWERY_TOKENS.has(token)),
  }
}

function endsWith(tokens: string[], suffix: string[]): boolean {
  const offset = tokens.length - suffix.length
  return suffix.every((token, i) => tokens[offset + i] === token)
}

/**
 * Coarse style family ("stout", "ipa", "lager", ...) or null when the style
 * text names no known family.
 */
export function styleFamily(style: string | null | undefined): string | null {
  const tokens = new Set(normalize(style).tokens)
  if (tokens.size === 0) return null

  for (const entry of STYLE_FAMILIES) {
    if (entry.keywords.some((keyword) => tokens.has(keyword))) {
      return entry.family
    }
  }
  return null
}
