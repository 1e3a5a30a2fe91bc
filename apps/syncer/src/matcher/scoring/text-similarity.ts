/**
 * Text similarity over normalized token lists.
 *
 * Similarity = mean of
 * - weighted Jaccard on token sets (exact token overlap)
 * - Levenshtein similarity on the sorted token string (typos, word order)
 */

export type TokenWeight = (token: string) => number

const UNIT_WEIGHT: TokenWeight = () => 1

/**
 * Weighted Jaccard(A, B) = Σw(A ∩ B) / Σw(A ∪ B)
 */
export function weightedJaccard(tokens1: string[], tokens2: string[], weightOf: TokenWeight = UNIT_WEIGHT): number {
  const set1 = new Set(tokens1)
  const set2 = new Set(tokens2)

  if (set1.size === 0 || set2.size === 0) return 0

  let intersection = 0
  let union = 0

  for (const token of set1) {
    const weight = weightOf(token)
    union += weight
    if (set2.has(token)) intersection += weight
  }
  for (const token of set2) {
    if (!set1.has(token)) union += weightOf(token)
  }

  return union === 0 ? 0 : intersection / union
}

export function levenshteinDistance(s1: string, s2: string): number {
  if (s1 === s2) return 0
  if (s1.length === 0) return s2.length
  if (s2.length === 0) return s1.length

  // Two-row DP
  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j)
  let current = new Array<number>(s2.length + 1).fill(0)

  for (let i = 1; i <= s1.length; i++) {
    current[0] = i
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      )
    }
    ;[previous, current] = [current, previous]
  }

  return previous[s2.length]
}

/**
 * 1 - distance / maxLength, in [0, 1]
 */
export function levenshteinSimilarity(s1: string, s2: string): number {
  if (!s1 || !s2) return 0
  if (s1 === s2) return 1
  return 1 - levenshteinDistance(s1, s2) / Math.max(s1.length, s2.length)
}

/**
 * Combined similarity of two token lists. Tokens with weight below 1 are
 * left out of the edit-distance half when both sides keep other tokens.
 */
export function tokenSimilarity(tokens1: string[], tokens2: string[], weightOf: TokenWeight = UNIT_WEIGHT): number {
  if (tokens1.length === 0 || tokens2.length === 0) return 0

  const jaccard = weightedJaccard(tokens1, tokens2, weightOf)

  const significant1 = tokens1.filter((t) => weightOf(t) >= 1)
  const significant2 = tokens2.filter((t) => weightOf(t) >= 1)
  const useSignificant = significant1.length > 0 && significant2.length > 0

  const edit = levenshteinSimilarity(
    sortedJoin(useSignificant ? significant1 : tokens1),
    sortedJoin(useSignificant ? significant2 : tokens2)
  )

  return (jaccard + edit) / 2
}

function sortedJoin(tokens: string[]): string {
  return [...new Set(tokens)].sort().join(' ')
}
