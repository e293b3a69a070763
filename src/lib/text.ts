/**
 * Lowercase, drop punctuation other than apostrophes, collapse whitespace.
 * "  Go to   the LIBRARY! " → "go to the library"
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Remove a leading article from an already normalized phrase
 */
export function stripArticle(normalized: string): string {
  return normalized.replace(/^(the|a|an) /, '')
}

/**
 * True when `phrase` appears in `text` as whole words. Both must be normalized.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  if (!phrase) return false
  return ` ${text} `.includes(` ${phrase} `)
}

/**
 * Stable 32-bit string hash (same input, same output across runs)
 */
export function stableHash(seed: string): number {
  let hash = 0
  for (let i = 0; i < seed.length; i += 1) {
    hash = ((hash * 31) + seed.charCodeAt(i)) >>> 0
  }
  return hash
}

export function pickStable<T>(items: readonly T[], seed: string): T {
  if (items.length === 0) {
    throw new Error('pickStable called with an empty list')
  }
  return items[stableHash(seed) % items.length]
}
