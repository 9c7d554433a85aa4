/**
 * Small deterministic numeric and text helpers shared by the stages.
 */

export function clamp(n: number, lo: number, hi: number): number {
  if (!Number.isFinite(n)) return lo
  return Math.min(hi, Math.max(lo, n))
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/**
 * Sort by a numeric key, keeping input order for equal keys.
 */
export function stableSortBy<T>(items: readonly T[], key: (item: T) => number): T[] {
  return items
    .map((value, i) => ({ value, i, k: key(value) }))
    .sort((a, b) => (a.k - b.k) || (a.i - b.i))
    .map(o => o.value)
}

/**
 * Collapse whitespace runs and trim.
 */
export function normalizeText(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim()
}

/**
 * Normalization for repetition checks: lowercase, digit runs to '#',
 * punctuation stripped.
 */
export function normalizeForRepetition(raw: string): string {
  return normalizeText(raw.toLowerCase())
    .replace(/\d+/g, '#')
    .replace(/[^\p{L}\p{N}# ]+/gu, '')
    .replace(/\s+/g, ' ')
    .trim()
}

export function codePointLength(text: string): number {
  return Array.from(text).length
}
