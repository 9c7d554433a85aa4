/**
 * Level Clusterer
 *
 * Groups accepted heading spans by font size into at most four clusters and
 * maps them to H1..H4, largest first. Initialisation is sort-and-split over
 * size bands, so the same input always yields the same clusters.
 */

import type { OutlineConfig } from './config'
import { mean } from './stats'
import {
  HEADING_LEVELS,
  type LeveledSpan,
  type LevelCluster,
  type ScoredSpan,
} from './types/outline'

// ============================================================================
// Size Bands
// ============================================================================

/**
 * Split sizes (any order) into bands, largest first. A size joins the current
 * band while the band's largest size is within `bandRatio` of it.
 */
export function sizeBands(sizes: readonly number[], bandRatio: number): number[][] {
  const sorted = [...sizes].sort((a, b) => b - a)
  const bands: number[][] = []

  for (const size of sorted) {
    const band = bands[bands.length - 1]
    if (band && band[0] / size <= bandRatio) {
      band.push(size)
    } else {
      bands.push([size])
    }
  }
  return bands
}

/**
 * Sort-and-split seeding: bands are divided into `k` contiguous groups and
 * each group's mean size is its starting centroid.
 */
export function initialCentroids(bands: readonly number[][], k: number): number[] {
  const centroids: number[] = []
  for (let i = 0; i < k; i++) {
    const start = Math.floor((i * bands.length) / k)
    const end = Math.floor(((i + 1) * bands.length) / k)
    centroids.push(mean(bands.slice(start, end).flat()))
  }
  return centroids
}

/**
 * Index of the nearest centroid; ties go to the earlier (larger) centroid.
 */
export function nearestCentroid(size: number, centroids: readonly number[]): number {
  let best = 0
  for (let i = 1; i < centroids.length; i++) {
    if (Math.abs(size - centroids[i]) < Math.abs(size - centroids[best])) {
      best = i
    }
  }
  return best
}

/**
 * One-dimensional Lloyd iterations. Empty clusters keep their centroid.
 */
export function kMeans1D(
  values: readonly number[],
  seeds: readonly number[],
  maxIterations: number,
): number[] {
  let centroids = [...seeds]

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const members: number[][] = centroids.map(() => [])
    for (const value of values) {
      members[nearestCentroid(value, centroids)].push(value)
    }

    const next = centroids.map((c, i) => (members[i].length ? mean(members[i]) : c))
    const converged = next.every((c, i) => Math.abs(c - centroids[i]) < 1e-9)
    centroids = next
    if (converged) break
  }
  return centroids
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Build the size clusters for the given sizes. Centroids come back strictly
 * decreasing, with empty or coinciding clusters removed.
 */
export function buildLevelCluster(sizes: readonly number[], config: OutlineConfig): LevelCluster {
  if (sizes.length === 0) return { centroids: [] }

  const { bandRatio, maxLevels, maxIterations } = config.clustering
  const bands = sizeBands(sizes, bandRatio)
  const k = Math.max(1, Math.min(maxLevels, HEADING_LEVELS.length, bands.length))

  const fitted = kMeans1D(sizes, initialCentroids(bands, k), maxIterations)
    .sort((a, b) => b - a)

  const used = new Set(sizes.map(size => nearestCentroid(size, fitted)))
  const centroids: number[] = []
  fitted.forEach((c, i) => {
    if (!used.has(i)) return
    const last = centroids[centroids.length - 1]
    if (last !== undefined && last - c < 1e-9) return
    centroids.push(c)
  })

  return { centroids }
}

/**
 * Assign a level to every span. Pattern depth wins over the size level when
 * the two differ by exactly one and the pattern's level exists in the
 * cluster; larger disagreements keep the size level.
 */
export function clusterLevels(
  spans: readonly ScoredSpan[],
  config: OutlineConfig,
): { cluster: LevelCluster; leveled: LeveledSpan[] } {
  const cluster = buildLevelCluster(spans.map(span => span.fontSize), config)
  const { centroids } = cluster

  const leveled = spans.map(span => {
    let levelIndex = nearestCentroid(span.fontSize, centroids)

    const depth = span.patternDepth
    if (depth !== undefined && depth >= 1 && depth <= HEADING_LEVELS.length) {
      const patternIndex = depth - 1
      if (Math.abs(patternIndex - levelIndex) === 1 && patternIndex < centroids.length) {
        levelIndex = patternIndex
      }
    }

    return { ...span, level: HEADING_LEVELS[levelIndex] }
  })

  return { cluster, leveled }
}
