import type { Candidate, MergedCandidate } from '../../domain/types.js'
import { collapseWhitespace } from '../extract/normalize.js'

export { mergeCandidates, remergeCandidates, normalizeCompanyKey, DEFAULT_MAX_CANDIDATES }
export type { MergeResult }

type MergeResult = {
  candidates: MergedCandidate[]
  droppedCount: number
}

const DEFAULT_MAX_CANDIDATES = 2000

const PLACEHOLDER_KEYS = new Set(['n/a', 'na', 'tbd', 'others', 'other', 'mean', 'median', 'average', 'total'])

const normalizeCompanyKey = (name: string): string => collapseWhitespace(name).toLowerCase()

/**
 * Merges raw candidates by normalized name in first-seen order. The display
 * name keeps the casing of the first occurrence. When the merged set exceeds
 * `maxCandidates`, the most frequent names survive (earlier first on ties)
 * and the survivors keep their first-seen order.
 */
const mergeCandidates = (
  candidates: Candidate[],
  maxCandidates = DEFAULT_MAX_CANDIDATES
): MergeResult => {
  const byKey = new Map<string, MergedCandidate>()

  for (const candidate of candidates) {
    const name = collapseWhitespace(candidate.raw)
    const key = name.toLowerCase()
    if (key.length === 0 || PLACEHOLDER_KEYS.has(key)) continue

    const existing = byKey.get(key)
    if (existing) {
      existing.occurrences += 1
      if (!existing.sourceFileIds.includes(candidate.fileId)) {
        existing.sourceFileIds.push(candidate.fileId)
      }
      continue
    }

    byKey.set(key, {
      name,
      key,
      sourceFileIds: [candidate.fileId],
      occurrences: 1
    })
  }

  return applyCap([...byKey.values()], maxCandidates)
}

// Merges already-merged lists, summing occurrences and unioning sources.
const remergeCandidates = (
  lists: MergedCandidate[][],
  maxCandidates = DEFAULT_MAX_CANDIDATES
): MergeResult => {
  const byKey = new Map<string, MergedCandidate>()

  for (const list of lists) {
    for (const candidate of list) {
      const existing = byKey.get(candidate.key)
      if (!existing) {
        byKey.set(candidate.key, {
          ...candidate,
          sourceFileIds: [...candidate.sourceFileIds]
        })
        continue
      }
      existing.occurrences += candidate.occurrences
      for (const fileId of candidate.sourceFileIds) {
        if (!existing.sourceFileIds.includes(fileId)) {
          existing.sourceFileIds.push(fileId)
        }
      }
    }
  }

  return applyCap([...byKey.values()], maxCandidates)
}

const applyCap = (merged: MergedCandidate[], maxCandidates: number): MergeResult => {
  if (merged.length <= maxCandidates) {
    return { candidates: merged, droppedCount: 0 }
  }

  const kept = new Set(
    merged
      .map((candidate, order) => ({ candidate, order }))
      .sort((left, right) =>
        right.candidate.occurrences - left.candidate.occurrences || left.order - right.order
      )
      .slice(0, maxCandidates)
      .map((entry) => entry.candidate.key)
  )

  return {
    candidates: merged.filter((candidate) => kept.has(candidate.key)),
    droppedCount: merged.length - kept.size
  }
}
