/**
 * Detection of records whose content changed substantially between snapshots
 * @module similarity/change-validator
 */

import type { BibRecord, SnapshotPair } from '../types/record.js'
import { requireInRange } from '../utils/errors.js'
import { SimilarityScorer } from './similarity-scorer.js'
import type { RecordChange } from './types.js'

export interface ChangeValidationOptions {
  /** Pairs scoring below this similarity are reported (default: 0.9) */
  threshold?: number
  scorer?: SimilarityScorer
}

/**
 * Pairs each prior record with its current version and reports those that
 * drifted below the threshold, least similar first.
 *
 * A prior record is matched by ID, or, when its ID is gone after a merge or
 * rename, by the first current record sharing one of its origins. Prior
 * records with no current version are skipped.
 */
export function validateChanges(
  pair: SnapshotPair,
  options: ChangeValidationOptions = {}
): RecordChange[] {
  const threshold = options.threshold ?? 0.9
  requireInRange(threshold, 0, 1, 'threshold')
  const scorer = options.scorer ?? new SimilarityScorer()

  const byId = new Map<string, BibRecord>()
  const byOrigin = new Map<string, BibRecord>()
  for (const record of pair.current) {
    if (!byId.has(record.ID)) byId.set(record.ID, record)
    for (const origin of record.colrev_origin) {
      if (!byOrigin.has(origin)) byOrigin.set(origin, record)
    }
  }

  const changes: RecordChange[] = []
  for (const prior of pair.prior) {
    const current = byId.get(prior.ID) ?? findByOrigin(prior, byOrigin)
    if (current === undefined) continue

    const score = scorer.similarity(prior, current)
    if (score < threshold) {
      changes.push({ prior, current, similarity: score })
    }
  }

  return changes.sort((a, b) => a.similarity - b.similarity)
}

function findByOrigin(
  prior: BibRecord,
  byOrigin: Map<string, BibRecord>
): BibRecord | undefined {
  for (const origin of prior.colrev_origin) {
    const match = byOrigin.get(origin)
    if (match !== undefined) return match
  }
  return undefined
}
