/**
 * Reading and writing provenance notes
 * @module records/provenance
 */

import type { ProvenanceMap } from '../types/record.js'
import {
  CLEAN_NOTE,
  MISSING_NOTE,
  NOT_MISSING_NOTE,
} from '../types/defects.js'

/**
 * Splits a note into its parts. A clean note yields an empty list.
 */
export function splitNote(note: string): string[] {
  return note
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
}

/**
 * Joins defect codes into a note: de-duplicated and sorted.
 */
export function joinNote(codes: Iterable<string>): string {
  const unique = Array.from(new Set(codes))
  if (unique.length === 0) return CLEAN_NOTE
  return unique.sort().join(',')
}

/**
 * Whether a note reports a defect. `not-missing` and clean notes do not.
 */
export function isDefectNote(note: string): boolean {
  return note !== CLEAN_NOTE && note !== NOT_MISSING_NOTE
}

export function isSentinelNote(note: string): boolean {
  return note === MISSING_NOTE || note === NOT_MISSING_NOTE
}

/**
 * Deep copy of a provenance map.
 */
export function cloneProvenance(provenance: ProvenanceMap): ProvenanceMap {
  const copy: ProvenanceMap = {}
  for (const [field, annotation] of Object.entries(provenance)) {
    copy[field] = { source: annotation.source, note: annotation.note }
  }
  return copy
}
