/**
 * Lookup tables over a snapshot pair
 * @module checker/snapshot-index
 */

import type { BibRecord, SearchSource, SnapshotPair } from '../types/record.js'
import { hasField } from '../records/fields.js'

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key)
  if (list === undefined) {
    map.set(key, [value])
  } else {
    list.push(value)
  }
}

/**
 * Read-only index shared by all checks of one run.
 */
export class SnapshotIndex {
  readonly prior: readonly BibRecord[]
  readonly current: readonly BibRecord[]
  readonly priorById = new Map<string, BibRecord>()
  readonly currentById = new Map<string, BibRecord[]>()
  readonly currentByOrigin = new Map<string, BibRecord[]>()
  readonly priorByOrigin = new Map<string, BibRecord[]>()
  readonly sourcesByFilename = new Map<string, SearchSource>()

  constructor(pair: SnapshotPair, sources: readonly SearchSource[]) {
    this.prior = pair.prior
    this.current = pair.current

    for (const record of pair.prior) {
      if (!this.priorById.has(record.ID)) this.priorById.set(record.ID, record)
      for (const origin of record.colrev_origin) {
        push(this.priorByOrigin, origin, record)
      }
    }

    for (const record of pair.current) {
      push(this.currentById, record.ID, record)
      for (const origin of record.colrev_origin) {
        push(this.currentByOrigin, origin, record)
      }
    }

    for (const source of sources) {
      if (!this.sourcesByFilename.has(source.filename)) {
        this.sourcesByFilename.set(source.filename, source)
      }
    }
  }
}

/**
 * Records left behind by a merge, pointing at the record that absorbed them.
 */
export function isSuperseded(record: BibRecord): boolean {
  return hasField(record, 'colrev_superseded_by')
}
