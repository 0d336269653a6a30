/**
 * Audit trail of manual status overrides
 * @module state/override-log
 */

import { v4 as uuidv4 } from 'uuid'
import type { RecordStatus } from '../types/status.js'
import { requireNonEmptyString } from '../utils/errors.js'

/**
 * A status change that bypassed the transition table.
 */
export interface OverrideEntry {
  id: string
  recordId: string
  from: RecordStatus
  to: RecordStatus
  reason: string
  authorizedBy: string
  createdAt: Date
}

export type OverrideRequest = Omit<OverrideEntry, 'id' | 'createdAt'>

/**
 * OverrideLog - in-memory log of manual overrides and resets
 *
 * The record store persists the entries; the log is rebuilt from them with
 * `OverrideLog.from` and handed to the consistency checker.
 *
 * @example
 * ```typescript
 * const log = new OverrideLog()
 * log.record({
 *   recordId: 'Rai2015',
 *   from: 'rev_included',
 *   to: 'md_processed',
 *   reason: 'reset after correcting the venue',
 *   authorizedBy: 'reviewer-1',
 * })
 * log.has('Rai2015', 'rev_included', 'md_processed') // true
 * ```
 */
export class OverrideLog {
  private readonly entries = new Map<string, OverrideEntry>()

  static from(entries: Iterable<OverrideEntry>): OverrideLog {
    const log = new OverrideLog()
    for (const entry of entries) {
      log.entries.set(entry.id, { ...entry })
    }
    return log
  }

  /**
   * Adds an override. Reason and actor are mandatory.
   */
  record(request: OverrideRequest): OverrideEntry {
    requireNonEmptyString(request.recordId, 'recordId')
    requireNonEmptyString(request.reason, 'reason')
    requireNonEmptyString(request.authorizedBy, 'authorizedBy')

    const entry: OverrideEntry = {
      ...request,
      id: uuidv4(),
      createdAt: new Date(),
    }
    this.entries.set(entry.id, entry)
    return entry
  }

  get(id: string): OverrideEntry | undefined {
    return this.entries.get(id)
  }

  forRecord(recordId: string): OverrideEntry[] {
    return this.list().filter((entry) => entry.recordId === recordId)
  }

  find(
    recordId: string,
    from: RecordStatus,
    to: RecordStatus
  ): OverrideEntry | undefined {
    return this.list().find(
      (entry) =>
        entry.recordId === recordId && entry.from === from && entry.to === to
    )
  }

  has(recordId: string, from: RecordStatus, to: RecordStatus): boolean {
    return this.find(recordId, from, to) !== undefined
  }

  /**
   * Entries in insertion order.
   */
  list(): OverrideEntry[] {
    return Array.from(this.entries.values())
  }

  get size(): number {
    return this.entries.size
  }
}
