/**
 * Applies the field rules to a record and writes provenance notes
 * @module quality/quality-model
 */

import type { BibRecord, ProvenanceMap } from '../types/record.js'
import { MASTERDATA_FIELDS, isMasterdataField } from '../types/record.js'
import type { DefectCode } from '../types/defects.js'
import type { QualityConfig } from '../types/config.js'
import type { FieldDefects, RuleContext } from './types.js'
import type { Logger } from '../logging/logger.js'
import { defaultLogger } from '../logging/logger.js'
import { RuleRegistry, createDefaultRuleRegistry } from './rule-registry.js'
import { getMissingFieldNotes } from './rules/entry-type.js'
import { getField } from '../records/fields.js'
import { isDefectNote, joinNote } from '../records/provenance.js'
import { resolveQualityConfig } from '../utils/config.js'

export interface QualityModelOptions {
  config?: Partial<QualityConfig>
  registry?: RuleRegistry
  logger?: Logger
}

/**
 * QualityModel - annotates the masterdata fields of a record with defect codes
 *
 * `evaluate` rebuilds `colrev_masterdata_provenance` from the bibliographic
 * fields alone, so running it repeatedly gives the same annotations.
 *
 * @example
 * ```typescript
 * const model = new QualityModel()
 * model.evaluate(record)
 * record.colrev_masterdata_provenance.author // { source: 'quality-model', note: 'mostly-all-caps' }
 * model.hasQualityDefects(record) // true
 * ```
 */
export class QualityModel {
  readonly config: QualityConfig
  private readonly registry: RuleRegistry
  private readonly logger: Logger

  constructor(options: QualityModelOptions = {}) {
    this.config = resolveQualityConfig(options.config)
    this.registry = options.registry ?? createDefaultRuleRegistry()
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Detects the defects of every present masterdata field. Absent fields
   * are not reported here; see `evaluate` for `missing` notes.
   */
  getDefects(record: BibRecord): FieldDefects {
    const context: RuleContext = { config: this.config }
    const defects: FieldDefects = {}

    for (const field of MASTERDATA_FIELDS) {
      if (getField(record, field) === undefined) continue

      const codes: DefectCode[] = []
      for (const rule of this.registry.rulesFor(field)) {
        try {
          codes.push(...rule.evaluate(field, record, context))
        } catch (error) {
          this.logger.warn(`Rule '${rule.name}' failed on field '${field}'`, {
            recordId: record.ID,
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }
      defects[field] = codes
    }

    return defects
  }

  /**
   * Annotates the record in place and returns it.
   *
   * Present fields get their sorted defect codes (or an empty note),
   * absent required fields get `missing` / `not-missing`, and annotations
   * of masterdata fields that are neither present nor required are dropped.
   * Existing source tags are kept.
   */
  evaluate(record: BibRecord): BibRecord {
    const previous = record.colrev_masterdata_provenance
    const next: ProvenanceMap = {}

    // annotations outside the masterdata fields are not ours to manage
    for (const [field, annotation] of Object.entries(previous)) {
      if (!isMasterdataField(field)) {
        next[field] = annotation
      }
    }

    for (const [field, codes] of Object.entries(this.getDefects(record))) {
      next[field] = {
        source: previous[field]?.source ?? this.config.provenanceSource,
        note: joinNote(codes),
      }
    }

    for (const [field, note] of getMissingFieldNotes(record)) {
      next[field] = {
        source: previous[field]?.source ?? this.config.provenanceSource,
        note,
      }
    }

    record.colrev_masterdata_provenance = sortByField(next)
    return record
  }

  /**
   * Whether any annotation reports a defect (`missing` included,
   * `not-missing` excluded).
   */
  hasQualityDefects(record: BibRecord): boolean {
    return Object.values(record.colrev_masterdata_provenance).some((annotation) =>
      isDefectNote(annotation.note)
    )
  }
}

function sortByField(provenance: ProvenanceMap): ProvenanceMap {
  const sorted: ProvenanceMap = {}
  for (const field of Object.keys(provenance).sort()) {
    sorted[field] = provenance[field]
  }
  return sorted
}
