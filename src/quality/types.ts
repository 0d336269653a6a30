import type { BibRecord } from '../types/record.js'
import type { DefectCode } from '../types/defects.js'
import type { QualityConfig } from '../types/config.js'

/**
 * Context handed to every rule evaluation.
 */
export interface RuleContext {
  config: QualityConfig
}

/**
 * A stateless defect checker for one semantic concern.
 *
 * Rules read bibliographic fields only (never existing provenance notes), so
 * evaluating a record twice yields the same annotations. A rule is only
 * called for fields that are present on the record.
 */
export interface FieldRule {
  /** Unique rule name used by the registry */
  readonly name: string
  /** Fields the rule inspects; omitted means every masterdata field */
  readonly fields?: readonly string[]
  /**
   * Returns the defect codes detected for `field`, or an empty list.
   */
  evaluate(
    field: string,
    record: BibRecord,
    context: RuleContext
  ): readonly DefectCode[]
}

/**
 * Defect codes detected per field.
 */
export type FieldDefects = { [field: string]: DefectCode[] }
