/**
 * Journal and booktitle rules
 * @module quality/rules/container-title
 */

import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

const JOURNAL_TERMS =
  /\b(journal|transactions|review|letters|quarterly|magazine|bulletin|annals)\b/i
const CONFERENCE_TERMS =
  /\b(conference|proceedings|symposium|workshop|congress|colloquium)\b/i

/**
 * Flags container titles that look like an abbreviation: a single short
 * all-caps word (`SAMJ`) that is not on the `knownShortContainerTitles` list.
 */
export const containerTitleAbbreviatedRule: FieldRule = {
  name: 'container-title-abbreviated',
  fields: ['journal', 'booktitle'],
  evaluate(field, record, { config }) {
    const value = getField(record, field)
    if (value === undefined) return []

    if (config.knownShortContainerTitles.includes(value)) return []

    const maxLength = config.containerAbbreviationMaxLength
    const isAbbreviation =
      /^\p{Lu}+$/u.test(value) &&
      value.length >= 2 &&
      value.length <= maxLength
    return isAbbreviation ? ['container-title-abbreviated'] : []
  },
}

/**
 * Flags a container field naming both a journal and a conference,
 * e.g. `A Journal, Conference`.
 */
export const inconsistentContentRule: FieldRule = {
  name: 'inconsistent-content',
  fields: ['journal', 'booktitle'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []

    const segments = value
      .split(/[,;|]/)
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0)
    if (segments.length < 2) return []

    const mixed = segments.some(
      (journal, i) =>
        JOURNAL_TERMS.test(journal) &&
        segments.some(
          (conference, j) => i !== j && CONFERENCE_TERMS.test(conference)
        )
    )
    return mixed ? ['inconsistent-content'] : []
  },
}
