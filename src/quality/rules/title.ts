/**
 * Title rules
 * @module quality/rules/title
 */

import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

/**
 * Flags titles that read like identifiers rather than natural language:
 * underscores (`Some_Other_Title`) or digits standing in for letters (`0th3r`).
 */
export const erroneousTitleRule: FieldRule = {
  name: 'erroneous-title-field',
  fields: ['title'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []

    if (value.includes('_') || /\p{Ll}\d+\p{Ll}/u.test(value)) {
      return ['erroneous-title-field']
    }
    return []
  },
}

/**
 * Flags a title copied from the container (journal or booktitle) field.
 */
export const identicalTitleContainerRule: FieldRule = {
  name: 'identical-values-between-title-and-container',
  fields: ['title'],
  evaluate(field, record) {
    const title = getField(record, field)
    if (title === undefined) return []

    const matchesContainer =
      title === getField(record, 'journal') ||
      title === getField(record, 'booktitle')
    return matchesContainer
      ? ['identical-values-between-title-and-container']
      : []
  },
}
