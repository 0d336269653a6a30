import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

const NAME_FIELDS = new Set(['author', 'editor'])

/**
 * Flags values cut off by the data source: trailing ellipses, and for name
 * lists a trailing `et al.`, comma or dangling `and`.
 */
export const incompleteFieldRule: FieldRule = {
  name: 'incomplete-field',
  fields: ['title', 'journal', 'booktitle', 'author', 'editor'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []

    if (value.endsWith('...') || value.endsWith('…')) {
      return ['incomplete-field']
    }

    if (NAME_FIELDS.has(field) && /(\bet al\.?|,|\sand)$/i.test(value)) {
      return ['incomplete-field']
    }

    return []
  },
}
