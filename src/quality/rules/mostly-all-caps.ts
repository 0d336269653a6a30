import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

/**
 * Share of uppercase letters among all letters of `value` (0 when it has none).
 */
export function upperCaseShare(value: string): number {
  const letters = value.match(/\p{L}/gu)
  if (!letters) return 0
  const upper = value.match(/\p{Lu}/gu)
  return (upper?.length ?? 0) / letters.length
}

/**
 * Flags fields typed (mostly) in capitals, e.g. `DUTTON, JANE E.` or `EDITORIAL`.
 * The cut-off is `mostlyAllCapsThreshold`.
 */
export const mostlyAllCapsRule: FieldRule = {
  name: 'mostly-all-caps',
  fields: [
    'title',
    'author',
    'editor',
    'journal',
    'booktitle',
    'publisher',
    'series',
  ],
  evaluate(field, record, { config }) {
    const value = getField(record, field)
    if (value === undefined) return []

    // the lowercase name delimiter would dilute the share
    const text =
      field === 'author' || field === 'editor'
        ? value.replace(/\s+and\s+/g, ' ')
        : value

    return upperCaseShare(text) > config.mostlyAllCapsThreshold
      ? ['mostly-all-caps']
      : []
  },
}
