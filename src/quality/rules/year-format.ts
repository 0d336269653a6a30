import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

export const FORTHCOMING = 'forthcoming'

export function isForthcoming(year: string | undefined): boolean {
  return year === FORTHCOMING
}

export const yearFormatRule: FieldRule = {
  name: 'year-format',
  fields: ['year'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []
    if (/^\d{4}$/.test(value) || isForthcoming(value)) return []
    return ['year-format']
  },
}
