import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

// replacement character, C0 controls, DEL and trademark glyphs
const ERRONEOUS_SYMBOLS = /[\u0000-\u001f\u007f\ufffd\u2122\u00ae]/u

export const erroneousSymbolRule: FieldRule = {
  name: 'erroneous-symbol-in-field',
  fields: ['title', 'author', 'editor', 'journal', 'booktitle', 'publisher'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []
    return ERRONEOUS_SYMBOLS.test(value) ? ['erroneous-symbol-in-field'] : []
  },
}
