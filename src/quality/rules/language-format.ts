import { iso6393 } from 'iso-639-3'
import type { FieldRule } from '../types.js'
import { getField } from '../../records/fields.js'

let languageCodes: Set<string> | undefined

/**
 * Whether `code` is an ISO 639-3 language code, e.g. `eng` or `deu`.
 */
export function isLanguageCode(code: string): boolean {
  if (!languageCodes) {
    languageCodes = new Set(iso6393.map((language) => language.iso6393))
  }
  return languageCodes.has(code)
}

export const languageFormatRule: FieldRule = {
  name: 'language-format-error',
  fields: ['language'],
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []
    return isLanguageCode(value) ? [] : ['language-format-error']
  },
}
