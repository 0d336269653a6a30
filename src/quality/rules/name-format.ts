/**
 * Rules for author and editor name lists
 * @module quality/rules/name-format
 */

import type { FieldRule } from '../types.js'
import { getField, splitNames } from '../../records/fields.js'
import { THESIS_ENTRY_TYPES } from '../../types/entry-type.js'

const NAME_FIELDS = ['author', 'editor'] as const

/** Lowercase name particles that may start a name token */
const NAME_PARTICLES = new Set([
  'van',
  'von',
  'der',
  'den',
  'de',
  'da',
  'del',
  'della',
  'di',
  'du',
  'la',
  'le',
  'dos',
  'das',
  'ten',
  'ter',
  'zu',
])

const ACADEMIC_TITLES = new Set(['phd', 'md', 'dr', 'prof', 'dipl', 'msc', 'mba'])

const INSTITUTIONAL_TERMS = new Set([
  'University',
  'Universität',
  'Université',
  'Universidad',
  'Department',
  'Dept',
  'Institute',
  'Institut',
  'Faculty',
  'School',
  'College',
  'Center',
  'Centre',
  'Laboratory',
  'Hospital',
  'Research',
  'Consortium',
  'Association',
  'Society',
  'Foundation',
  'Inc',
  'Ltd',
  'GmbH',
  'Corporation',
])

/**
 * Removes collective abbreviations and truncation marks so that only the
 * listed names remain.
 */
function stripNameListSuffix(value: string): string {
  return value
    .replace(/,?\s*(and others|et al\.?)$/i, '')
    .replace(/(,|\s+and)$/i, '')
    .trim()
}

function isWellFormedToken(token: string): boolean {
  if (/^\p{Lu}/u.test(token)) return true
  if (NAME_PARTICLES.has(token)) return true
  // d'Alembert, l'Hôpital
  return /^\p{Ll}'\p{Lu}/u.test(token)
}

/**
 * Whether a name list deviates from `Last, First and Last, First`.
 */
export function hasNameSeparatorError(value: string): boolean {
  const stripped = stripNameListSuffix(value)
  if (stripped.includes(';')) return true

  for (const name of splitNames(stripped)) {
    const match = /^([^,]+), ([^,]+)$/.exec(name)
    if (!match) return true

    const tokens = `${match[1]} ${match[2]}`
      .split(/[\s-]+/)
      .filter((token) => token.length > 0)
    if (!tokens.every(isWellFormedToken)) return true
  }

  return false
}

export const nameFormatSeparatorsRule: FieldRule = {
  name: 'name-format-separators',
  fields: NAME_FIELDS,
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []
    return hasNameSeparatorError(value) ? ['name-format-separators'] : []
  },
}

/**
 * Flags academic titles written into a name, e.g. `Rai, PhD, Arun`.
 */
export const nameFormatTitlesRule: FieldRule = {
  name: 'name-format-titles',
  fields: NAME_FIELDS,
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []

    const hasTitle = value
      .split(/[\s,.;:]+/)
      .some((token) => ACADEMIC_TITLES.has(token.toLowerCase()))
    return hasTitle ? ['name-format-titles'] : []
  },
}

export const nameAbbreviatedRule: FieldRule = {
  name: 'name-abbreviated',
  fields: NAME_FIELDS,
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []
    return /(^|[\s,])and others$/i.test(value) ? ['name-abbreviated'] : []
  },
}

/**
 * Flags affiliations that leaked into a name list.
 */
export const erroneousTermInFieldRule: FieldRule = {
  name: 'erroneous-term-in-field',
  fields: NAME_FIELDS,
  evaluate(field, record) {
    const value = getField(record, field)
    if (value === undefined) return []

    const hasTerm = value
      .split(/[^\p{L}]+/u)
      .some((token) => INSTITUTIONAL_TERMS.has(token))
    return hasTerm ? ['erroneous-term-in-field'] : []
  },
}

export const thesisAuthorsRule: FieldRule = {
  name: 'thesis-with-multiple-authors',
  fields: ['author'],
  evaluate(field, record) {
    if (!THESIS_ENTRY_TYPES.includes(record.ENTRYTYPE)) return []
    const value = getField(record, field)
    if (value === undefined) return []
    return splitNames(value).length > 1 ? ['thesis-with-multiple-authors'] : []
  },
}
