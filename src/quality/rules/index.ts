import type { FieldRule } from '../types.js'
import { mostlyAllCapsRule } from './mostly-all-caps.js'
import { incompleteFieldRule } from './incomplete-field.js'
import {
  nameFormatSeparatorsRule,
  nameFormatTitlesRule,
  nameAbbreviatedRule,
  erroneousTermInFieldRule,
  thesisAuthorsRule,
} from './name-format.js'
import { erroneousSymbolRule } from './symbols.js'
import { erroneousTitleRule, identicalTitleContainerRule } from './title.js'
import {
  containerTitleAbbreviatedRule,
  inconsistentContentRule,
} from './container-title.js'
import { inconsistentWithEntryTypeRule } from './entry-type.js'
import { yearFormatRule } from './year-format.js'
import { languageFormatRule } from './language-format.js'

export { mostlyAllCapsRule, upperCaseShare } from './mostly-all-caps.js'
export { incompleteFieldRule } from './incomplete-field.js'
export {
  nameFormatSeparatorsRule,
  nameFormatTitlesRule,
  nameAbbreviatedRule,
  erroneousTermInFieldRule,
  thesisAuthorsRule,
  hasNameSeparatorError,
} from './name-format.js'
export { erroneousSymbolRule } from './symbols.js'
export { erroneousTitleRule, identicalTitleContainerRule } from './title.js'
export {
  containerTitleAbbreviatedRule,
  inconsistentContentRule,
} from './container-title.js'
export {
  REQUIRED_FIELDS,
  INCONSISTENT_FIELDS,
  getMissingFieldNotes,
  inconsistentWithEntryTypeRule,
} from './entry-type.js'
export { yearFormatRule, isForthcoming, FORTHCOMING } from './year-format.js'
export { languageFormatRule, isLanguageCode } from './language-format.js'

/**
 * Built-in rules in evaluation order.
 */
export const DEFAULT_RULES: readonly FieldRule[] = [
  mostlyAllCapsRule,
  incompleteFieldRule,
  nameFormatSeparatorsRule,
  nameFormatTitlesRule,
  nameAbbreviatedRule,
  erroneousTermInFieldRule,
  thesisAuthorsRule,
  erroneousSymbolRule,
  erroneousTitleRule,
  identicalTitleContainerRule,
  containerTitleAbbreviatedRule,
  inconsistentContentRule,
  inconsistentWithEntryTypeRule,
  yearFormatRule,
  languageFormatRule,
]
