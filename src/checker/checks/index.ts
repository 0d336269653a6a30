import type { ConsistencyCheck } from '../types.js'
import { sourcesCheck } from './sources.js'
import { uniqueIdsCheck } from './unique-ids.js'
import { idImmutabilityCheck } from './id-immutability.js'
import { originsCheck } from './origins.js'
import { provenanceCheck } from './provenance.js'
import { statusTransitionsCheck } from './status-transitions.js'
import { screeningCheck } from './screening.js'

export {
  sourcesCheck,
  uniqueIdsCheck,
  idImmutabilityCheck,
  originsCheck,
  provenanceCheck,
  statusTransitionsCheck,
  screeningCheck,
}
export { screeningCriteriaPattern } from './screening.js'

/**
 * The checks, in reporting order.
 */
export const DEFAULT_CHECKS: readonly ConsistencyCheck[] = [
  sourcesCheck,
  uniqueIdsCheck,
  idImmutabilityCheck,
  originsCheck,
  provenanceCheck,
  statusTransitionsCheck,
  screeningCheck,
]
