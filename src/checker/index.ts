export {
  ConsistencyChecker,
  type ConsistencyCheckerOptions,
} from './consistency-checker.js'
export { SnapshotIndex, isSuperseded } from './snapshot-index.js'
export { formatCheckReport } from './report.js'
export * from './checks/index.js'
export type {
  CheckName,
  FailureKind,
  CheckFailure,
  CheckResult,
  CheckContext,
  CheckEnvironment,
  ConsistencyCheck,
} from './types.js'
