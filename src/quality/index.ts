export { QualityModel, type QualityModelOptions } from './quality-model.js'
export { RuleRegistry, createDefaultRuleRegistry } from './rule-registry.js'
export { summarizeDefects, type DefectStatistics } from './defect-statistics.js'
export type { FieldRule, RuleContext, FieldDefects } from './types.js'
export * from './rules/index.js'
