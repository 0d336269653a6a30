/**
 * Registry of field rules
 * @module quality/rule-registry
 */

import type { FieldRule } from './types.js'
import { DEFAULT_RULES } from './rules/index.js'
import { ConfigurationError } from '../utils/errors.js'

/**
 * Ordered set of rules applied by a quality model.
 *
 * Rules are registered once at startup; evaluation order follows
 * registration order.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRuleRegistry()
 * registry.register({
 *   name: 'pages-format',
 *   fields: ['pages'],
 *   evaluate: (field, record) => [],
 * })
 * ```
 */
export class RuleRegistry {
  private readonly rules = new Map<string, FieldRule>()

  constructor(rules: readonly FieldRule[] = []) {
    for (const rule of rules) {
      this.register(rule)
    }
  }

  /**
   * Registers a rule.
   *
   * @throws {ConfigurationError} If the name is empty or already taken
   */
  register(rule: FieldRule): this {
    if (!rule.name || rule.name.trim() === '') {
      throw new ConfigurationError('Rule name cannot be empty', 'name')
    }
    if (this.rules.has(rule.name)) {
      throw new ConfigurationError(
        `Rule '${rule.name}' is already registered`,
        'name',
        { rule: rule.name }
      )
    }
    this.rules.set(rule.name, rule)
    return this
  }

  /**
   * Removes a rule, returning whether it was registered.
   */
  unregister(name: string): boolean {
    return this.rules.delete(name)
  }

  has(name: string): boolean {
    return this.rules.has(name)
  }

  get(name: string): FieldRule | undefined {
    return this.rules.get(name)
  }

  list(): FieldRule[] {
    return Array.from(this.rules.values())
  }

  /**
   * Rules that inspect `field`, in registration order.
   */
  rulesFor(field: string): FieldRule[] {
    return this.list().filter(
      (rule) => rule.fields === undefined || rule.fields.includes(field)
    )
  }
}

/**
 * Creates a registry holding the built-in rules.
 */
export function createDefaultRuleRegistry(): RuleRegistry {
  return new RuleRegistry(DEFAULT_RULES)
}
