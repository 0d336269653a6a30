import type { CheckResult } from './types.js'

/**
 * Renders a check result for the terminal: `Everything ok.` or one indented
 * line per failure.
 *
 * @example
 * ```typescript
 * formatCheckReport(result)
 * // Consistency check failed (1 failure):
 * //   duplicate-id: ID 'Rai2015' is used by 2 records (similarity 0.98, likely the same work)
 * ```
 */
export function formatCheckReport(result: CheckResult): string {
  if (result.status === 'pass') return 'Everything ok.'

  const count = result.failures.length
  const lines = [
    `Consistency check failed (${count} ${count === 1 ? 'failure' : 'failures'}):`,
  ]
  for (const failure of result.failures) {
    lines.push(`  ${failure.kind}: ${failure.message}`)
  }
  return lines.join('\n')
}
