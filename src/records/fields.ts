/**
 * Field access helpers shared by rules, scorer and checks
 * @module records/fields
 */

import type { BibRecord } from '../types/record.js'

/**
 * Returns the trimmed field value, or undefined when the field is absent or blank.
 */
export function getField(record: BibRecord, field: string): string | undefined {
  const value = record.fields[field]
  if (value === undefined) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function hasField(record: BibRecord, field: string): boolean {
  return getField(record, field) !== undefined
}

/**
 * Container title: journal for articles, booktitle for everything else.
 */
export function getContainerTitle(record: BibRecord): string | undefined {
  return getField(record, 'journal') ?? getField(record, 'booktitle')
}

/**
 * Splits a BibTeX name list on its `and` delimiter.
 */
export function splitNames(value: string): string[] {
  return value
    .split(/\s+and\s+/)
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

/**
 * Splits an origin link into source filename and record id. The filename
 * may itself contain slashes.
 */
export function splitOrigin(
  origin: string
): { filename: string; recordId: string } | undefined {
  const index = origin.lastIndexOf('/')
  if (index <= 0 || index === origin.length - 1) return undefined
  return {
    filename: origin.slice(0, index),
    recordId: origin.slice(index + 1),
  }
}
