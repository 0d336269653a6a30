import { describe, it, expect } from 'vitest'
import {
  resolveQualityConfig,
  resolveSimilarityConfig,
  resolveCheckerConfig,
} from '../../../src/utils/config.js'
import {
  ConfigurationError,
  InvalidParameterError,
} from '../../../src/utils/errors.js'

describe('resolveQualityConfig', () => {
  it('fills in defaults', () => {
    expect(resolveQualityConfig()).toEqual({
      mostlyAllCapsThreshold: 0.8,
      containerAbbreviationMaxLength: 5,
      knownShortContainerTitles: ['BMJ', 'JAMA', 'PNAS'],
      provenanceSource: 'quality-model',
    })
  })

  it('keeps overrides and copies the title list', () => {
    const titles = ['NEJM']
    const config = resolveQualityConfig({
      mostlyAllCapsThreshold: 0.9,
      knownShortContainerTitles: titles,
    })

    expect(config.mostlyAllCapsThreshold).toBe(0.9)
    expect(config.knownShortContainerTitles).toEqual(['NEJM'])
    expect(config.knownShortContainerTitles).not.toBe(titles)
  })

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => resolveQualityConfig({ mostlyAllCapsThreshold: 1.2 })).toThrow(
      InvalidParameterError
    )
  })

  it('rejects an empty provenance source', () => {
    expect(() => resolveQualityConfig({ provenanceSource: '' })).toThrow(
      InvalidParameterError
    )
  })
})

describe('resolveSimilarityConfig', () => {
  it('merges partial weights into the defaults', () => {
    expect(resolveSimilarityConfig({ weights: { title: 0.5 } }).weights).toEqual({
      title: 0.5,
      author: 0.2,
      year: 0.1,
      container: 0.1,
    })
  })

  it('rejects negative weights', () => {
    expect(() => resolveSimilarityConfig({ weights: { year: -1 } })).toThrow(
      InvalidParameterError
    )
  })

  it('rejects weights that are all zero', () => {
    expect(() =>
      resolveSimilarityConfig({
        weights: { title: 0, author: 0, year: 0, container: 0 },
      })
    ).toThrow(ConfigurationError)
  })
})

describe('resolveCheckerConfig', () => {
  it('fills in defaults', () => {
    expect(resolveCheckerConfig()).toEqual({
      strict: false,
      nearDuplicateThreshold: 0.9,
      verifyAnnotations: false,
      requireSingleOperation: false,
    })
  })

  it('validates the near-duplicate threshold', () => {
    expect(() => resolveCheckerConfig({ nearDuplicateThreshold: 2 })).toThrow(
      InvalidParameterError
    )
  })
})
