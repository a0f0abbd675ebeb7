import { describe, expect, it } from 'vitest'
import { classificationOutputSchema, extractionOutputSchema } from '../src/services/llm/jsonSchemas.js'
import { applySchema } from '../src/services/llm/vertex.client.js'

describe('extractionOutputSchema', () => {
  it('accepts a list of names', () => {
    expect(applySchema(extractionOutputSchema, { companies: ['Acme', 'Beta'] })).toEqual({
      companies: ['Acme', 'Beta']
    })
  })

  it('rejects non-string entries as malformed output', () => {
    expect(() => applySchema(extractionOutputSchema, { companies: ['Acme', 3] })).toThrow(
      'model output rejected: companies[1] must be string'
    )
    expect(() => applySchema(extractionOutputSchema, ['Acme'])).toThrow(
      'model output rejected: extraction output must be an object'
    )
  })
})

describe('classificationOutputSchema', () => {
  it('fills defaults for missing lists and reasons', () => {
    expect(
      applySchema(classificationOutputSchema, {
        verified_competitors: [{ name: 'Acme', score: 90 }],
        reasoning: 'Close peers.'
      })
    ).toEqual({
      verifiedCompetitors: [{ name: 'Acme', score: 90, reason: '' }],
      toCrosscheck: [],
      reasoning: 'Close peers.'
    })
  })

  it('rejects scores outside 0..100 or fractional', () => {
    expect(() =>
      applySchema(classificationOutputSchema, { verified_competitors: [{ name: 'Acme', score: 101 }] })
    ).toThrow('verified_competitors[0].score must be an integer between 0 and 100')
    expect(() =>
      applySchema(classificationOutputSchema, { to_crosscheck: [{ name: 'Acme', score: 72.5 }] })
    ).toThrow('to_crosscheck[0].score must be an integer between 0 and 100')
  })

  it('rejects items without a name', () => {
    expect(() =>
      applySchema(classificationOutputSchema, { to_crosscheck: [{ name: ' ', score: 10 }] })
    ).toThrow('to_crosscheck[0].name must be a non-empty string')
  })
})
