import type { OutputSchema } from './vertex.client.js'

export { extractionOutputSchema, classificationOutputSchema }
export type { ExtractionOutput, ClassificationOutput, ScoredCompanyItem }

type ExtractionOutput = {
  companies: string[]
}

type ScoredCompanyItem = {
  name: string
  score: number
  reason: string
}

type ClassificationOutput = {
  verifiedCompetitors: ScoredCompanyItem[]
  toCrosscheck: ScoredCompanyItem[]
  reasoning: string
}

const extractionOutputSchema: OutputSchema<ExtractionOutput> = {
  parse: (value: unknown): ExtractionOutput => {
    const record = asRecord(value, 'extraction output')
    const companiesRaw = asArray(record.companies, 'companies')

    const companies = companiesRaw.map((item, index) => {
      if (typeof item !== 'string') {
        throw new Error(`companies[${index}] must be string`)
      }
      return item
    })

    return { companies }
  }
}

const classificationOutputSchema: OutputSchema<ClassificationOutput> = {
  parse: (value: unknown): ClassificationOutput => {
    const record = asRecord(value, 'classification output')
    const reasoning = record.reasoning
    if (reasoning !== undefined && typeof reasoning !== 'string') {
      throw new Error('reasoning must be string')
    }

    return {
      verifiedCompetitors: parseScoredList(
        record.verified_competitors ?? [],
        'verified_competitors'
      ),
      toCrosscheck: parseScoredList(record.to_crosscheck ?? [], 'to_crosscheck'),
      reasoning: reasoning ?? ''
    }
  }
}

const parseScoredList = (value: unknown, fieldName: string): ScoredCompanyItem[] =>
  asArray(value, fieldName).map((item, index) => {
    const entry = asRecord(item, `${fieldName}[${index}]`)
    const reason = entry.reason
    if (reason !== undefined && typeof reason !== 'string') {
      throw new Error(`${fieldName}[${index}].reason must be string`)
    }

    return {
      name: asString(entry.name, `${fieldName}[${index}].name`),
      score: asScore(entry.score, `${fieldName}[${index}].score`),
      reason: reason ?? ''
    }
  })

const asRecord = (
  value: unknown,
  fieldName: string
): Record<string, unknown> => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`${fieldName} must be an object`)
  }
  return value as Record<string, unknown>
}

const asArray = (value: unknown, fieldName: string): unknown[] => {
  if (!Array.isArray(value)) {
    throw new Error(`${fieldName} must be an array`)
  }
  return value
}

const asString = (value: unknown, fieldName: string): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`${fieldName} must be a non-empty string`)
  }
  return value
}

const asScore = (value: unknown, fieldName: string): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 100) {
    throw new Error(`${fieldName} must be an integer between 0 and 100`)
  }
  return value
}
