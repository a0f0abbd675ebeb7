export { buildExtractionPrompt, buildClassificationPrompt }
export type { ExtractionPromptInput, ClassificationPromptInput }

type ExtractionPromptInput = {
  targetCompany: string
  sheetName: string
  chunkText: string
  chunkIndex: number
  chunkCount: number
}

type ClassificationPromptInput = {
  targetCompany: string
  candidateNames: string[]
  verifiedThreshold: number
}

const COMMON_RULES = [
  'Respond with JSON only. No Markdown, no code fences, no commentary.',
  'Use only company names that literally appear in the input. Never invent companies.'
] as const

export const DATA_START_MARKER = '=== DATA START ==='
export const DATA_END_MARKER = '=== DATA END ==='

const buildExtractionPrompt = (input: ExtractionPromptInput): string => {
  return [
    'TASK: Extract every company name from the spreadsheet rows below that is a potential competitor or comparable company.',
    `TARGET COMPANY CONTEXT: ${input.targetCompany}`,
    `Only extract companies that operate in the same or a closely related business as ${input.targetCompany}.`,
    ...COMMON_RULES,
    '- Look for columns holding company names, targets, acquirers, sellers, peers or similar identifiers.',
    '- Exclude headers, totals, averages and summary rows.',
    '- Ignore entries like "N/A", "TBD", "Others", "Mean", "Total", "Average", "Median".',
    'Output schema:',
    '{ "companies": ["Company 1", "Company 2"] }',
    `Sheet: ${input.sheetName} (part ${input.chunkIndex + 1} of ${input.chunkCount})`,
    DATA_START_MARKER,
    input.chunkText,
    DATA_END_MARKER
  ].join('\n')
}

const buildClassificationPrompt = (input: ClassificationPromptInput): string => {
  const threshold = input.verifiedThreshold
  return [
    'You are a business analyst specializing in competitive analysis.',
    `TARGET COMPANY: ${input.targetCompany}`,
    'EXTRACTED COMPANY CANDIDATES:',
    JSON.stringify(input.candidateNames, null, 2),
    `TASK: Classify every candidate by its competitive relationship with ${input.targetCompany}.`,
    ...COMMON_RULES,
    'Assign each candidate an integer confidence score from 0 to 100 for the strength of the competitive overlap:',
    '- 90-100: direct competitor (same core products or services, same market).',
    '- 70-89: strong competitor (significant overlap).',
    '- 50-69: moderate or indirect competitor, or substitute.',
    '- below 50: low relevance or a different industry.',
    `Put candidates scoring ${threshold} or more in "verified_competitors" and the rest in "to_crosscheck".`,
    'Give every item a short "reason".',
    'Output schema:',
    '{ "verified_competitors": [{ "name": "...", "score": 95, "reason": "..." }], "to_crosscheck": [{ "name": "...", "score": 45, "reason": "..." }], "reasoning": "brief analysis of the industry context" }'
  ].join('\n')
}
