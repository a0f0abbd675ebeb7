export { extractFileReferences, dedupeReferences, toRelativePath, toDisplayName }

const FULL_PATH_PATTERN = /Full Path:\s*(.+?\.(?:xlsx|xlsm|xls|csv))/gi
const SHARED_DOCUMENTS_MARKER = 'Shared Documents/'

// Pulls "Full Path: ..." spreadsheet references out of free text.
const extractFileReferences = (text: string): string[] =>
  dedupeReferences([...text.matchAll(FULL_PATH_PATTERN)].map((match) => match[1] ?? ''))

const dedupeReferences = (references: string[]): string[] => {
  const seen = new Set<string>()
  const unique: string[] = []
  for (const reference of references) {
    const trimmed = reference.trim()
    if (!trimmed || seen.has(trimmed)) continue
    seen.add(trimmed)
    unique.push(trimmed)
  }
  return unique
}

const toRelativePath = (reference: string): string => {
  const markerIndex = reference.indexOf(SHARED_DOCUMENTS_MARKER)
  if (markerIndex < 0) return reference
  return reference.slice(markerIndex + SHARED_DOCUMENTS_MARKER.length)
}

const toDisplayName = (reference: string): string => toRelativePath(reference)
