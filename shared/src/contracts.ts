export type ApiError = {
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

export type AnalyzeRequest = {
  target_company: string
  file_references?: string[]
  copilot_response?: string
}

export type FailedFileKind = 'FILE_RESOLUTION' | 'NO_MATCHING_SHEET'

export type FailedFileEntry = {
  file: string
  reason: string
  kind: FailedFileKind
}

export type ClassifiedCompanyEntry = {
  name: string
  score: number
  reason: string
}

export type AnalyzeResponse = {
  target_company: string
  verified_competitors: ClassifiedCompanyEntry[]
  to_crosscheck: ClassifiedCompanyEntry[]
  verified_count: number
  crosscheck_count: number
  reasoning: string
  files_processed: number
  total_files_found: number
  failed_files: FailedFileEntry[]
  cached: boolean
  warnings?: string[]
  generated_at: string
}

export type CacheStatsResponse = {
  entry_count: number
  hit_count: number
  miss_count: number
  max_entries: number
  ttl_hours: number
  keys: string[]
}

export type ServiceStatusResponse = {
  status: 'online'
  service: string
}
