import { GoogleAuth } from 'google-auth-library'
import { toErrorMessage } from '../../utils/errors.js'

export { runPrompt, setVertexTransport, applySchema, LlmError, isLlmError }

export type OutputSchema<T> =
  | { parse: (value: unknown) => T }
  | ((value: unknown) => T)

export type RunPromptOptions = {
  timeoutMs?: number
  maxRetries?: number
  retryDelayMs?: number
  temperature?: number
  model?: string
  fallbackModels?: string[]
}

export type PromptRunner = <T>(
  prompt: string,
  schema: OutputSchema<T>,
  options?: RunPromptOptions
) => Promise<T>

export type LlmErrorKind =
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'MALFORMED'
  | 'MODEL_UNAVAILABLE'
  | 'UPSTREAM'

export type VertexRequest = {
  prompt: string
  model: string
  temperature: number
}

export type VertexTransport = (
  request: VertexRequest,
  signal: AbortSignal
) => Promise<unknown>

type ResolvedRunPromptOptions = {
  timeoutMs: number
  maxRetries: number
  retryDelayMs: number
  temperature: number
  model: string
  fallbackModels: string[]
}

class LlmError extends Error {
  public readonly kind: LlmErrorKind
  public readonly retryable: boolean
  public readonly status?: number

  constructor(kind: LlmErrorKind, message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(message)
    this.name = 'LlmError'
    this.kind = kind
    this.retryable = options.retryable ?? kind !== 'MODEL_UNAVAILABLE'
    if (options.status !== undefined) {
      this.status = options.status
    }
  }
}

const isLlmError = (error: unknown): error is LlmError => error instanceof LlmError

const DEFAULT_TIMEOUT_MS = Number(process.env.VERTEX_TIMEOUT_MS ?? 120000)
const DEFAULT_MAX_RETRIES = Number(process.env.VERTEX_MAX_RETRIES ?? 2)
const DEFAULT_RETRY_DELAY_MS = Number(process.env.VERTEX_RETRY_DELAY_MS ?? 500)
const DEFAULT_TEMPERATURE = Number(process.env.VERTEX_TEMPERATURE ?? 0.2)
const DEFAULT_MODEL = process.env.VERTEX_MODEL ?? 'gemini-2.5-flash'
const DEFAULT_FALLBACK_MODELS = parseCsv(process.env.VERTEX_FALLBACK_MODELS ?? '')
const DEFAULT_LOCATION = process.env.VERTEX_LOCATION ?? 'us-central1'
const VERTEX_SCOPE = 'https://www.googleapis.com/auth/cloud-platform'
const GENERATIVE_LANGUAGE_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta'

const auth = new GoogleAuth({
  scopes: [VERTEX_SCOPE]
})

let vertexTransport: VertexTransport = defaultVertexTransport

const setVertexTransport = (transport: VertexTransport): void => {
  vertexTransport = transport
}

async function defaultVertexTransport(
  request: VertexRequest,
  signal: AbortSignal
): Promise<unknown> {
  const target = await resolveEndpoint(request.model)

  let response: Response
  try {
    response = await fetch(target.url, {
      method: 'POST',
      headers: {
        ...target.headers,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        contents: [
          {
            role: 'user',
            parts: [{ text: request.prompt }]
          }
        ],
        generationConfig: {
          temperature: request.temperature,
          responseMimeType: 'application/json'
        }
      }),
      signal
    })
  } catch (error) {
    if (signal.aborted) throw error
    throw new LlmError('UPSTREAM', `generateContent request failed: ${toErrorMessage(error)}`)
  }

  const payload = await readJson(response)

  if (!response.ok) {
    throw toHttpError(response.status, extractErrorMessage(payload))
  }

  const text = extractCandidateText(payload)
  if (text.trim().length === 0) {
    throw new LlmError('MALFORMED', 'model returned empty candidate text')
  }

  const normalizedText = normalizeJsonCandidateText(text)
  try {
    return JSON.parse(normalizedText) as unknown
  } catch {
    const preview = normalizedText.replace(/\s+/g, ' ').slice(0, 280)
    throw new LlmError('MALFORMED', `model candidate is not valid JSON (preview: ${preview})`)
  }
}

const resolveEndpoint = async (
  model: string
): Promise<{ url: string; headers: Record<string, string> }> => {
  const apiKey = process.env.GEMINI_API_KEY
  if (apiKey) {
    return {
      url: `${GENERATIVE_LANGUAGE_BASE_URL}/models/${model}:generateContent`,
      headers: { 'x-goog-api-key': apiKey }
    }
  }

  const projectId = process.env.VERTEX_PROJECT_ID ?? process.env.GCP_PROJECT_ID
  if (!projectId) {
    throw new LlmError('UPSTREAM', 'GEMINI_API_KEY, VERTEX_PROJECT_ID or GCP_PROJECT_ID is required', {
      retryable: false
    })
  }

  const accessToken = await auth.getAccessToken()
  if (!accessToken) {
    throw new LlmError('UPSTREAM', 'failed to acquire Google access token for Vertex API', {
      retryable: false
    })
  }

  return {
    url: `https://${DEFAULT_LOCATION}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${DEFAULT_LOCATION}/publishers/google/models/${model}:generateContent`,
    headers: { Authorization: `Bearer ${accessToken}` }
  }
}

const runPrompt: PromptRunner = async <T>(
  prompt: string,
  schema: OutputSchema<T>,
  options: RunPromptOptions = {}
): Promise<T> => {
  if (prompt.trim().length === 0) {
    throw new Error('prompt must not be empty')
  }

  const resolved = resolveOptions(options)
  const maxAttempts = resolved.maxRetries + 1
  const modelCandidates = resolveModelCandidates(resolved.model, resolved.fallbackModels)
  const modelErrors: string[] = []
  let lastError: LlmError | null = null

  for (const model of modelCandidates) {
    const request: VertexRequest = {
      prompt,
      model,
      temperature: resolved.temperature
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const raw = await withTimeout(resolved.timeoutMs, (signal) =>
          vertexTransport(request, signal)
        )
        return applySchema(schema, raw)
      } catch (error) {
        lastError = toLlmError(error)
        if (lastError.kind === 'MODEL_UNAVAILABLE') {
          console.warn(
            JSON.stringify({
              event: 'llm_model_fallback',
              model,
              reason: lastError.message
            })
          )
          break
        }
        if (!lastError.retryable || attempt === maxAttempts) {
          break
        }
        console.warn(
          JSON.stringify({
            event: 'llm_retry',
            model,
            attempt,
            kind: lastError.kind,
            reason: lastError.message
          })
        )
        await sleep(backoffMs(resolved.retryDelayMs, attempt))
      }
    }

    modelErrors.push(`${model}: ${lastError?.message ?? 'unknown error'}`)
    if (lastError && lastError.kind !== 'MODEL_UNAVAILABLE') {
      break
    }
  }

  throw new LlmError(
    lastError?.kind ?? 'UPSTREAM',
    `runPrompt failed after ${maxAttempts} attempts (${modelCandidates.join(', ')}): ${modelErrors.join(' | ')}`,
    {
      retryable: false,
      ...(lastError?.status !== undefined ? { status: lastError.status } : {})
    }
  )
}

const resolveOptions = (
  options: RunPromptOptions
): ResolvedRunPromptOptions => ({
  timeoutMs: sanitizeInteger(options.timeoutMs, sanitizeInteger(DEFAULT_TIMEOUT_MS, 120000)),
  maxRetries: sanitizeInteger(options.maxRetries, sanitizeInteger(DEFAULT_MAX_RETRIES, 2)),
  retryDelayMs: sanitizeInteger(options.retryDelayMs, sanitizeInteger(DEFAULT_RETRY_DELAY_MS, 500)),
  temperature: sanitizeTemperature(options.temperature, sanitizeTemperature(DEFAULT_TEMPERATURE, 0.2)),
  model: options.model?.trim() || DEFAULT_MODEL,
  fallbackModels: options.fallbackModels ?? DEFAULT_FALLBACK_MODELS
})

const sanitizeInteger = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value)) return fallback
  const normalized = Math.floor(value)
  return normalized >= 0 ? normalized : fallback
}

const sanitizeTemperature = (
  value: number | undefined,
  fallback: number
): number => {
  if (value === undefined) return fallback
  if (Number.isNaN(value)) return fallback
  if (value < 0) return 0
  if (value > 1) return 1
  return value
}

const withTimeout = async <T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return await task(controller.signal)
  } catch (error) {
    if (controller.signal.aborted) {
      throw new LlmError('TIMEOUT', `runPrompt timed out after ${timeoutMs}ms`)
    }
    throw error
  } finally {
    clearTimeout(timer)
  }
}

const applySchema = <T>(schema: OutputSchema<T>, value: unknown): T => {
  try {
    if (typeof schema === 'function') {
      return schema(value)
    }
    return schema.parse(value)
  } catch (error) {
    if (isLlmError(error)) throw error
    throw new LlmError('MALFORMED', `model output rejected: ${toErrorMessage(error)}`)
  }
}

const toHttpError = (status: number, message: string): LlmError => {
  const detail = `model API ${status}: ${message}`
  if (status === 429) return new LlmError('RATE_LIMITED', detail, { status })
  if (status === 404 || status === 403) return new LlmError('MODEL_UNAVAILABLE', detail, { status })
  return new LlmError('UPSTREAM', detail, { status, retryable: status >= 500 })
}

const toLlmError = (error: unknown): LlmError => {
  if (isLlmError(error)) return error
  return new LlmError('UPSTREAM', toErrorMessage(error))
}

const sleep = async (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

const resolveModelCandidates = (primary: string, fallbacks: string[]): string[] => {
  const candidates = [primary, ...fallbacks]
  const seen = new Set<string>()
  const normalized: string[] = []
  for (const candidate of candidates) {
    const model = candidate.trim()
    if (!model || seen.has(model)) continue
    seen.add(model)
    normalized.push(model)
  }
  return normalized.length > 0 ? normalized : [DEFAULT_MODEL]
}

function parseCsv(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

const backoffMs = (baseDelayMs: number, attempt: number): number => {
  if (baseDelayMs === 0) return 0
  const cappedAttempt = Math.min(attempt, 6)
  const exponential = baseDelayMs * 2 ** (cappedAttempt - 1)
  const jitter = Math.floor(Math.random() * Math.max(1, Math.floor(baseDelayMs / 2)))
  return exponential + jitter
}

const readJson = async (response: Response): Promise<unknown> => {
  const raw = await response.text()
  if (raw.length === 0) {
    return {}
  }
  try {
    return JSON.parse(raw) as unknown
  } catch {
    return { raw }
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value)

const extractErrorMessage = (payload: unknown): string => {
  if (!isRecord(payload) || !isRecord(payload.error)) {
    return 'unknown error'
  }
  const message = payload.error.message
  if (typeof message === 'string' && message.length > 0) {
    return message
  }
  return 'unknown error'
}

const extractCandidateText = (payload: unknown): string => {
  if (!isRecord(payload)) {
    throw new LlmError('MALFORMED', 'model payload must be an object')
  }

  const candidates = payload.candidates
  if (!Array.isArray(candidates) || candidates.length === 0) {
    throw new LlmError('MALFORMED', 'model payload has no candidates')
  }

  const first: unknown = candidates[0]
  if (!isRecord(first) || !isRecord(first.content)) {
    throw new LlmError('MALFORMED', 'model candidate content is missing')
  }

  const parts = first.content.parts
  if (!Array.isArray(parts) || parts.length === 0) {
    throw new LlmError('MALFORMED', 'model candidate parts are missing')
  }

  const textParts = parts
    .map((part: unknown) => {
      if (!isRecord(part)) return ''
      return typeof part.text === 'string' ? part.text : ''
    })
    .filter((text) => text.length > 0)

  if (textParts.length === 0) {
    throw new LlmError('MALFORMED', 'model candidate text is missing')
  }

  return textParts.join('\n')
}

export const normalizeJsonCandidateText = (text: string): string => {
  const trimmed = text.trim()

  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i)
  if (fenced && fenced[1]) {
    return fenced[1].trim()
  }

  const objectStart = trimmed.indexOf('{')
  const objectEnd = trimmed.lastIndexOf('}')
  if (objectStart >= 0 && objectEnd > objectStart) {
    return trimmed.slice(objectStart, objectEnd + 1).trim()
  }

  return trimmed
}
