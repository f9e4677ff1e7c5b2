import { JsonValueSchema, isJsonObject, type JsonObject, type JsonValue } from '../../types.js'

const PLACEHOLDER_TOKENS = ['...', '…'] as const

function sliceObject(text: string): string {
  const start = text.indexOf('{')
  if (start === -1) return text
  const end = text.lastIndexOf('}')
  return end > start ? text.slice(start, end + 1) : text.slice(start)
}

/**
 * Reduce model output to the JSON object it contains. Prose before the first
 * `{` or after the last `}` is dropped. A markdown fence is only unwrapped when
 * the object does not already parse as it stands, since string values may
 * contain backticks.
 */
export function normalizeJson(raw: string): string {
  const text = raw.trim()
  const sliced = sliceObject(text)
  if (tryParseJson(sliced) !== undefined) return sliced

  const fenced = text.match(/```(?:json|JSON)?\s*([\s\S]*?)(?:```|$)/)
  return fenced ? sliceObject(fenced[1].trim()) : sliced
}

export function containsPlaceholders(text: string): boolean {
  return PLACEHOLDER_TOKENS.some(token => text.includes(token))
}

export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text)
    const result = JsonValueSchema.safeParse(parsed)
    return result.success ? result.data : undefined
  } catch {
    return undefined
  }
}

export function toJsonValue(value: unknown): JsonValue | null {
  if (value === undefined) return null
  const result = JsonValueSchema.safeParse(value)
  return result.success ? result.data : null
}

/**
 * Extraction payloads must be objects or arrays. Models sometimes send them
 * as a JSON-encoded string; decode those, drop any other primitive.
 */
export function normalizeExtraction(extraction: JsonValue | null | undefined): JsonObject | JsonValue[] | null {
  if (extraction === null || extraction === undefined) return null
  if (Array.isArray(extraction) || isJsonObject(extraction)) return extraction
  if (typeof extraction !== 'string') return null

  const parsed = tryParseJson(extraction)
  if (parsed !== undefined && (Array.isArray(parsed) || isJsonObject(parsed))) {
    return parsed
  }
  return null
}

export function asJsonObject(value: JsonValue | null | undefined): JsonObject | null {
  if (value === null || value === undefined) return null
  if (isJsonObject(value)) return value
  if (typeof value === 'string') {
    const parsed = tryParseJson(value)
    return parsed !== undefined && isJsonObject(parsed) ? parsed : null
  }
  return null
}

export function extractConfidence(extraction: JsonValue | null | undefined): number | null {
  const value = asJsonObject(extraction)?.confidence
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

export function extractRawText(extraction: JsonValue | null | undefined): string {
  const value = asJsonObject(extraction)?.extractedText
  if (value === null || value === undefined) return ''
  return typeof value === 'string' ? value : JSON.stringify(value)
}

export function readString(obj: JsonObject | null, key: string): string | null {
  const value = obj?.[key]
  return typeof value === 'string' && value.trim() !== '' ? value : null
}
