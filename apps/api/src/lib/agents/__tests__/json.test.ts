import { describe, it, expect } from 'vitest'
import {
  containsPlaceholders,
  extractConfidence,
  extractRawText,
  normalizeExtraction,
  normalizeJson,
  toJsonValue,
} from '../json.js'

describe('normalizeJson', () => {
  it('strips markdown fences', () => {
    expect(normalizeJson('```json\n{"status":"success"}\n```')).toBe('{"status":"success"}')
  })

  it('strips prose around the object', () => {
    expect(normalizeJson('Here is the result: {"a":{"b":1}} Let me know.')).toBe('{"a":{"b":1}}')
  })

  it('keeps a truncated object from its first brace', () => {
    expect(normalizeJson('Result: {"a": {"b"')).toBe('{"a": {"b"')
  })

  it('returns text without braces unchanged', () => {
    expect(normalizeJson('  no json here ')).toBe('no json here')
  })

  it('keeps an unfenced object whose strings contain backticks', () => {
    const raw = JSON.stringify({ status: 'success', extraction: { extractedText: 'Ref ```A1``` total 10' } })
    expect(normalizeJson(raw)).toBe(raw)
  })

  it('ignores a stray closing fence after the object', () => {
    expect(normalizeJson('{"status":"success"}\n```')).toBe('{"status":"success"}')
  })

  it('unwraps a fence when prose before it holds braces', () => {
    expect(normalizeJson('Filled {all} fields:\n```json\n{"status":"success"}\n```')).toBe('{"status":"success"}')
  })
})

describe('containsPlaceholders', () => {
  it('detects both ellipsis forms', () => {
    expect(containsPlaceholders('{"totalAmount":"1234.56..."}')).toBe(true)
    expect(containsPlaceholders('{"vendorName":"Acme…"}')).toBe(true)
    expect(containsPlaceholders('{"totalAmount":"1234.56"}')).toBe(false)
  })
})

describe('normalizeExtraction', () => {
  it('passes objects and arrays through', () => {
    expect(normalizeExtraction({ a: 1 })).toEqual({ a: 1 })
    expect(normalizeExtraction([1, 2])).toEqual([1, 2])
  })

  it('decodes JSON-encoded strings', () => {
    expect(normalizeExtraction('{"invoiceNumber":"INV-1"}')).toEqual({ invoiceNumber: 'INV-1' })
  })

  it('drops other primitives', () => {
    expect(normalizeExtraction(42)).toBeNull()
    expect(normalizeExtraction('not json')).toBeNull()
    expect(normalizeExtraction(undefined)).toBeNull()
  })
})

describe('extraction fields', () => {
  it('reads numeric and string confidence', () => {
    expect(extractConfidence({ confidence: 0.8 })).toBe(0.8)
    expect(extractConfidence({ confidence: '0.75' })).toBe(0.75)
    expect(extractConfidence({ confidence: 'high' })).toBeNull()
    expect(extractConfidence(null)).toBeNull()
  })

  it('reads extracted text', () => {
    expect(extractRawText({ extractedText: 'Invoice 42' })).toBe('Invoice 42')
    expect(extractRawText({ extractedText: ['a'] })).toBe('["a"]')
    expect(extractRawText({})).toBe('')
  })
})

describe('toJsonValue', () => {
  it('maps undefined to null and keeps JSON values', () => {
    expect(toJsonValue(undefined)).toBeNull()
    expect(toJsonValue({ a: [1, 'b', null] })).toEqual({ a: [1, 'b', null] })
  })
})
