import { describe, it, expect, vi } from 'vitest'
import {
  buildFallbackFromTrace,
  findContactFromTrace,
  mergeWithFallback,
  parseLenient,
  parseStrict,
  resolveAgentOutput,
  type RepairFn,
} from '../output-resolution.js'
import { TraceCollector } from '../trace.js'
import { CONTACT_ID, invoiceExtraction } from './helpers.js'

function cleanOutput(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    status: 'success',
    documentType: 'INVOICE',
    extraction: invoiceExtraction(),
    description: 'Acme Supplies BV - Invoice - 1234.56 EUR',
    keywords: ['acme', 'invoice'],
    confidence: 0.92,
    issues: [],
    ...overrides,
  })
}

function setup(repairImpl?: RepairFn) {
  const trace = new TraceCollector()
  const repair = vi.fn<RepairFn>(repairImpl ?? (async () => 'not json'))
  return { trace, repair }
}

function recordExtraction(trace: TraceCollector, tool = 'extract_invoice') {
  trace.record({ action: tool, tool, durationMs: 800, output: invoiceExtraction() })
}

describe('parseStrict', () => {
  it('accepts a well-formed output', () => {
    expect(parseStrict(cleanOutput())?.confidence).toBe(0.92)
  })

  it('rejects wrongly typed fields', () => {
    expect(parseStrict('{"status":"success","confidence":"0.9"}')).toBeNull()
  })

  it('requires a status', () => {
    expect(parseStrict('{"documentType":"INVOICE"}')).toBeNull()
  })
})

describe('parseLenient', () => {
  it('coerces strings into numbers, booleans and lists', () => {
    const output = parseLenient(JSON.stringify({
      status: 'success',
      documentType: 'INVOICE',
      extraction: { a: 1 },
      confidence: '0.9',
      keywords: 'acme, invoice, ',
      validationPassed: 'TRUE',
      correctionsApplied: '2',
      contactCreated: 'maybe',
    }))

    expect(output).toMatchObject({
      status: 'success',
      confidence: 0.9,
      keywords: ['acme', 'invoice'],
      validationPassed: true,
      correctionsApplied: 2,
      contactCreated: null,
    })
  })

  it('needs a status and an object', () => {
    expect(parseLenient('{"documentType":"INVOICE"}')).toBeNull()
    expect(parseLenient('["success"]')).toBeNull()
  })
})

describe('findContactFromTrace', () => {
  it('prefers an explicit link from store_extraction', () => {
    const trace = new TraceCollector()
    trace.record({ action: 'lookup_contact', tool: 'lookup_contact', durationMs: 1, output: { found: true, matchType: 'EXACT', contactId: 'lookup-id' } })
    trace.record({ action: 'store_extraction', tool: 'store_extraction', durationMs: 1, output: { success: false, linkedContactId: CONTACT_ID } })

    expect(findContactFromTrace(trace.snapshot())).toEqual({
      contactId: CONTACT_ID,
      source: 'store_extraction',
      evidence: { vatValid: true, vatMatched: true, ambiguityCount: 1 },
    })
  })

  it('never uses a suggested contact', () => {
    const trace = new TraceCollector()
    trace.record({ action: 'store_extraction', tool: 'store_extraction', durationMs: 1, output: { success: false, suggestedContactId: CONTACT_ID } })

    expect(findContactFromTrace(trace.snapshot())).toBeNull()
  })

  it('falls back to an exact VAT lookup', () => {
    const trace = new TraceCollector()
    trace.record({ action: 'lookup_contact', tool: 'lookup_contact', durationMs: 1, output: { found: true, matchType: 'EXACT', contactId: CONTACT_ID, vatValid: true } })

    expect(findContactFromTrace(trace.snapshot())?.source).toBe('lookup_contact')
  })

  it('ignores partial lookups', () => {
    const trace = new TraceCollector()
    trace.record({ action: 'lookup_contact', tool: 'lookup_contact', durationMs: 1, output: { found: true, matchType: 'PARTIAL', contactId: CONTACT_ID } })

    expect(findContactFromTrace(trace.snapshot())).toBeNull()
  })
})

describe('buildFallbackFromTrace', () => {
  it('returns null without an extraction step', () => {
    const trace = new TraceCollector()
    trace.record({ action: 'classify_document', tool: 'classify_document', durationMs: 1, output: { documentType: 'INVOICE' } })

    expect(buildFallbackFromTrace(trace.snapshot())).toBeNull()
  })

  it('uses the latest extraction step that produced output', () => {
    const trace = new TraceCollector()
    recordExtraction(trace, 'extract_bill')
    trace.record({ action: 'extract_invoice', tool: 'extract_invoice', durationMs: 1, notes: 'error: timeout' })

    const fallback = buildFallbackFromTrace(trace.snapshot())
    expect(fallback?.sourceTool).toBe('extract_bill')
    expect(fallback?.output).toMatchObject({
      status: 'needs_review',
      documentType: 'BILL',
      confidence: 0.88,
      rawText: 'Acme Supplies BV Invoice INV-2024-001 Total 1234.56 EUR',
      validationPassed: false,
      reason: 'Orchestrator output parse failed (fallback source: extract_bill)',
      issues: [
        'Orchestrator output parse failed; persisted extraction output',
        'Fallback source tool: extract_bill',
      ],
    })
  })
})

describe('mergeWithFallback', () => {
  it('keeps the fallback skeleton and the parsed non-null fields', () => {
    const trace = new TraceCollector()
    recordExtraction(trace)
    const fallback = buildFallbackFromTrace(trace.snapshot())
    if (!fallback) throw new Error('expected a fallback')

    const merged = mergeWithFallback(fallback.output, {
      status: 'success',
      description: 'Parsed description',
      keywords: null,
      confidence: 0.5,
      issues: ['Fallback source tool: extract_invoice', 'VAT number unreadable'],
    })

    expect(merged.status).toBe('needs_review')
    expect(merged.documentType).toBe('INVOICE')
    expect(merged.description).toBe('Parsed description')
    expect(merged.keywords).toEqual([])
    expect(merged.confidence).toBe(0.5)
    expect(merged.issues).toEqual([
      'Orchestrator output parse failed; persisted extraction output',
      'Fallback source tool: extract_invoice',
      'VAT number unreadable',
    ])
  })
})

describe('resolveAgentOutput', () => {
  it('resolves clean output strictly without repair', async () => {
    const { trace, repair } = setup()
    const resolved = await resolveAgentOutput(cleanOutput(), { trace, repair })

    expect(resolved?.source).toBe('strict')
    expect(resolved?.output.confidence).toBe(0.92)
    expect(repair).not.toHaveBeenCalled()
    expect(trace.size).toBe(0)
  })

  it('resolves fenced output with surrounding prose', async () => {
    const { trace, repair } = setup()
    const resolved = await resolveAgentOutput(`Done.\n\`\`\`json\n${cleanOutput()}\n\`\`\``, { trace, repair })

    expect(resolved?.source).toBe('strict')
  })

  it('resolves clean output containing backticks without repair', async () => {
    const { trace, repair } = setup()
    const extraction = { ...invoiceExtraction(), extractedText: 'Ref ```A1``` total 10' }

    const inline = await resolveAgentOutput(cleanOutput({ extraction }), { trace, repair })
    const trailingFence = await resolveAgentOutput(`${cleanOutput()}\n\`\`\``, { trace, repair })

    expect(inline?.source).toBe('strict')
    expect(inline?.output.extraction).toEqual(extraction)
    expect(trailingFence?.source).toBe('strict')
    expect(repair).not.toHaveBeenCalled()
    expect(trace.size).toBe(0)
  })

  it('falls back to the lenient parser', async () => {
    const { trace, repair } = setup()
    const resolved = await resolveAgentOutput(cleanOutput({ confidence: '0.92' }), { trace, repair })

    expect(resolved?.source).toBe('lenient')
    expect(resolved?.output.confidence).toBe(0.92)
    expect(repair).not.toHaveBeenCalled()
  })

  it('sends placeholder output to repair once and uses the repaired data', async () => {
    const repairedExtraction = { ...invoiceExtraction(), totalAmount: '1234.56' }
    const { trace, repair } = setup(async () => cleanOutput({ extraction: repairedExtraction, confidence: 0.8 }))
    const raw = cleanOutput({ extraction: { ...invoiceExtraction(), totalAmount: '1234.56...' } })

    const resolved = await resolveAgentOutput(raw, { trace, repair })

    expect(repair).toHaveBeenCalledTimes(1)
    expect(repair).toHaveBeenCalledWith(raw)
    expect(resolved?.source).toBe('repair')
    expect(resolved?.output.confidence).toBe(0.8)
    expect(trace.snapshot().map(step => [step.action, step.notes])).toEqual([
      ['orchestrator_output_invalid', 'attempting_repair'],
      ['orchestrator_output_repair', 'repaired (strict)'],
    ])
  })

  it('rejects repaired output that still has placeholders', async () => {
    const { trace, repair } = setup(async () => cleanOutput({ description: 'Acme…' }))
    const resolved = await resolveAgentOutput('{"status":"success","description":"..."}', { trace, repair })

    expect(resolved).toBeNull()
    expect(trace.snapshot()[1].notes).toBe('repair_output_has_placeholders')
  })

  it('records a failed repair and yields nothing without a fallback', async () => {
    const { trace, repair } = setup(async () => {
      throw new Error('upstream timeout')
    })
    const resolved = await resolveAgentOutput('{"status": "succ', { trace, repair })

    expect(resolved).toBeNull()
    expect(trace.snapshot()[1].notes).toBe('repair_failed: upstream timeout')
  })

  it('reconstructs from the trace when every parse fails', async () => {
    const { trace, repair } = setup()
    recordExtraction(trace)

    const resolved = await resolveAgentOutput('garbage', { trace, repair })

    expect(resolved?.source).toBe('trace_fallback')
    expect(resolved?.output.documentType).toBe('INVOICE')
    expect(resolved?.output.extraction).toEqual(invoiceExtraction())
    const last = trace.snapshot()[trace.size - 1]
    expect(last.action).toBe('orchestrator_output_parse_failed')
    expect(last.notes).toBe('using_extraction_trace_fallback, sourceTool=extract_invoice')
  })

  it('merges an incomplete parse with the trace fallback', async () => {
    const { trace, repair } = setup()
    recordExtraction(trace)
    trace.record({ action: 'lookup_contact', tool: 'lookup_contact', durationMs: 1, output: { found: true, matchType: 'EXACT', contactId: CONTACT_ID, vatValid: true } })

    const resolved = await resolveAgentOutput(cleanOutput({ extraction: null, issues: ['Could not read VAT'] }), { trace, repair })

    expect(resolved?.source).toBe('merged')
    expect(resolved?.output.status).toBe('needs_review')
    expect(resolved?.output.description).toBe('Acme Supplies BV - Invoice - 1234.56 EUR')
    expect(resolved?.output.contactId).toBe(CONTACT_ID)
    expect(resolved?.recoveredContact?.contactId).toBe(CONTACT_ID)
    expect(resolved?.output.issues).toContain('Could not read VAT')
    const last = trace.snapshot()[trace.size - 1]
    expect(last.action).toBe('orchestrator_output_incomplete')
    expect(last.notes).toBe('missingDocumentType=false, missingExtraction=true')
  })

  it('keeps an incomplete parse when the trace has no extraction', async () => {
    const { trace, repair } = setup()
    const resolved = await resolveAgentOutput(cleanOutput({ extraction: null }), { trace, repair })

    expect(resolved?.source).toBe('incomplete')
    expect(resolved?.output.extraction).toBeNull()
    expect(trace.size).toBe(0)
  })
})
