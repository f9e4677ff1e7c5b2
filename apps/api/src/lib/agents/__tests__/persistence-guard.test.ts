import { describe, it, expect, vi } from 'vitest'
import { RECOVERED_CONTACT_REASON, ensureExtractionPersisted, type PersistenceGuardInput } from '../persistence-guard.js'
import { TraceCollector } from '../trace.js'
import type { StoreExtractionHandler, StoreExtractionPayload } from '../tools/types.js'
import type { AgentOutput } from '../../../types.js'
import { CONTACT_ID, invoiceExtraction, testRequest } from './helpers.js'

function guardInput(overrides: Partial<PersistenceGuardInput> = {}) {
  const stored: StoreExtractionPayload[] = []
  const storeExtraction = vi.fn<StoreExtractionHandler>(async (payload) => {
    stored.push(payload)
    return true
  })
  const trace = new TraceCollector()
  const output: AgentOutput = {
    status: 'success',
    documentType: 'invoice',
    extraction: invoiceExtraction(),
    confidence: 0.9,
    contactId: CONTACT_ID,
  }
  const input: PersistenceGuardInput = {
    request: testRequest,
    output,
    recoveredContact: null,
    storeState: { called: false, succeeded: false },
    linkPolicy: 'VAT_ONLY',
    storeExtraction,
    trace,
    ...overrides,
  }
  return { input, stored, storeExtraction, trace: input.trace }
}

describe('ensureExtractionPersisted', () => {
  it('does nothing when the agent already stored the extraction', async () => {
    const { input, storeExtraction, trace } = guardInput({ storeState: { called: true, succeeded: true } })

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'already_persisted' })
    expect(storeExtraction).not.toHaveBeenCalled()
    expect(trace.size).toBe(0)
  })

  it('does nothing without a document type', async () => {
    const { input, storeExtraction } = guardInput({
      output: { status: 'needs_review', extraction: invoiceExtraction() },
    })

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'nothing_to_persist' })
    expect(storeExtraction).not.toHaveBeenCalled()
  })

  it('stores the resolved output when the agent never called the store', async () => {
    const { input, stored, trace } = guardInput()

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'persisted' })
    expect(stored).toEqual([{
      documentId: 'doc-1',
      tenantId: 'tenant-1',
      runId: 'run-1',
      documentType: 'INVOICE',
      extraction: invoiceExtraction(),
      description: '',
      keywords: [],
      confidence: 0.9,
      rawText: 'Acme Supplies BV Invoice INV-2024-001 Total 1234.56 EUR',
      contactId: CONTACT_ID,
      contactCreated: null,
      linkDecision: null,
    }])
    expect(trace.snapshot().map(step => [step.action, step.notes])).toEqual([
      ['fallback_store_extraction', 'storeCalled=false, storeSucceeded=false'],
      ['fallback_store_extraction_result', 'success=true'],
    ])
  })

  it('retries after a failed agent store', async () => {
    const { input, trace } = guardInput({ storeState: { called: true, succeeded: false } })

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'persisted' })
    expect(trace.snapshot()[0].notes).toBe('storeCalled=true, storeSucceeded=false')
  })

  it('auto-links a recovered exact VAT match', async () => {
    const evidence = { vatValid: true, vatMatched: true, ambiguityCount: 1 }
    const { input, stored } = guardInput({
      recoveredContact: { contactId: CONTACT_ID, source: 'store_extraction', evidence },
    })

    await ensureExtractionPersisted(input)

    expect(stored[0].contactId).toBe(CONTACT_ID)
    expect(stored[0].linkDecision).toEqual({
      type: 'AUTO_LINK',
      contactId: CONTACT_ID,
      reason: RECOVERED_CONTACT_REASON,
      confidence: 1.0,
      evidence,
    })
  })

  it('only suggests a recovered contact without VAT evidence', async () => {
    const { input, stored } = guardInput({
      recoveredContact: { contactId: CONTACT_ID, source: 'lookup_contact', evidence: { vatValid: false, vatMatched: true, ambiguityCount: 1 } },
    })

    await ensureExtractionPersisted(input)

    expect(stored[0].contactId).toBeNull()
    expect(stored[0].linkDecision).toMatchObject({ type: 'SUGGEST', contactId: CONTACT_ID, confidence: null })
  })

  it('reports a store that returns false', async () => {
    const { input, storeExtraction, trace } = guardInput()
    storeExtraction.mockResolvedValueOnce(false)

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'failed', error: null })
    expect(trace.snapshot()[1].notes).toBe('success=false')
  })

  it('reports a store that throws', async () => {
    const { input, storeExtraction, trace } = guardInput()
    storeExtraction.mockRejectedValueOnce(new Error('db offline'))

    expect(await ensureExtractionPersisted(input)).toEqual({ kind: 'failed', error: 'db offline' })
    expect(trace.snapshot()[1].notes).toBe('success=false, error=db offline')
  })
})
