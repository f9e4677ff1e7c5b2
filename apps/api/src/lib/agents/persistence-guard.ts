/**
 * Persistence guard - a resolved extraction is stored exactly once per run.
 *
 * When the model never called store_extraction, or the call failed, the guard
 * replays a synthesized store call from the resolved output.
 */

import type { AgentOutput, ContactLinkPolicy, LinkDecision, ProcessRequest } from '../../types.js'
import { decideContactLink } from './contact-link-policy.js'
import { extractConfidence, extractRawText, normalizeExtraction } from './json.js'
import type { RecoveredContact } from './output-resolution.js'
import type { TraceCollector } from './trace.js'
import type { StoreExtractionHandler, StoreState } from './tools/types.js'

export const RECOVERED_CONTACT_REASON = 'Recovered from trace: VAT lookup exact match (fallback)'

export interface PersistenceGuardInput {
  request: ProcessRequest
  output: AgentOutput
  recoveredContact: RecoveredContact | null
  storeState: StoreState
  linkPolicy: ContactLinkPolicy
  storeExtraction: StoreExtractionHandler
  trace: TraceCollector
}

export type PersistenceOutcome =
  | { kind: 'already_persisted' }
  | { kind: 'nothing_to_persist' }
  | { kind: 'persisted' }
  | { kind: 'failed'; error: string | null }

function recoveredLinkDecision(policy: ContactLinkPolicy, recovered: RecoveredContact): LinkDecision {
  const decision = decideContactLink(policy, recovered, RECOVERED_CONTACT_REASON)
  return decision.type === 'AUTO_LINK' ? { ...decision, confidence: 1.0 } : decision
}

export async function ensureExtractionPersisted(input: PersistenceGuardInput): Promise<PersistenceOutcome> {
  const { request, output, storeState, trace } = input
  if (storeState.called && storeState.succeeded) {
    return { kind: 'already_persisted' }
  }

  const documentType = output.documentType?.trim().toUpperCase()
  const extraction = normalizeExtraction(output.extraction)
  if (!documentType || extraction === null) {
    return { kind: 'nothing_to_persist' }
  }

  trace.record({
    action: 'fallback_store_extraction',
    tool: 'store_extraction',
    durationMs: 0,
    notes: `storeCalled=${storeState.called}, storeSucceeded=${storeState.succeeded}`,
  })
  console.warn(`[PERSISTENCE] Agent did not persist ${request.documentId}, storing from resolved output`)

  const linkDecision = input.recoveredContact
    ? recoveredLinkDecision(input.linkPolicy, input.recoveredContact)
    : null
  const contactId = linkDecision?.type === 'SUGGEST' ? null : output.contactId ?? null

  const startTime = Date.now()
  let success = false
  let error: string | null = null
  try {
    success = await input.storeExtraction({
      documentId: request.documentId,
      tenantId: request.tenantId,
      runId: request.runId ?? null,
      documentType,
      extraction,
      description: output.description ?? '',
      keywords: output.keywords ?? [],
      confidence: output.confidence ?? extractConfidence(extraction) ?? 0,
      rawText: output.rawText ?? extractRawText(extraction),
      contactId,
      contactCreated: output.contactCreated ?? null,
      linkDecision,
    })
  } catch (err) {
    error = err instanceof Error ? err.message : String(err)
    console.error(`[PERSISTENCE] Fallback store failed for ${request.documentId}:`, err)
  }

  trace.record({
    action: 'fallback_store_extraction_result',
    tool: 'store_extraction',
    durationMs: Date.now() - startTime,
    notes: error ? `success=false, error=${error}` : `success=${success}`,
  })

  return success ? { kind: 'persisted' } : { kind: 'failed', error }
}
