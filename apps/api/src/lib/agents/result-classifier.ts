import {
  DOCUMENT_TYPES,
  isJsonObject,
  type AgentOutput,
  type DocumentType,
  type OrchestratorResult,
  type ProcessingStep,
} from '../../types.js'
import { mergeIssues } from '../issues.js'
import { extractConfidence, extractRawText, normalizeExtraction } from './json.js'

export const ORCHESTRATOR_STAGE = 'orchestrator'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export function parseDocumentType(value: string | null | undefined): DocumentType | null {
  if (!value) return null
  const upper = value.trim().toUpperCase()
  return DOCUMENT_TYPES.find(type => type === upper) ?? null
}

function parseContactId(value: string | null | undefined): string | null {
  if (!value) return null
  const trimmed = value.trim()
  return UUID_PATTERN.test(trimmed) ? trimmed.toLowerCase() : null
}

/**
 * Id of the latest example the model reported as found.
 */
export function findExampleUsed(steps: readonly ProcessingStep[]): string | null {
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i]
    if ((step.tool ?? step.action) !== 'find_similar_example') continue
    if (isJsonObject(step.output) && step.output.found === true && typeof step.output.exampleId === 'string') {
      return step.output.exampleId
    }
  }
  return null
}

/**
 * Map a resolved output onto the terminal result. `extraIssues` are
 * non-critical tool failures; they only surface on review results.
 */
export function classifyResult(
  output: AgentOutput,
  auditTrail: readonly ProcessingStep[],
  extraIssues: readonly string[] = []
): OrchestratorResult {
  const status = output.status.trim().toLowerCase()
  const documentType = parseDocumentType(output.documentType)
  const extraction = normalizeExtraction(output.extraction)
  const issues = output.issues ?? []

  switch (status) {
    case 'success': {
      if (documentType === null || extraction === null) {
        return {
          kind: 'failed',
          reason: 'Missing documentType or extraction in orchestrator output',
          stage: ORCHESTRATOR_STAGE,
          auditTrail,
        }
      }
      return {
        kind: 'success',
        documentType,
        extraction,
        confidence: output.confidence ?? extractConfidence(extraction) ?? 0,
        rawText: output.rawText ?? extractRawText(extraction),
        description: output.description ?? '',
        keywords: output.keywords ?? [],
        validationPassed: output.validationPassed ?? issues.length === 0,
        correctionsApplied: output.correctionsApplied ?? 0,
        exampleUsed: findExampleUsed(auditTrail),
        contactId: parseContactId(output.contactId),
        contactCreated: output.contactCreated ?? false,
        auditTrail,
      }
    }
    case 'needs_review':
      return {
        kind: 'needs_review',
        documentType,
        partialExtraction: extraction,
        reason: output.reason ?? 'Needs review',
        issues: mergeIssues(issues, extraIssues),
        auditTrail,
      }
    case 'failed':
      return {
        kind: 'failed',
        reason: output.reason ?? 'Orchestrator reported failure',
        stage: ORCHESTRATOR_STAGE,
        auditTrail,
      }
    default:
      return {
        kind: 'failed',
        reason: `Unknown orchestrator status: ${output.status}`,
        stage: ORCHESTRATOR_STAGE,
        auditTrail,
      }
  }
}
