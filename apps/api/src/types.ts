import { z } from 'zod'

// Document types the orchestrator can classify and persist
export const DOCUMENT_TYPES = [
  'INVOICE', 'BILL', 'RECEIPT', 'EXPENSE', 'CREDIT_NOTE', 'PRO_FORMA', 'UNKNOWN',
] as const
export type DocumentType = (typeof DOCUMENT_TYPES)[number]

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
)

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// ============================================
// AGENT OUTPUT (wire contract with the orchestrator model)
// ============================================

export const AGENT_STATUSES = ['success', 'needs_review', 'failed'] as const

export const AgentOutputSchema = z.object({
  status: z.string(),
  documentType: z.string().nullish(),
  extraction: JsonValueSchema.nullish(),
  rawText: z.string().nullish(),
  description: z.string().nullish(),
  keywords: z.array(z.string()).nullish(),
  confidence: z.number().nullish(),
  validationPassed: z.boolean().nullish(),
  correctionsApplied: z.number().int().nullish(),
  contactId: z.string().nullish(),
  contactCreated: z.boolean().nullish(),
  issues: z.array(z.string()).nullish(),
  reason: z.string().nullish(),
})

export type AgentOutput = z.infer<typeof AgentOutputSchema>

// ============================================
// TRACE
// ============================================

export interface ProcessingStep {
  readonly step: number
  readonly action: string
  readonly tool: string | null
  readonly durationMs: number
  readonly input: JsonValue | null
  readonly output: JsonValue | null
  readonly notes: string | null
  readonly timestamp: string
}

// ============================================
// CONTACT LINKING
// ============================================

export const LINK_DECISION_TYPES = ['AUTO_LINK', 'SUGGEST', 'NONE'] as const
export type LinkDecisionType = (typeof LINK_DECISION_TYPES)[number]

export const CONTACT_LINK_POLICIES = ['VAT_ONLY', 'VAT_OR_STRONG_SIGNALS'] as const
export type ContactLinkPolicy = (typeof CONTACT_LINK_POLICIES)[number]

export const ContactEvidenceSchema = z.object({
  vatValid: z.boolean().nullish(),
  vatMatched: z.boolean().nullish(),
  cbeExists: z.boolean().nullish(),
  ibanMatched: z.boolean().nullish(),
  nameSimilarity: z.number().min(0).max(1).nullish(),
  addressMatched: z.boolean().nullish(),
  ambiguityCount: z.number().int().min(0).nullish(),
})
export type ContactEvidence = z.infer<typeof ContactEvidenceSchema>

export interface LinkDecision {
  type: LinkDecisionType
  contactId: string | null
  reason: string
  confidence: number | null  // only meaningful for SUGGEST
  evidence: ContactEvidence | null
}

// ============================================
// RUN INPUT / RESULT
// ============================================

export const AUTONOMY_MODES = ['assisted', 'autonomous', 'sovereign'] as const
export type AutonomyMode = (typeof AUTONOMY_MODES)[number]

export interface TenantContext {
  vatNumber?: string | null
  companyName?: string | null
}

export interface ProcessRequest {
  documentId: string
  tenantId: string
  tenantContext: TenantContext
  runId?: string | null
  maxPages?: number | null
  dpi?: number | null
}

export type OrchestratorResult =
  | {
      kind: 'success'
      documentType: DocumentType
      extraction: JsonValue
      confidence: number
      rawText: string
      description: string
      keywords: string[]
      validationPassed: boolean
      correctionsApplied: number
      exampleUsed: string | null
      contactId: string | null
      contactCreated: boolean
      auditTrail: readonly ProcessingStep[]
    }
  | {
      kind: 'needs_review'
      documentType: DocumentType | null
      partialExtraction: JsonValue | null
      reason: string
      issues: string[]
      auditTrail: readonly ProcessingStep[]
    }
  | {
      kind: 'failed'
      reason: string
      stage: string
      auditTrail: readonly ProcessingStep[]
    }

export type SuccessResult = Extract<OrchestratorResult, { kind: 'success' }>
export type NeedsReviewResult = Extract<OrchestratorResult, { kind: 'needs_review' }>
export type FailedResult = Extract<OrchestratorResult, { kind: 'failed' }>
