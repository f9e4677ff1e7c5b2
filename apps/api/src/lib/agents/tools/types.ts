import type Anthropic from '@anthropic-ai/sdk'
import type { z } from 'zod'
import type {
  ContactLinkPolicy,
  JsonValue,
  LinkDecision,
  ProcessRequest,
} from '../../../types.js'
import type { DocumentImage, VisionClient } from '../vision.js'

// ============================================
// COLLABORATOR SEAMS
// ============================================

export interface DocumentContent {
  bytes: Uint8Array
  mimeType: string
  fileName?: string | null
}

export interface ContactInfo {
  id: string
  name: string
  vatNumber?: string | null
  iban?: string | null
  address?: string | null
}

export interface CreateContactResult {
  success: boolean
  contactId?: string | null
  error?: string | null
}

export interface StoreExtractionPayload {
  documentId: string
  tenantId: string
  runId: string | null
  documentType: string
  extraction: JsonValue
  description: string
  keywords: string[]
  confidence: number
  rawText: string
  contactId: string | null
  contactCreated: boolean | null
  linkDecision: LinkDecision | null
}

export interface LegalEntity {
  vatNumber: string
  name: string
  address?: string | null
  active?: boolean | null
}

export type IndexingStatus = 'SUCCEEDED' | 'FAILED'

export interface ExampleInfo {
  id: string
  documentType: string
  extraction: JsonValue
}

export interface ExampleRecord {
  tenantId: string
  documentId: string
  documentType: string
  vendorVatNumber: string
  extraction: JsonValue
}

export type DocumentFetcher = (documentId: string, tenantId: string) => Promise<DocumentContent>
export type PeppolDataFetcher = (documentId: string) => Promise<JsonValue | null>
export type ContactLookupHandler = (tenantId: string, vatNumber: string) => Promise<ContactInfo | null>
export type ContactCreatorHandler = (
  tenantId: string,
  name: string,
  vatNumber?: string | null,
  address?: string | null
) => Promise<CreateContactResult>
export type StoreExtractionHandler = (payload: StoreExtractionPayload) => Promise<boolean>
export type LegalEntityLookup = (vatNumber: string) => Promise<LegalEntity | null>
// Splits and stores the text; returns the number of chunks written
export type ChunkStore = (documentId: string, tenantId: string, text: string) => Promise<number>
export type IndexingStatusUpdater = (
  runId: string,
  status: IndexingStatus,
  chunksCount: number | null,
  errorMessage: string | null
) => Promise<void>
export type ExampleFinder = (tenantId: string, vatNumber: string) => Promise<ExampleInfo | null>
export type ExampleIndexer = (example: ExampleRecord) => Promise<void>

/**
 * Everything the orchestrator reaches outside itself. Optional seams switch
 * their tool off when absent.
 */
export interface ToolCollaborators {
  fetchDocument: DocumentFetcher
  storeExtraction: StoreExtractionHandler
  fetchPeppolData?: PeppolDataFetcher
  lookupContact?: ContactLookupHandler
  createContact?: ContactCreatorHandler
  lookupLegalEntity?: LegalEntityLookup
  storeChunks?: ChunkStore
  updateIndexingStatus?: IndexingStatusUpdater
  findSimilarExample?: ExampleFinder
  indexExample?: ExampleIndexer
}

// ============================================
// TOOL PLUMBING
// ============================================

export interface ToolOutcome {
  output: JsonValue
  notes?: string | null
  // Error outcomes go back to the model but leave no output in the trace
  failed?: boolean
  // Non-critical failures to surface as review issues
  issues?: string[]
}

export interface StoreState {
  called: boolean
  succeeded: boolean
}

/**
 * Per-run state shared by all tools of one registry.
 */
export interface ToolContext {
  request: ProcessRequest
  linkPolicy: ContactLinkPolicy
  vision: VisionClient
  collaborators: ToolCollaborators
  loadDocument(): Promise<DocumentImage>
}

export interface RegisteredTool {
  definition: Anthropic.Tool
  invoke(input: unknown): Promise<ToolOutcome>
}

export interface ToolSpec<TSchema extends z.ZodTypeAny> {
  name: string
  description: string
  inputSchema: Anthropic.Tool.InputSchema
  input: TSchema
  execute(input: z.infer<TSchema>): Promise<ToolOutcome>
}

export function errorOutcome(message: string): ToolOutcome {
  return { output: { status: 'error', message }, notes: message, failed: true }
}

export function defineTool<TSchema extends z.ZodTypeAny>(spec: ToolSpec<TSchema>): RegisteredTool {
  return {
    definition: {
      name: spec.name,
      description: spec.description,
      input_schema: spec.inputSchema,
    },
    async invoke(input) {
      const parsed = spec.input.safeParse(input ?? {})
      if (!parsed.success) {
        const details = parsed.error.issues
          .map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`)
          .join('; ')
        return errorOutcome(`Invalid input for ${spec.name}: ${details}`)
      }
      return spec.execute(parsed.data)
    },
  }
}
