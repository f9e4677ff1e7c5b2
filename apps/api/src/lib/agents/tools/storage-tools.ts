import { z } from 'zod'
import {
  ContactEvidenceSchema,
  JsonValueSchema,
  LINK_DECISION_TYPES,
  type JsonObject,
  type LinkDecision,
} from '../../../types.js'
import { formatIssue } from '../../issues.js'
import { decideContactLink } from '../contact-link-policy.js'
import { extractConfidence, extractRawText, normalizeExtraction } from '../json.js'
import { defineTool, errorOutcome, type RegisteredTool, type ToolContext, type ToolOutcome } from './types.js'

const StoreExtractionInput = z.object({
  documentType: z.string().min(1),
  extraction: JsonValueSchema,
  description: z.string().nullish(),
  keywords: z.array(z.string()).nullish(),
  confidence: z.number().min(0).max(1).nullish(),
  rawText: z.string().nullish(),
  contactId: z.string().nullish(),
  contactCreated: z.boolean().nullish(),
  linkDecisionType: z.enum(LINK_DECISION_TYPES).nullish(),
  linkDecisionReason: z.string().nullish(),
  linkDecisionConfidence: z.number().min(0).max(1).nullish(),
  linkEvidence: ContactEvidenceSchema.nullish(),
})

type StoreExtractionInput = z.infer<typeof StoreExtractionInput>

/**
 * Turn the model's link fields into a decision. AUTO_LINK is re-derived
 * against the configured policy; without qualifying evidence it becomes SUGGEST.
 */
export function resolveLinkDecision(ctx: ToolContext, input: StoreExtractionInput): LinkDecision | null {
  const type = input.linkDecisionType
  if (!type) return null

  const reason = input.linkDecisionReason ?? 'No reason given'
  const evidence = input.linkEvidence ?? null
  const contactId = input.contactId ?? null

  if (type === 'NONE') {
    return { type: 'NONE', contactId: null, reason, confidence: null, evidence }
  }
  if (type === 'SUGGEST') {
    return contactId
      ? { type: 'SUGGEST', contactId, reason, confidence: input.linkDecisionConfidence ?? null, evidence }
      : { type: 'NONE', contactId: null, reason, confidence: null, evidence }
  }

  const decision = decideContactLink(
    ctx.linkPolicy,
    { contactId, evidence: evidence ?? {} },
    reason,
    input.linkDecisionConfidence ?? null
  )
  if (decision.type !== 'AUTO_LINK') {
    console.warn(`[TOOLS] AUTO_LINK not allowed by ${ctx.linkPolicy}, stored as ${decision.type}`)
  }
  return { ...decision, evidence }
}

function linkOutput(decision: LinkDecision | null, contactId: string | null): JsonObject {
  if (!decision) return { linkDecision: null, contactId }
  switch (decision.type) {
    case 'AUTO_LINK':
      return { linkDecision: 'AUTO_LINK', linkedContactId: decision.contactId, contactId }
    case 'SUGGEST':
      return { linkDecision: 'SUGGEST', suggestedContactId: decision.contactId }
    case 'NONE':
      return { linkDecision: 'NONE', contactId }
    default: {
      const unknown: never = decision.type
      throw new Error(`Unknown link decision: ${String(unknown)}`)
    }
  }
}

export function storageTools(ctx: ToolContext): RegisteredTool[] {
  const { request, collaborators } = ctx
  const runId = request.runId ?? null

  const tools: RegisteredTool[] = [
    defineTool({
      name: 'store_extraction',
      description: 'Persist the final extraction with description, keywords, confidence, raw text and the contact link decision. Call exactly once.',
      inputSchema: {
        type: 'object',
        properties: {
          documentType: { type: 'string' },
          extraction: { type: 'object' },
          description: { type: 'string' },
          keywords: { type: 'array', items: { type: 'string' } },
          confidence: { type: 'number' },
          rawText: { type: 'string' },
          contactId: { type: 'string', description: 'Resolved counterparty contact id' },
          contactCreated: { type: 'boolean' },
          linkDecisionType: { type: 'string', enum: [...LINK_DECISION_TYPES] },
          linkDecisionReason: { type: 'string' },
          linkDecisionConfidence: { type: 'number', description: 'Only for SUGGEST' },
          linkEvidence: {
            type: 'object',
            properties: {
              vatValid: { type: 'boolean' },
              vatMatched: { type: 'boolean' },
              cbeExists: { type: 'boolean' },
              ibanMatched: { type: 'boolean' },
              nameSimilarity: { type: 'number' },
              addressMatched: { type: 'boolean' },
              ambiguityCount: { type: 'integer' },
            },
          },
        },
        required: ['documentType', 'extraction'],
      },
      input: StoreExtractionInput,
      async execute(input) {
        const extraction = normalizeExtraction(input.extraction)
        if (extraction === null) {
          return errorOutcome('extraction must be a JSON object or array')
        }

        const linkDecision = resolveLinkDecision(ctx, input)
        // A suggestion is not a confirmed identity
        const contactId = linkDecision?.type === 'SUGGEST' ? null : input.contactId ?? null

        const success = await collaborators.storeExtraction({
          documentId: request.documentId,
          tenantId: request.tenantId,
          runId,
          documentType: input.documentType.trim().toUpperCase(),
          extraction,
          description: input.description ?? '',
          keywords: input.keywords ?? [],
          confidence: input.confidence ?? extractConfidence(extraction) ?? 0,
          rawText: input.rawText ?? extractRawText(extraction),
          contactId,
          contactCreated: input.contactCreated ?? null,
          linkDecision,
        })

        return {
          output: { success, ...linkOutput(linkDecision, contactId) },
          notes: success ? 'stored' : 'store_failed',
        }
      },
    }),
  ]

  const { storeChunks, updateIndexingStatus, findSimilarExample, indexExample } = collaborators

  if (storeChunks) {
    tools.push(defineTool({
      name: 'store_chunks',
      description: 'Index the document text for search. Non-critical: a failure does not fail the run.',
      inputSchema: {
        type: 'object',
        properties: { text: { type: 'string', description: 'Full text transcription of the document' } },
        required: ['text'],
      },
      input: z.object({ text: z.string() }),
      async execute({ text }): Promise<ToolOutcome> {
        try {
          const count = await storeChunks(request.documentId, request.tenantId, text)
          if (runId && updateIndexingStatus) {
            await updateIndexingStatus(runId, 'SUCCEEDED', count, null)
          }
          return { output: { success: true, chunksCount: count }, notes: `${count} chunk(s)` }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          console.warn(`[TOOLS] Chunk storage failed for ${request.documentId}: ${message}`)
          const issues = [formatIssue('warning', 'chunk_storage', `Chunk storage failed: ${message}`)]
          if (runId && updateIndexingStatus) {
            try {
              await updateIndexingStatus(runId, 'FAILED', null, message)
            } catch (statusError) {
              const statusMessage = statusError instanceof Error ? statusError.message : String(statusError)
              issues.push(formatIssue('warning', 'indexing_status', `Indexing status update failed: ${statusMessage}`))
            }
          }
          return { output: { success: false, message }, notes: 'chunk_storage_failed', issues }
        }
      },
    }))
  }

  if (findSimilarExample) {
    tools.push(defineTool({
      name: 'find_similar_example',
      description: 'Find a previously confirmed extraction from the same vendor to use as a reference.',
      inputSchema: {
        type: 'object',
        properties: { vatNumber: { type: 'string', description: 'Vendor VAT number' } },
        required: ['vatNumber'],
      },
      input: z.object({ vatNumber: z.string().min(1) }),
      async execute({ vatNumber }): Promise<ToolOutcome> {
        const example = await findSimilarExample(request.tenantId, vatNumber)
        if (!example) {
          return { output: { found: false }, notes: 'not_found' }
        }
        return {
          output: {
            found: true,
            exampleId: example.id,
            documentType: example.documentType,
            extraction: example.extraction,
          },
          notes: example.id,
        }
      },
    }))
  }

  if (indexExample) {
    tools.push(defineTool({
      name: 'index_example',
      description: 'Save a high-confidence extraction as a future reference example for this vendor. Non-critical.',
      inputSchema: {
        type: 'object',
        properties: {
          documentType: { type: 'string' },
          vendorVatNumber: { type: 'string' },
          extraction: { type: 'object' },
        },
        required: ['documentType', 'vendorVatNumber', 'extraction'],
      },
      input: z.object({
        documentType: z.string().min(1),
        vendorVatNumber: z.string().min(1),
        extraction: JsonValueSchema,
      }),
      async execute({ documentType, vendorVatNumber, extraction }): Promise<ToolOutcome> {
        try {
          await indexExample({
            tenantId: request.tenantId,
            documentId: request.documentId,
            documentType: documentType.trim().toUpperCase(),
            vendorVatNumber,
            extraction,
          })
          return { output: { success: true } }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          console.warn(`[TOOLS] Example indexing failed for ${request.documentId}: ${message}`)
          return {
            output: { success: false, message },
            notes: 'example_indexing_failed',
            issues: [formatIssue('warning', 'example_indexing', `Example indexing failed: ${message}`)],
          }
        }
      },
    }))
  }

  return tools
}
