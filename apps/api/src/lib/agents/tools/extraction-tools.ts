import { z } from 'zod'
import { JsonValueSchema, type JsonObject } from '../../../types.js'
import { formatIssue, hasErrors } from '../../issues.js'
import {
  looksLikeOgm,
  validateIban,
  validateOgm,
  validateTotals,
  validateVatNumber,
} from '../../validators.js'
import { asJsonObject, readString } from '../json.js'
import { EXTRACTABLE_TYPES, type ExtractableType, type ExtractionHints } from '../vision.js'
import { defineTool, errorOutcome, type RegisteredTool, type ToolContext } from './types.js'

// Extraction tool name → document type it produces
const EXTRACTION_TOOL_TYPES = new Map<string, ExtractableType>(
  EXTRACTABLE_TYPES.map(type => [extractionToolName(type), type])
)

export function extractionToolName(documentType: ExtractableType): string {
  return `extract_${documentType.toLowerCase()}`
}

export function documentTypeForTool(toolName: string): ExtractableType | null {
  return EXTRACTION_TOOL_TYPES.get(toolName) ?? null
}

const VAT_FIELDS = ['vendorVatNumber', 'supplierVatNumber', 'merchantVatNumber', 'customerVatNumber'] as const

function hintsFor(ctx: ToolContext): ExtractionHints {
  return {
    maxPages: ctx.request.maxPages ?? null,
    dpi: ctx.request.dpi ?? null,
    tenantVatNumber: ctx.request.tenantContext.vatNumber ?? null,
    tenantCompanyName: ctx.request.tenantContext.companyName ?? null,
  }
}

/**
 * Deterministic checks over an extraction: IBAN, structured payment
 * reference, VAT numbers and totals. Returns formatted issue strings.
 */
export function validateExtractionFields(extraction: JsonObject): string[] {
  const issues: string[] = []

  const iban = readString(extraction, 'iban')
  if (iban) {
    const result = validateIban(iban)
    if (!result.valid) {
      issues.push(formatIssue('error', 'invalid_iban', result.issue ?? 'Invalid IBAN', 'iban', iban))
    }
  }

  const reference = readString(extraction, 'paymentReference')
  if (reference && looksLikeOgm(reference)) {
    const result = validateOgm(reference)
    if (!result.valid) {
      issues.push(formatIssue('error', 'invalid_ogm', result.issue ?? 'Invalid structured reference', 'paymentReference', reference))
    }
  }

  for (const field of VAT_FIELDS) {
    const vat = readString(extraction, field)
    if (!vat) continue
    const result = validateVatNumber(vat)
    if (!result.valid) {
      issues.push(formatIssue('error', 'invalid_vat', result.issue ?? 'Invalid VAT number', field, vat))
    }
  }

  const totals = validateTotals(extraction.subtotal, extraction.totalVatAmount, extraction.totalAmount)
  if (!totals.valid) {
    issues.push(formatIssue('warning', 'totals_mismatch', totals.issue ?? 'Totals do not add up', 'totalAmount'))
  }

  return issues
}

const ClassifyInput = z.object({}).passthrough()

const ExtractInput = z.object({
  reason: z.string().optional(),
})

const ValidateInput = z.object({
  extraction: JsonValueSchema,
})

export function extractionTools(ctx: ToolContext): RegisteredTool[] {
  const classify = defineTool({
    name: 'classify_document',
    description: 'Classify the loaded document into INVOICE, BILL, RECEIPT, EXPENSE, CREDIT_NOTE, PRO_FORMA or UNKNOWN using vision.',
    inputSchema: { type: 'object', properties: {} },
    input: ClassifyInput,
    async execute() {
      const document = await ctx.loadDocument()
      const result = await ctx.vision.classify(document, hintsFor(ctx))
      return {
        output: {
          documentType: result.documentType,
          confidence: result.confidence,
          reasoning: result.reasoning,
        },
        notes: `${result.documentType} (${result.confidence.toFixed(2)})`,
      }
    },
  })

  const extractors = EXTRACTABLE_TYPES.map(documentType => {
    return defineTool({
      name: extractionToolName(documentType),
      description: `Extract all fields of a ${documentType} from the loaded document using vision. Returns the extraction object including confidence and extractedText.`,
      inputSchema: {
        type: 'object',
        properties: {
          reason: { type: 'string', description: 'Why this document type was chosen' },
        },
      },
      input: ExtractInput,
      async execute() {
        const document = await ctx.loadDocument()
        const extraction = await ctx.vision.extract(document, documentType, hintsFor(ctx))
        return { output: extraction, notes: documentType }
      },
    })
  })

  const validate = defineTool({
    name: 'validate_extraction',
    description: 'Check IBAN checksum, Belgian structured payment reference, VAT numbers and that subtotal + VAT equals total.',
    inputSchema: {
      type: 'object',
      properties: {
        extraction: { type: 'object', description: 'The extraction object to validate' },
      },
      required: ['extraction'],
    },
    input: ValidateInput,
    async execute({ extraction }) {
      const obj = asJsonObject(extraction)
      if (!obj) {
        return errorOutcome('extraction must be a JSON object')
      }
      const issues = validateExtractionFields(obj)
      const valid = !hasErrors(issues)
      return {
        output: { valid, issues },
        notes: valid ? 'valid' : `${issues.length} issue(s)`,
      }
    },
  })

  return [classify, ...extractors, validate]
}
