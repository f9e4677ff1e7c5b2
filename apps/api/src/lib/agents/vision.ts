/**
 * Vision model calls behind the classification and extraction tools.
 * GPT-4o reads the document (image or PDF) and answers in a per-type structured format.
 */

import OpenAI from 'openai'
import { zodResponseFormat } from 'openai/helpers/zod'
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions'
import { z } from 'zod'
import { DOCUMENT_TYPES, isJsonObject, type DocumentType, type JsonObject } from '../../types.js'
import { toJsonValue } from './json.js'

export interface DocumentImage {
  base64: string
  mimeType: string
  fileName: string
  sizeBytes: number
}

export interface ExtractionHints {
  maxPages?: number | null
  dpi?: number | null
  tenantVatNumber?: string | null
  tenantCompanyName?: string | null
}

export interface ClassificationResult {
  documentType: DocumentType
  confidence: number
  reasoning: string
}

export const EXTRACTABLE_TYPES = ['INVOICE', 'BILL', 'RECEIPT', 'EXPENSE'] as const
export type ExtractableType = (typeof EXTRACTABLE_TYPES)[number]

export interface VisionClient {
  classify(document: DocumentImage, hints: ExtractionHints): Promise<ClassificationResult>
  extract(document: DocumentImage, documentType: ExtractableType, hints: ExtractionHints): Promise<JsonObject>
}

// ============================================
// PER-TYPE EXTRACTION SCHEMAS
// ============================================

const LineItemSchema = z.object({
  description: z.string().nullable(),
  quantity: z.number().nullable(),
  unitPrice: z.string().nullable(),
  vatRate: z.string().nullable(),
  total: z.string().nullable(),
})

const InvoiceSchema = z.object({
  vendorName: z.string().nullable(),
  vendorVatNumber: z.string().nullable(),
  vendorAddress: z.string().nullable(),
  customerName: z.string().nullable(),
  customerVatNumber: z.string().nullable(),
  invoiceNumber: z.string().nullable(),
  issueDate: z.string().nullable(),
  dueDate: z.string().nullable(),
  paymentTerms: z.string().nullable(),
  lineItems: z.array(LineItemSchema),
  currency: z.string().nullable(),
  subtotal: z.string().nullable(),
  totalVatAmount: z.string().nullable(),
  totalAmount: z.string().nullable(),
  iban: z.string().nullable(),
  bic: z.string().nullable(),
  paymentReference: z.string().nullable(),
  confidence: z.number(),
  extractedText: z.string(),
})

const BillSchema = z.object({
  supplierName: z.string().nullable(),
  supplierVatNumber: z.string().nullable(),
  supplierAddress: z.string().nullable(),
  invoiceNumber: z.string().nullable(),
  issueDate: z.string().nullable(),
  dueDate: z.string().nullable(),
  lineItems: z.array(LineItemSchema),
  currency: z.string().nullable(),
  subtotal: z.string().nullable(),
  totalVatAmount: z.string().nullable(),
  totalAmount: z.string().nullable(),
  category: z.string().nullable(),
  iban: z.string().nullable(),
  paymentReference: z.string().nullable(),
  confidence: z.number(),
  extractedText: z.string(),
})

const ReceiptSchema = z.object({
  merchantName: z.string().nullable(),
  merchantVatNumber: z.string().nullable(),
  merchantAddress: z.string().nullable(),
  receiptNumber: z.string().nullable(),
  transactionDate: z.string().nullable(),
  items: z.array(LineItemSchema),
  currency: z.string().nullable(),
  totalVatAmount: z.string().nullable(),
  totalAmount: z.string().nullable(),
  paymentMethod: z.string().nullable(),
  category: z.string().nullable(),
  confidence: z.number(),
  extractedText: z.string(),
})

const ExpenseSchema = z.object({
  merchantName: z.string().nullable(),
  date: z.string().nullable(),
  description: z.string().nullable(),
  category: z.string().nullable(),
  currency: z.string().nullable(),
  totalVatAmount: z.string().nullable(),
  totalAmount: z.string().nullable(),
  confidence: z.number(),
  extractedText: z.string(),
})

type SchemaConfig = { schema: z.ZodObject<z.ZodRawShape>; name: string; focus: string }

const EXTRACTION_SCHEMAS: Record<ExtractableType, SchemaConfig> = {
  INVOICE: { schema: InvoiceSchema, name: 'invoice_extraction', focus: 'an outgoing invoice (the tenant is the vendor), credit note or pro forma' },
  BILL: { schema: BillSchema, name: 'bill_extraction', focus: 'a supplier invoice received by the tenant' },
  RECEIPT: { schema: ReceiptSchema, name: 'receipt_extraction', focus: 'a point-of-sale receipt' },
  EXPENSE: { schema: ExpenseSchema, name: 'expense_extraction', focus: 'a simple expense document without itemization' },
}

const ClassificationSchema = z.object({
  documentType: z.enum(DOCUMENT_TYPES),
  confidence: z.number(),
  reasoning: z.string(),
})

// ============================================
// OPENAI VISION CLIENT
// ============================================

function documentContent(document: DocumentImage): ChatCompletionContentPart {
  const dataUri = `data:${document.mimeType};base64,${document.base64}`
  if (document.mimeType === 'application/pdf') {
    return { type: 'file', file: { filename: document.fileName, file_data: dataUri } }
  }
  return { type: 'image_url', image_url: { url: dataUri, detail: 'high' } }
}

function hintLines(hints: ExtractionHints): string {
  const lines: string[] = []
  if (hints.tenantCompanyName || hints.tenantVatNumber) {
    lines.push(`Tenant (our company): ${hints.tenantCompanyName ?? 'unknown'} / VAT ${hints.tenantVatNumber ?? 'unknown'}`)
  }
  if (hints.maxPages) lines.push(`Only read the first ${hints.maxPages} page(s).`)
  if (hints.dpi) lines.push(`Document rendered at ${hints.dpi} DPI.`)
  return lines.join('\n')
}

export function createOpenAIVisionClient(model: string, client?: OpenAI): VisionClient {
  let openai = client ?? null
  const getClient = (): OpenAI => {
    if (!openai) openai = new OpenAI()
    return openai
  }

  return {
    async classify(document, hints) {
      const response = await getClient().chat.completions.parse({
        model,
        messages: [
          {
            role: 'system',
            content: `You are a financial document classifier with vision capabilities.
Types:
- INVOICE: formal request for payment the tenant SENDS to a client
- CREDIT_NOTE: reduces or refunds a previous invoice
- PRO_FORMA: quote or estimate, no legal force
- BILL: invoice the tenant RECEIVES from a supplier
- RECEIPT: point-of-sale proof of payment
- EXPENSE: simple cost document without itemization (parking, transport)
- UNKNOWN: cannot determine
${hintLines(hints)}`,
          },
          {
            role: 'user',
            content: [documentContent(document), { type: 'text', text: 'Classify this document.' }],
          },
        ],
        response_format: zodResponseFormat(ClassificationSchema, 'classification'),
        temperature: 0,
      })

      const parsed = response.choices[0]?.message?.parsed
      if (!parsed) {
        throw new Error('Failed to classify document: empty response')
      }
      return parsed
    },

    async extract(document, documentType, hints) {
      const config = EXTRACTION_SCHEMAS[documentType]
      const response = await getClient().chat.completions.parse({
        model,
        messages: [
          {
            role: 'system',
            content: `You are a financial document field extractor with vision capabilities. The document is ${config.focus}.
Only extract values you can clearly see. Use null for missing/unclear fields.
Amounts: strings without currency symbols, dot as decimal separator (e.g. "1234.56").
Dates: YYYY-MM-DD. Currency: 3-letter ISO code. Belgian VAT numbers: "BE0123456789".
extractedText: a clean transcription of all visible text.
confidence: your overall confidence 0.0-1.0.
${hintLines(hints)}`,
          },
          {
            role: 'user',
            content: [documentContent(document), { type: 'text', text: `Document type: ${documentType}\nExtract all fields from this document.` }],
          },
        ],
        response_format: zodResponseFormat(config.schema, config.name),
        temperature: 0,
      })

      const extraction = toJsonValue(response.choices[0]?.message?.parsed)
      if (!isJsonObject(extraction)) {
        throw new Error(`Failed to extract ${documentType}: empty response`)
      }
      return extraction
    },
  }
}
