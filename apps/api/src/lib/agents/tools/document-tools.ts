import { z } from 'zod'
import { DocumentTooLargeError, MAX_DOCUMENT_SIZE, UnsupportedDocumentError } from '../errors.js'
import type { DocumentImage } from '../vision.js'
import { defineTool, type RegisteredTool, type ToolCollaborators, type ToolContext, type ToolOutcome } from './types.js'

const SUPPORTED_MIME_TYPES = new Set([
  'application/pdf',
  'image/jpeg',
  'image/png',
  'image/webp',
  'image/gif',
])

export function isSupportedMimeType(mimeType: string): boolean {
  return SUPPORTED_MIME_TYPES.has(mimeType.toLowerCase())
}

/**
 * Fetches the run's document once and hands the same copy to every vision tool.
 * A failed fetch is not cached, so the model may retry get_document.
 */
export function createDocumentLoader(
  fetchDocument: ToolCollaborators['fetchDocument'],
  documentId: string,
  tenantId: string
): () => Promise<DocumentImage> {
  let cached: DocumentImage | null = null

  return async () => {
    if (cached) return cached

    const content = await fetchDocument(documentId, tenantId)
    const mimeType = content.mimeType.toLowerCase()
    if (content.bytes.byteLength > MAX_DOCUMENT_SIZE) {
      throw new DocumentTooLargeError(
        `Document ${documentId} is ${content.bytes.byteLength} bytes, limit is ${MAX_DOCUMENT_SIZE}`
      )
    }
    if (!isSupportedMimeType(mimeType)) {
      throw new UnsupportedDocumentError(`Unsupported document type: ${content.mimeType}`)
    }

    cached = {
      base64: Buffer.from(content.bytes).toString('base64'),
      mimeType,
      fileName: content.fileName ?? documentId,
      sizeBytes: content.bytes.byteLength,
    }
    console.log(`[TOOLS] Loaded document ${documentId} (${mimeType}, ${cached.sizeBytes} bytes)`)
    return cached
  }
}

const NoInput = z.object({}).passthrough()

export function documentTools(ctx: ToolContext): RegisteredTool[] {
  const tools: RegisteredTool[] = [
    defineTool({
      name: 'get_document',
      description: 'Load the document being processed. Returns its file name, mime type and size. Call before classification or extraction.',
      inputSchema: { type: 'object', properties: {} },
      input: NoInput,
      async execute() {
        const document = await ctx.loadDocument()
        return {
          output: {
            status: 'ok',
            documentId: ctx.request.documentId,
            fileName: document.fileName,
            mimeType: document.mimeType,
            sizeBytes: document.sizeBytes,
          },
        }
      },
    }),
  ]

  const fetchPeppolData = ctx.collaborators.fetchPeppolData
  if (fetchPeppolData) {
    tools.push(defineTool({
      name: 'get_peppol_data',
      description: 'Return structured data for documents received over PEPPOL. When found, use it as the extraction instead of vision extraction.',
      inputSchema: { type: 'object', properties: {} },
      input: NoInput,
      async execute(): Promise<ToolOutcome> {
        const data = await fetchPeppolData(ctx.request.documentId)
        if (data === null) {
          return { output: { found: false }, notes: 'no_peppol_data' }
        }
        return { output: { found: true, extraction: data } }
      },
    }))
  }

  return tools
}
