/**
 * Shared fakes for orchestrator tests: scripted agent sessions, a fake vision
 * client and in-memory collaborators.
 */

import { vi } from 'vitest'
import type { OrchestratorConfig } from '../../config.js'
import type { JsonObject, ProcessRequest } from '../../../types.js'
import type { AgentSessionFactory, AgentSessionOptions } from '../agent-session.js'
import type {
  DocumentFetcher,
  StoreExtractionHandler,
  StoreExtractionPayload,
  ToolCollaborators,
} from '../tools/types.js'
import type { VisionClient } from '../vision.js'

export const CONTACT_ID = '3f2b8c1e-5d4a-4c6b-9e7f-1a2b3c4d5e6f'

export const testConfig: OrchestratorConfig = {
  autonomyMode: 'autonomous',
  linkPolicy: 'VAT_ONLY',
  orchestratorModel: 'test-orchestrator-model',
  visionModel: 'test-vision-model',
  repairMaxChars: 12000,
}

export const testRequest: ProcessRequest = {
  documentId: 'doc-1',
  tenantId: 'tenant-1',
  tenantContext: { vatNumber: 'BE0812345603', companyName: 'Test Tenant NV' },
  runId: 'run-1',
}

export function invoiceExtraction(): JsonObject {
  return {
    vendorName: 'Acme Supplies BV',
    vendorVatNumber: 'BE0403033317',
    invoiceNumber: 'INV-2024-001',
    issueDate: '2024-03-01',
    currency: 'EUR',
    subtotal: '1020.30',
    totalVatAmount: '214.26',
    totalAmount: '1234.56',
    iban: 'BE68539007547034',
    confidence: 0.88,
    extractedText: 'Acme Supplies BV Invoice INV-2024-001 Total 1234.56 EUR',
  }
}

// ============================================
// SCRIPTED SESSIONS
// ============================================

export type SessionScript = (options: AgentSessionOptions, prompt: string) => Promise<string>

export interface CreatedSession {
  options: AgentSessionOptions
  prompts: string[]
  closed: boolean
}

/**
 * Each session the factory creates runs the next script in order.
 */
export function scriptedSessions(...scripts: SessionScript[]) {
  const created: CreatedSession[] = []
  const factory: AgentSessionFactory = (options) => {
    const script = scripts[created.length]
    const record: CreatedSession = { options, prompts: [], closed: false }
    created.push(record)
    return {
      async run(prompt) {
        record.prompts.push(prompt)
        if (!script) throw new Error(`No script for session ${options.id}`)
        return script(options, prompt)
      },
      close() {
        record.closed = true
      },
    }
  }
  return { factory, created }
}

// ============================================
// FAKE COLLABORATORS
// ============================================

export function fakeVision(extraction: JsonObject = invoiceExtraction()) {
  const classify = vi.fn<VisionClient['classify']>(async () => ({
    documentType: 'INVOICE',
    confidence: 0.95,
    reasoning: 'Tenant is the issuer',
  }))
  const extract = vi.fn<VisionClient['extract']>(async () => extraction)
  const client: VisionClient = { classify, extract }
  return { client, classify, extract }
}

export function fakeCollaborators(overrides: Partial<ToolCollaborators> = {}) {
  const stored: StoreExtractionPayload[] = []
  const storeExtraction = vi.fn<StoreExtractionHandler>(async (payload) => {
    stored.push(payload)
    return true
  })
  const fetchDocument = vi.fn<DocumentFetcher>(async () => ({
    bytes: new Uint8Array([37, 80, 68, 70]),
    mimeType: 'application/pdf',
    fileName: 'invoice.pdf',
  }))
  const collaborators: ToolCollaborators = { fetchDocument, storeExtraction, ...overrides }
  return { collaborators, stored, storeExtraction, fetchDocument }
}
