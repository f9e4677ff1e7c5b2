/**
 * Capability registry - the bounded tool surface handed to one orchestrator run.
 *
 * Built fresh per run for a single tenant and document. Every invocation is
 * recorded in the run's trace; the store seam is wrapped so the persistence
 * guard can tell whether the model stored the extraction itself.
 */

import type Anthropic from '@anthropic-ai/sdk'
import type { ContactLinkPolicy, ProcessRequest } from '../../../types.js'
import { mergeIssues } from '../../issues.js'
import { toJsonValue } from '../json.js'
import type { TraceCollector } from '../trace.js'
import type { VisionClient } from '../vision.js'
import { contactTools } from './contact-tools.js'
import { createDocumentLoader, documentTools } from './document-tools.js'
import { extractionTools } from './extraction-tools.js'
import { storageTools } from './storage-tools.js'
import type { RegisteredTool, StoreState, ToolCollaborators, ToolContext } from './types.js'

export interface CapabilityRegistryOptions {
  request: ProcessRequest
  linkPolicy: ContactLinkPolicy
  vision: VisionClient
  collaborators: ToolCollaborators
  trace: TraceCollector
}

export interface CapabilityRegistry {
  readonly definitions: Anthropic.Tool[]
  readonly toolNames: string[]
  invoke(name: string, input: unknown): Promise<string>
  storeState(): StoreState
  issues(): string[]
}

export function createCapabilityRegistry(options: CapabilityRegistryOptions): CapabilityRegistry {
  const { request, trace } = options
  const storeState: StoreState = { called: false, succeeded: false }
  const collectedIssues: string[] = []

  const baseStore = options.collaborators.storeExtraction
  const collaborators: ToolCollaborators = {
    ...options.collaborators,
    storeExtraction: async (payload) => {
      storeState.called = true
      storeState.succeeded = false
      const success = await baseStore(payload)
      storeState.succeeded = success
      return success
    },
  }

  const ctx: ToolContext = {
    request,
    linkPolicy: options.linkPolicy,
    vision: options.vision,
    collaborators,
    loadDocument: createDocumentLoader(collaborators.fetchDocument, request.documentId, request.tenantId),
  }

  const tools = new Map<string, RegisteredTool>()
  for (const tool of [
    ...documentTools(ctx),
    ...extractionTools(ctx),
    ...contactTools(ctx),
    ...storageTools(ctx),
  ]) {
    tools.set(tool.definition.name, tool)
  }

  async function invoke(name: string, input: unknown): Promise<string> {
    const tool = tools.get(name)
    const inputSnapshot = toJsonValue(input)

    if (!tool) {
      console.warn(`[TOOLS] Unknown tool requested: ${name}`)
      const message = `Unknown tool: ${name}`
      trace.record({ action: name, tool: name, durationMs: 0, input: inputSnapshot, notes: message })
      return JSON.stringify({ status: 'error', message })
    }

    console.log(`[TOOLS] ${request.documentId}: ${name}`)
    const startTime = Date.now()
    try {
      const outcome = await tool.invoke(input)
      if (outcome.issues?.length) {
        collectedIssues.push(...outcome.issues)
      }
      trace.record({
        action: name,
        tool: name,
        durationMs: Date.now() - startTime,
        input: inputSnapshot,
        output: outcome.failed ? null : outcome.output,
        notes: outcome.notes ?? null,
      })
      return JSON.stringify(outcome.output)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[TOOLS] ${name} failed:`, error)
      trace.record({
        action: name,
        tool: name,
        durationMs: Date.now() - startTime,
        input: inputSnapshot,
        notes: `error: ${message}`,
      })
      return JSON.stringify({ status: 'error', message })
    }
  }

  return {
    definitions: [...tools.values()].map(tool => tool.definition),
    toolNames: [...tools.keys()],
    invoke,
    storeState: () => ({ ...storeState }),
    issues: () => mergeIssues(collectedIssues),
  }
}
