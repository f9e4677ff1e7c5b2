/**
 * Document orchestrator - drives one tool-calling agent run per document.
 *
 * Flow:
 *   capability registry + prompts → agent session → output resolution cascade
 *     → persistence guard → result classifier
 *
 * Every run ends in exactly one OrchestratorResult; nothing throws past `process`.
 * The trace collector is shared by every stage and attached to the result.
 */

import { maxIterationsFor, type OrchestratorConfig } from '../config.js'
import { formatIssue } from '../issues.js'
import type { OrchestratorResult, ProcessRequest } from '../../types.js'
import { createAnthropicSession, type AgentSession, type AgentSessionFactory } from './agent-session.js'
import { ensureExtractionPersisted } from './persistence-guard.js'
import { buildSystemPrompt, buildTaskPrompt } from './prompts.js'
import { ORCHESTRATOR_TOOL, createRepairAgent, resolveAgentOutput } from './output-resolution.js'
import { ORCHESTRATOR_STAGE, classifyResult } from './result-classifier.js'
import { TraceCollector } from './trace.js'
import { createCapabilityRegistry } from './tools/registry.js'
import type { ToolCollaborators } from './tools/types.js'
import { createOpenAIVisionClient, type VisionClient } from './vision.js'

export interface OrchestratorDeps {
  collaborators: ToolCollaborators
  sessionFactory?: AgentSessionFactory
  vision?: VisionClient
}

export interface DocumentOrchestrator {
  process(request: ProcessRequest): Promise<OrchestratorResult>
}

const RAW_OUTPUT_LOG_LIMIT = 1000

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function closeSession(session: AgentSession): void {
  try {
    session.close()
  } catch (error) {
    console.warn('[ORCHESTRATOR] Failed to close agent session:', error)
  }
}

export function summarizeResult(result: OrchestratorResult): string {
  switch (result.kind) {
    case 'success':
      return `success (${result.documentType}, confidence ${result.confidence.toFixed(2)})`
    case 'needs_review':
      return `needs_review (${result.documentType ?? 'unknown type'}): ${result.reason}`
    case 'failed':
      return `failed at ${result.stage}: ${result.reason}`
    default: {
      const unknown: never = result
      throw new Error(`Unknown result: ${JSON.stringify(unknown)}`)
    }
  }
}

export function createDocumentOrchestrator(
  config: OrchestratorConfig,
  deps: OrchestratorDeps
): DocumentOrchestrator {
  const sessionFactory = deps.sessionFactory ?? createAnthropicSession
  const maxIterations = maxIterationsFor(config.autonomyMode)
  let vision = deps.vision ?? null
  const getVision = (): VisionClient => {
    if (!vision) vision = createOpenAIVisionClient(config.visionModel)
    return vision
  }

  async function run(request: ProcessRequest, trace: TraceCollector): Promise<OrchestratorResult> {
    const registry = createCapabilityRegistry({
      request,
      linkPolicy: config.linkPolicy,
      vision: getVision(),
      collaborators: deps.collaborators,
      trace,
    })

    const session = sessionFactory({
      id: ORCHESTRATOR_TOOL,
      model: config.orchestratorModel,
      systemPrompt: buildSystemPrompt(request.tenantContext, config.linkPolicy, registry.toolNames),
      tools: registry.definitions,
      maxIterations,
      invokeTool: registry.invoke,
    })

    const startTime = Date.now()
    let rawOutput: string
    try {
      rawOutput = await session.run(buildTaskPrompt(request))
    } catch (error) {
      console.error(`[ORCHESTRATOR] Run failed for ${request.documentId}:`, error)
      trace.record({
        action: 'orchestrator_run_failed',
        tool: ORCHESTRATOR_TOOL,
        durationMs: Date.now() - startTime,
        notes: errorMessage(error),
      })
      return {
        kind: 'failed',
        reason: errorMessage(error) || 'Orchestrator execution failed',
        stage: ORCHESTRATOR_STAGE,
        auditTrail: trace.snapshot(),
      }
    } finally {
      closeSession(session)
    }

    trace.record({
      action: 'orchestrator_run_completed',
      tool: ORCHESTRATOR_TOOL,
      durationMs: Date.now() - startTime,
    })

    const resolved = await resolveAgentOutput(rawOutput, {
      trace,
      repair: createRepairAgent(sessionFactory, config.orchestratorModel, config.repairMaxChars),
    })
    if (!resolved) {
      console.error(`[ORCHESTRATOR] Failed to parse orchestrator output: ${rawOutput.slice(0, RAW_OUTPUT_LOG_LIMIT)}`)
      return {
        kind: 'failed',
        reason: 'Failed to parse orchestrator output',
        stage: ORCHESTRATOR_STAGE,
        auditTrail: trace.snapshot(),
      }
    }
    if (resolved.source !== 'strict') {
      console.log(`[ORCHESTRATOR] Output for ${request.documentId} resolved via ${resolved.source}`)
    }

    const persistence = await ensureExtractionPersisted({
      request,
      output: resolved.output,
      recoveredContact: resolved.recoveredContact,
      storeState: registry.storeState(),
      linkPolicy: config.linkPolicy,
      storeExtraction: deps.collaborators.storeExtraction,
      trace,
    })

    if (persistence.kind === 'failed') {
      console.error(`[ORCHESTRATOR] Extraction for ${request.documentId} could not be persisted (runId=${request.runId ?? 'unknown'})`)
      return {
        kind: 'failed',
        reason: 'Extraction completed but could not be persisted',
        stage: 'store_extraction',
        auditTrail: trace.snapshot(),
      }
    }

    const extraIssues = registry.issues()
    if (persistence.kind === 'nothing_to_persist' && resolved.output.extraction != null && !registry.storeState().succeeded) {
      extraIssues.push(formatIssue('warning', 'not_persisted', 'Extraction has no document type and was not persisted'))
    }

    return classifyResult(resolved.output, trace.snapshot(), extraIssues)
  }

  async function process(request: ProcessRequest): Promise<OrchestratorResult> {
    console.log(`[ORCHESTRATOR] Processing document ${request.documentId} (tenant ${request.tenantId}, mode ${config.autonomyMode}, max ${maxIterations} iterations)`)
    const trace = new TraceCollector()

    let result: OrchestratorResult
    try {
      result = await run(request, trace)
    } catch (error) {
      console.error(`[ORCHESTRATOR] Unexpected error for ${request.documentId}:`, error)
      trace.record({
        action: 'orchestrator_run_failed',
        tool: ORCHESTRATOR_TOOL,
        durationMs: 0,
        notes: errorMessage(error),
      })
      result = {
        kind: 'failed',
        reason: errorMessage(error) || 'Orchestrator execution failed',
        stage: ORCHESTRATOR_STAGE,
        auditTrail: trace.snapshot(),
      }
    }

    console.log(`[ORCHESTRATOR] ${request.documentId}: ${summarizeResult(result)} after ${result.auditTrail.length} step(s)`)
    return result
  }

  return { process }
}
