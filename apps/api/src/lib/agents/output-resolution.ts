/**
 * Output resolution cascade - turns the orchestrator's final text into an AgentOutput.
 *
 * Resolvers run in order, each either resolving or passing to the next:
 *   strict parse → lenient parse → repair sub-agent → trace fallback
 *
 * A parsed output missing documentType or extraction is merged with the trace
 * fallback when one exists. Placeholder tokens ("...", "…") reject every parse.
 */

import {
  AgentOutputSchema,
  isJsonObject,
  type AgentOutput,
  type ContactEvidence,
  type JsonObject,
  type JsonValue,
  type ProcessingStep,
} from '../../types.js'
import { mergeIssues } from '../issues.js'
import type { AgentSessionFactory } from './agent-session.js'
import {
  containsPlaceholders,
  extractConfidence,
  extractRawText,
  normalizeExtraction,
  normalizeJson,
  tryParseJson,
} from './json.js'
import { REPAIR_SYSTEM_PROMPT, buildRepairPrompt } from './prompts.js'
import type { TraceCollector } from './trace.js'
import { documentTypeForTool } from './tools/extraction-tools.js'

export const ORCHESTRATOR_TOOL = 'document-orchestrator'

export type ResolutionSource = 'strict' | 'lenient' | 'repair' | 'trace_fallback' | 'merged' | 'incomplete'

/**
 * A contact id found in the trace, with the evidence its source implies.
 */
export interface RecoveredContact {
  contactId: string
  source: 'store_extraction' | 'lookup_contact'
  evidence: ContactEvidence
}

export interface ResolvedOutput {
  output: AgentOutput
  source: ResolutionSource
  recoveredContact: RecoveredContact | null
}

export type RepairFn = (rawOutput: string) => Promise<string>

export interface ResolutionDeps {
  trace: TraceCollector
  repair: RepairFn
}

// ============================================
// PARSERS
// ============================================

export function parseStrict(normalized: string): AgentOutput | null {
  const json = tryParseJson(normalized)
  if (json === undefined) return null
  const result = AgentOutputSchema.safeParse(json)
  return result.success ? result.data : null
}

function asString(value: JsonValue | undefined): string | null {
  if (value === undefined || value === null) return null
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return null
}

function asNumber(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function asInt(value: JsonValue | undefined): number | null {
  const parsed = asNumber(value)
  return parsed !== null && Number.isInteger(parsed) ? parsed : null
}

function asBoolean(value: JsonValue | undefined): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase()
    if (lower === 'true') return true
    if (lower === 'false') return false
  }
  return null
}

function asStringList(value: JsonValue | undefined): string[] | null {
  if (Array.isArray(value)) {
    return value.map(asString).filter((item): item is string => item !== null)
  }
  if (typeof value === 'string') {
    return value.split(',').map(part => part.trim()).filter(part => part !== '')
  }
  return null
}

/**
 * Pull known fields out of any JSON object, coercing where the model used the
 * wrong JSON type. Only `status` is required.
 */
export function parseLenient(normalized: string): AgentOutput | null {
  const json = tryParseJson(normalized)
  if (json === undefined || !isJsonObject(json)) return null

  const status = asString(json.status)
  if (status === null) return null

  return {
    status,
    documentType: asString(json.documentType),
    extraction: json.extraction ?? null,
    rawText: asString(json.rawText),
    description: asString(json.description),
    keywords: asStringList(json.keywords),
    confidence: asNumber(json.confidence),
    validationPassed: asBoolean(json.validationPassed),
    correctionsApplied: asInt(json.correctionsApplied),
    contactId: asString(json.contactId),
    contactCreated: asBoolean(json.contactCreated),
    issues: asStringList(json.issues),
    reason: asString(json.reason),
  }
}

function parseClean(normalized: string): { output: AgentOutput; parser: 'strict' | 'lenient' } | null {
  if (containsPlaceholders(normalized)) return null
  const strict = parseStrict(normalized)
  if (strict) return { output: strict, parser: 'strict' }
  const lenient = parseLenient(normalized)
  if (lenient) return { output: lenient, parser: 'lenient' }
  return null
}

// ============================================
// TRACE FALLBACK
// ============================================

function stepName(step: ProcessingStep): string {
  return step.tool ?? step.action
}

function findLast(steps: readonly ProcessingStep[], predicate: (step: ProcessingStep) => boolean): ProcessingStep | undefined {
  for (let i = steps.length - 1; i >= 0; i--) {
    if (predicate(steps[i])) return steps[i]
  }
  return undefined
}

function stringField(output: JsonObject, key: string): string | null {
  const value = output[key]
  return typeof value === 'string' && value !== '' ? value : null
}

function isExtractionStep(step: ProcessingStep): boolean {
  return documentTypeForTool(stepName(step)) !== null && step.output !== null
}

/**
 * Confirmed contact ids only: an explicit link from store_extraction, else
 * an exact VAT match from lookup_contact. Suggested contacts never count.
 */
export function findContactFromTrace(steps: readonly ProcessingStep[]): RecoveredContact | null {
  const store = findLast(steps, step => stepName(step) === 'store_extraction')
  if (store && isJsonObject(store.output)) {
    const contactId = stringField(store.output, 'linkedContactId') ?? stringField(store.output, 'contactId')
    if (contactId) {
      return {
        contactId,
        source: 'store_extraction',
        evidence: { vatValid: true, vatMatched: true, ambiguityCount: 1 },
      }
    }
  }

  const lookup = findLast(steps, step => stepName(step) === 'lookup_contact')
  if (lookup && isJsonObject(lookup.output)) {
    const found = lookup.output.found === true
    const exact = lookup.output.matchType === 'EXACT'
    const contactId = stringField(lookup.output, 'contactId')
    if (found && exact && contactId) {
      return {
        contactId,
        source: 'lookup_contact',
        evidence: { vatValid: lookup.output.vatValid !== false, vatMatched: true, ambiguityCount: 1 },
      }
    }
  }

  return null
}

export interface TraceFallback {
  output: AgentOutput
  sourceTool: string
  recoveredContact: RecoveredContact | null
}

export function buildFallbackFromTrace(steps: readonly ProcessingStep[]): TraceFallback | null {
  const step = findLast(steps, isExtractionStep)
  if (!step || step.output === null) return null

  const sourceTool = stepName(step)
  const documentType = documentTypeForTool(sourceTool)
  if (!documentType) return null
  const recoveredContact = findContactFromTrace(steps)

  return {
    sourceTool,
    recoveredContact,
    output: {
      status: 'needs_review',
      documentType,
      // Trail payloads are frozen
      extraction: structuredClone(step.output),
      rawText: extractRawText(step.output),
      description: null,
      keywords: [],
      confidence: extractConfidence(step.output),
      validationPassed: false,
      correctionsApplied: 0,
      contactId: recoveredContact?.contactId ?? null,
      contactCreated: null,
      issues: [
        'Orchestrator output parse failed; persisted extraction output',
        `Fallback source tool: ${sourceTool}`,
      ],
      reason: `Orchestrator output parse failed (fallback source: ${sourceTool})`,
    },
  }
}

/**
 * Fallback supplies the skeleton; the parsed output's non-null fields win.
 */
export function mergeWithFallback(fallback: AgentOutput, parsed: AgentOutput): AgentOutput {
  const issues = mergeIssues(fallback.issues, parsed.issues)
  return {
    ...fallback,
    extraction: normalizeExtraction(fallback.extraction) ?? fallback.extraction,
    description: parsed.description ?? fallback.description,
    keywords: parsed.keywords ?? fallback.keywords,
    confidence: parsed.confidence ?? fallback.confidence,
    rawText: parsed.rawText ?? fallback.rawText,
    contactId: parsed.contactId ?? fallback.contactId,
    contactCreated: parsed.contactCreated ?? fallback.contactCreated,
    issues: issues.length > 0 ? issues : null,
  }
}

// ============================================
// RESOLVERS
// ============================================

interface Parsed {
  output: AgentOutput
  source: 'strict' | 'lenient' | 'repair'
}

type ParseResolver = (raw: string, normalized: string, deps: ResolutionDeps) => Promise<Parsed | null>

const strictResolver: ParseResolver = async (_raw, normalized) => {
  if (containsPlaceholders(normalized)) return null
  const output = parseStrict(normalized)
  return output ? { output, source: 'strict' } : null
}

const lenientResolver: ParseResolver = async (_raw, normalized) => {
  if (containsPlaceholders(normalized)) return null
  const output = parseLenient(normalized)
  return output ? { output, source: 'lenient' } : null
}

const repairResolver: ParseResolver = async (raw, _normalized, { trace, repair }) => {
  trace.record({
    action: 'orchestrator_output_invalid',
    tool: ORCHESTRATOR_TOOL,
    durationMs: 0,
    notes: 'attempting_repair',
  })

  const startTime = Date.now()
  let repaired: string
  try {
    repaired = await repair(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error('[REPAIR] Failed to repair orchestrator output:', error)
    trace.record({
      action: 'orchestrator_output_repair',
      tool: ORCHESTRATOR_TOOL,
      durationMs: Date.now() - startTime,
      notes: `repair_failed: ${message}`,
    })
    return null
  }

  const parsed = parseClean(normalizeJson(repaired))
  const notes = parsed
    ? `repaired (${parsed.parser})`
    : containsPlaceholders(normalizeJson(repaired)) ? 'repair_output_has_placeholders' : 'repair_output_unparsable'
  trace.record({
    action: 'orchestrator_output_repair',
    tool: ORCHESTRATOR_TOOL,
    durationMs: Date.now() - startTime,
    notes,
  })
  if (!parsed) {
    console.warn(`[REPAIR] Repaired output rejected: ${notes}`)
    return null
  }
  return { output: parsed.output, source: 'repair' }
}

const PARSE_RESOLVERS: readonly ParseResolver[] = [strictResolver, lenientResolver, repairResolver]

/**
 * Run the cascade over the orchestrator's raw answer. Returns null when no
 * stage produced an output.
 */
export async function resolveAgentOutput(raw: string, deps: ResolutionDeps): Promise<ResolvedOutput | null> {
  const normalized = normalizeJson(raw)

  let parsed: Parsed | null = null
  for (const resolver of PARSE_RESOLVERS) {
    parsed = await resolver(raw, normalized, deps)
    if (parsed) break
  }

  if (!parsed) {
    const fallback = buildFallbackFromTrace(deps.trace.snapshot())
    if (!fallback) return null
    deps.trace.record({
      action: 'orchestrator_output_parse_failed',
      tool: ORCHESTRATOR_TOOL,
      durationMs: 0,
      notes: `using_extraction_trace_fallback, sourceTool=${fallback.sourceTool}`,
    })
    return { output: fallback.output, source: 'trace_fallback', recoveredContact: fallback.recoveredContact }
  }

  const output: AgentOutput = { ...parsed.output, extraction: normalizeExtraction(parsed.output.extraction) }
  const missingDocumentType = !output.documentType?.trim()
  const missingExtraction = output.extraction === null
  if (!missingDocumentType && !missingExtraction) {
    return { output, source: parsed.source, recoveredContact: null }
  }

  const fallback = buildFallbackFromTrace(deps.trace.snapshot())
  if (!fallback) {
    // Nothing to merge with; the result classifier decides what an incomplete output means
    return { output, source: 'incomplete', recoveredContact: null }
  }

  deps.trace.record({
    action: 'orchestrator_output_incomplete',
    tool: ORCHESTRATOR_TOOL,
    durationMs: 0,
    notes: `missingDocumentType=${missingDocumentType}, missingExtraction=${missingExtraction}`,
  })
  const merged = mergeWithFallback(fallback.output, output)
  const recoveredContact = output.contactId ? null : fallback.recoveredContact
  return { output: merged, source: 'merged', recoveredContact }
}

// ============================================
// REPAIR SUB-AGENT
// ============================================

/**
 * Single-shot, tool-free session that rewrites malformed output as schema JSON.
 */
export function createRepairAgent(
  sessionFactory: AgentSessionFactory,
  model: string,
  maxChars: number
): RepairFn {
  return async (rawOutput) => {
    const session = sessionFactory({
      id: 'orchestrator-output-repair',
      model,
      systemPrompt: REPAIR_SYSTEM_PROMPT,
      tools: [],
      maxIterations: 1,
      invokeTool: async (name) => JSON.stringify({ status: 'error', message: `Unknown tool: ${name}` }),
    })
    try {
      console.log(`[REPAIR] Repairing orchestrator output (${rawOutput.length} chars)`)
      return await session.run(buildRepairPrompt(rawOutput, maxChars))
    } finally {
      session.close()
    }
  }
}
