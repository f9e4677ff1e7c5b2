import type { JsonValue, ProcessingStep } from '../../types.js'

export interface TraceEntry {
  action: string
  tool?: string | null
  durationMs: number
  input?: JsonValue | null
  output?: JsonValue | null
  notes?: string | null
}

// Step payloads are stored as deep-frozen copies of what was recorded
function freezeJson(value: JsonValue): JsonValue {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) freezeJson(child)
    Object.freeze(value)
  }
  return value
}

function snapshotJson(value: JsonValue | null | undefined): JsonValue | null {
  return value === undefined || value === null ? null : freezeJson(structuredClone(value))
}

/**
 * Append-only audit trail for one orchestration run.
 *
 * Step numbers start at 1 and are assigned when `record` is called, so the
 * order of the trail is the order in which operations completed. `record` is
 * synchronous: the primary agent session and the repair sub-agent share one
 * collector without interleaving a step.
 */
export class TraceCollector {
  private readonly steps: ProcessingStep[] = []

  record(entry: TraceEntry): ProcessingStep {
    const step: ProcessingStep = Object.freeze({
      step: this.steps.length + 1,
      action: entry.action,
      tool: entry.tool ?? null,
      durationMs: Math.max(0, Math.round(entry.durationMs)),
      input: snapshotJson(entry.input),
      output: snapshotJson(entry.output),
      notes: entry.notes ?? null,
      timestamp: new Date().toISOString(),
    })
    this.steps.push(step)
    return step
  }

  snapshot(): readonly ProcessingStep[] {
    return Object.freeze([...this.steps])
  }

  get size(): number {
    return this.steps.length
  }
}
