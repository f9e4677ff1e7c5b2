/**
 * Issue string utilities.
 *
 * Issue string format: [SEVERITY:TYPE:EXPECTED:DETECTED] Human-readable description
 * Examples:
 *   [ERROR:invalid_iban:iban:BE00 1234] IBAN checksum does not match
 *   [WARNING:chunk_storage::] Chunk storage failed: connection reset
 */

export type IssueSeverity = 'error' | 'warning'

export interface ParsedIssue {
  severity: IssueSeverity
  type: string
  expected: string | null
  detected: string | null
  description: string
}

export function formatIssue(
  severity: IssueSeverity,
  type: string,
  description: string,
  expected: string | null = null,
  detected: string | null = null
): string {
  return `[${severity.toUpperCase()}:${type}:${expected ?? ''}:${detected ?? ''}] ${description}`
}

function normalizeSeverity(raw: string): IssueSeverity {
  const lower = raw.toLowerCase()
  if (lower === 'error' || lower === 'critical') return 'error'
  return 'warning'
}

export function parseIssue(issue: string): ParsedIssue {
  // Full format: [SEVERITY:TYPE:EXPECTED:DETECTED] description
  const fullMatch = issue.match(/^\[(\w+):(\w+):([^:]*):([^\]]*)\]\s*(.+)$/)
  if (fullMatch) {
    const [, severity, type, expected, detected, description] = fullMatch
    return {
      severity: normalizeSeverity(severity),
      type,
      expected: expected || null,
      detected: detected || null,
      description,
    }
  }

  // Plain strings from the model are advisory
  return {
    severity: 'warning',
    type: 'other',
    expected: null,
    detected: null,
    description: issue,
  }
}

export function hasErrors(issues: string[]): boolean {
  return issues.some(issue => parseIssue(issue).severity === 'error')
}

/**
 * Concatenate issue lists, keeping first occurrence order and dropping duplicates.
 */
export function mergeIssues(...lists: Array<readonly string[] | null | undefined>): string[] {
  const seen = new Set<string>()
  const merged: string[] = []
  for (const list of lists) {
    for (const issue of list ?? []) {
      if (!seen.has(issue)) {
        seen.add(issue)
        merged.push(issue)
      }
    }
  }
  return merged
}
