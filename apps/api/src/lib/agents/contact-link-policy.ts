/**
 * Contact link decision policy.
 *
 * Decides whether a resolved counterparty may be linked to an existing contact
 * automatically, only suggested, or left unset. Pure rule table: no lookups.
 */

import type { ContactEvidence, ContactLinkPolicy, LinkDecision, LinkDecisionType } from '../../types.js'

export const STRONG_SIGNAL_NAME_SIMILARITY = 0.93

export interface LinkCandidate {
  contactId: string | null
  evidence: ContactEvidence
}

function isExactVatMatch(evidence: ContactEvidence): boolean {
  return evidence.vatValid === true &&
    evidence.vatMatched === true &&
    evidence.ambiguityCount === 1
}

function hasStrongSignals(evidence: ContactEvidence): boolean {
  return (evidence.nameSimilarity ?? 0) >= STRONG_SIGNAL_NAME_SIMILARITY &&
    evidence.ibanMatched === true &&
    evidence.addressMatched === true &&
    evidence.ambiguityCount === 1
}

export function allowsAutoLink(policy: ContactLinkPolicy, evidence: ContactEvidence): boolean {
  switch (policy) {
    case 'VAT_ONLY':
      return isExactVatMatch(evidence)
    case 'VAT_OR_STRONG_SIGNALS':
      return isExactVatMatch(evidence) || hasStrongSignals(evidence)
    default: {
      const unknown: never = policy
      throw new Error(`Unknown contact link policy: ${String(unknown)}`)
    }
  }
}

export function decideLinkType(policy: ContactLinkPolicy, candidate: LinkCandidate): LinkDecisionType {
  if (!candidate.contactId) return 'NONE'
  return allowsAutoLink(policy, candidate.evidence) ? 'AUTO_LINK' : 'SUGGEST'
}

/**
 * Build a full link decision for a candidate. SUGGEST keeps the caller's
 * confidence; AUTO_LINK and NONE carry none.
 */
export function decideContactLink(
  policy: ContactLinkPolicy,
  candidate: LinkCandidate,
  reason: string,
  suggestConfidence: number | null = null
): LinkDecision {
  const type = decideLinkType(policy, candidate)
  return {
    type,
    contactId: type === 'NONE' ? null : candidate.contactId,
    reason,
    confidence: type === 'SUGGEST' ? suggestConfidence : null,
    evidence: candidate.evidence,
  }
}

/**
 * Contact-linking rules rendered into the orchestrator's system prompt.
 */
export function describeLinkPolicy(policy: ContactLinkPolicy): string {
  const vatRule = `- AUTO_LINK only when the counterparty VAT number was extracted, is valid, and lookup_contact returned exactly one contact with matchType "EXACT".`
  const fallbackRule = `- Otherwise use SUGGEST (with linkDecisionConfidence) when you have a plausible candidate, or NONE when you do not.`

  if (policy === 'VAT_ONLY') {
    return [
      'CONTACT LINKING POLICY: VAT_ONLY',
      vatRule,
      '- Never AUTO_LINK on name, IBAN or address similarity alone.',
      fallbackRule,
    ].join('\n')
  }

  return [
    'CONTACT LINKING POLICY: VAT_OR_STRONG_SIGNALS',
    vatRule,
    `- Without a VAT match, AUTO_LINK is allowed only when ALL hold: name similarity >= ${STRONG_SIGNAL_NAME_SIMILARITY}, IBAN matched, address matched, exactly one candidate.`,
    fallbackRule,
  ].join('\n')
}
