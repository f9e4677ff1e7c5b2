/**
 * Deterministic checks for financial identifiers found on invoices and bills.
 */

export interface FormatValidationResult {
  valid: boolean
  issue?: string
}

// Remainder of a long decimal string modulo 97, computed in chunks to stay within safe integers
function mod97(digits: string): number {
  let remainder = 0
  for (let i = 0; i < digits.length; i += 7) {
    remainder = Number(`${remainder}${digits.slice(i, i + 7)}`) % 97
  }
  return remainder
}

export function normalizeIdentifier(value: string): string {
  return value.replace(/[\s.\-/]/g, '').toUpperCase()
}

/**
 * Validate IBAN: country code, check digits, ISO 7064 mod-97 checksum
 */
export function validateIban(value: string): FormatValidationResult {
  const iban = normalizeIdentifier(value)
  if (!/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/.test(iban)) {
    return { valid: false, issue: `"${value}" is not a valid IBAN format` }
  }

  const rearranged = iban.slice(4) + iban.slice(0, 4)
  const digits = rearranged.replace(/[A-Z]/g, ch => String(ch.charCodeAt(0) - 55))
  return mod97(digits) === 1
    ? { valid: true }
    : { valid: false, issue: `"${value}" has an invalid IBAN checksum` }
}

/**
 * Validate Belgian structured payment reference (OGM/VCS): +++123/4567/89012+++
 */
export function validateOgm(value: string): FormatValidationResult {
  const digits = value.replace(/[+*/\s]/g, '')
  if (!/^\d{12}$/.test(digits)) {
    return { valid: false, issue: `"${value}" is not a structured reference (expected +++XXX/XXXX/XXXXX+++)` }
  }

  const base = Number(digits.slice(0, 10))
  const check = Number(digits.slice(10))
  const expected = base % 97 === 0 ? 97 : base % 97
  return expected === check
    ? { valid: true }
    : { valid: false, issue: `"${value}" has an invalid structured reference checksum` }
}

export function looksLikeOgm(value: string): boolean {
  return /^[+*]{3}\s*\d{3}\s*\/\s*\d{4}\s*\/\s*\d{5}\s*[+*]{3}$/.test(value.trim())
}

/**
 * Validate a VAT number. Belgian numbers get the mod-97 check; other EU
 * numbers only get a format check.
 */
export function validateVatNumber(value: string): FormatValidationResult {
  const vat = normalizeIdentifier(value)

  if (vat.startsWith('BE')) {
    const digits = vat.slice(2)
    if (!/^[01]\d{9}$/.test(digits)) {
      return { valid: false, issue: `"${value}" is not a valid Belgian VAT format (expected BE0XXXXXXXXX)` }
    }
    const base = Number(digits.slice(0, 8))
    const check = Number(digits.slice(8))
    return 97 - (base % 97) === check
      ? { valid: true }
      : { valid: false, issue: `"${value}" has an invalid Belgian VAT checksum` }
  }

  return /^[A-Z]{2}[A-Z0-9]{2,12}$/.test(vat)
    ? { valid: true }
    : { valid: false, issue: `"${value}" is not a valid VAT number format` }
}

export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null
  const cleaned = value.replace(/[€$£\s]/g, '')
  // European decimal comma: 1.234,56 or 12,50
  const normalized = /,\d{1,2}$/.test(cleaned)
    ? cleaned.replace(/\./g, '').replace(',', '.')
    : cleaned.replace(/,/g, '')
  if (!/^-?\d+(\.\d+)?$/.test(normalized)) return null
  return Number(normalized)
}

/**
 * subtotal + VAT must equal the total within one cent
 */
export function validateTotals(
  subtotal: unknown,
  vatAmount: unknown,
  total: unknown
): FormatValidationResult {
  const net = parseAmount(subtotal)
  const vat = parseAmount(vatAmount)
  const gross = parseAmount(total)
  if (net === null || vat === null || gross === null) {
    return { valid: true }
  }
  return Math.abs(net + vat - gross) <= 0.01
    ? { valid: true }
    : { valid: false, issue: `Subtotal ${net.toFixed(2)} + VAT ${vat.toFixed(2)} does not equal total ${gross.toFixed(2)}` }
}
