/**
 * Turkish National Identifier Checksums
 *
 * - TCKN: 11-digit personal identity number
 * - VKN: 10-digit tax number
 *
 * Both predicates are total: anything that is not a digit string of the right
 * length is rejected before any arithmetic.
 */

const PERSONAL_ID_PATTERN = /^[0-9]{11}$/;
const TAX_ID_PATTERN = /^[0-9]{10}$/;

/**
 * Non-negative residue modulo 10, also for negative intermediates.
 */
export function mod10(value: number): number {
  return ((value % 10) + 10) % 10;
}

function toDigits(candidate: string): number[] {
  return Array.from(candidate, (char) => char.charCodeAt(0) - 48);
}

/**
 * Validate an 11-digit personal identifier (TCKN).
 *
 * d1 must be non-zero, d10 = ((d1+d3+d5+d7+d9)*7 - (d2+d4+d6+d8)) mod 10
 * and d11 = (d1+...+d10) mod 10.
 */
export function isValidPersonalId(candidate: string): boolean {
  if (!PERSONAL_ID_PATTERN.test(candidate)) return false;

  const d = toDigits(candidate);
  if (d[0] === 0) return false;

  const firstTenSum = d.slice(0, 10).reduce((sum, digit) => sum + digit, 0);
  if (mod10(firstTenSum) !== d[10]) return false;

  const oddSum = d[0] + d[2] + d[4] + d[6] + d[8];
  const evenSum = d[1] + d[3] + d[5] + d[7];
  return mod10(oddSum * 7 - evenSum) === d[9];
}

/**
 * Per-digit contribution of the first nine VKN digits.
 */
function taxDigitContribution(digit: number, index: number): number {
  const shifted = (digit + 9 - index) % 10;
  if (shifted === 0) return 9;

  const weighted = (shifted * 2 ** (9 - index)) % 9;
  return weighted === 0 ? 9 : weighted;
}

/**
 * Validate a 10-digit tax identifier (VKN).
 */
export function isValidTaxId(candidate: string): boolean {
  if (!TAX_ID_PATTERN.test(candidate)) return false;

  const d = toDigits(candidate);
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += taxDigitContribution(d[i], i);
  }

  const checkDigit = (10 - (sum % 10)) % 10;
  return checkDigit === d[9];
}
