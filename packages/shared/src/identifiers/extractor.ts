/**
 * Identifier Extractor
 *
 * Pulls a checksum-valid TCKN or VKN out of recognized text. A TCKN anywhere
 * in the text beats any VKN: documents that carry both an individual's and a
 * company's number are filed under the individual.
 */

import type { NationalIdentifier } from '../types';
import { isValidPersonalId, isValidTaxId } from './checksums';

export interface DigitRun {
  value: string;
  index: number;
}

const DIGIT_RUN_PATTERN = /[0-9]+/g;

/**
 * Maximal runs of ASCII digits, in order of appearance.
 */
export function findDigitRuns(text: string): DigitRun[] {
  return Array.from(text.matchAll(DIGIT_RUN_PATTERN), (match) => ({
    value: match[0],
    index: match.index ?? 0,
  }));
}

function firstValid(
  runs: DigitRun[],
  length: number,
  isValid: (candidate: string) => boolean
): string | null {
  const run = runs.find((r) => r.value.length === length && isValid(r.value));
  return run ? run.value : null;
}

export function extractPersonalId(text: string): string | null {
  return firstValid(findDigitRuns(text), 11, isValidPersonalId);
}

export function extractTaxId(text: string): string | null {
  return firstValid(findDigitRuns(text), 10, isValidTaxId);
}

/**
 * Extract the identifier of record from text, or null when no candidate
 * passes its checksum.
 */
export function extractIdentifier(text: string): NationalIdentifier | null {
  const runs = findDigitRuns(text);

  const personal = firstValid(runs, 11, isValidPersonalId);
  if (personal) {
    return { kind: 'personal', value: personal };
  }

  const tax = firstValid(runs, 10, isValidTaxId);
  if (tax) {
    return { kind: 'tax', value: tax };
  }

  return null;
}
