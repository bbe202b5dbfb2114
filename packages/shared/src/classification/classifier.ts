/**
 * Document Classifier
 *
 * First-match keyword classification. Entries are tested in table order and
 * the first category with any keyword occurring in the text wins, no matter
 * how many keywords a later category would match.
 */

import { UNCLASSIFIED, type Category, type KeywordCategory } from '../types';
import { defaultKeywordTable, type KeywordTable } from './keyword-table';

// Capital İ lower-cases to "i" followed by U+0307 COMBINING DOT ABOVE
const DOTTED_I = /i\u0307/g;

/**
 * Recognized text is compared lower-cased, with the dotted capital İ folded
 * to a plain "i". Idempotent.
 */
export function normalizeRecognizedText(text: string): string {
  return text.toLowerCase().replace(DOTTED_I, 'i');
}

export interface KeywordMatch {
  category: KeywordCategory;
  priority: number;
  /** Keywords of the winning entry that occur in the text */
  keywords: string[];
}

/**
 * Find the highest-priority entry with at least one keyword in the text.
 */
export function findFirstMatch(text: string, table: KeywordTable = defaultKeywordTable()): KeywordMatch | null {
  const normalized = normalizeRecognizedText(text);

  for (const [priority, entry] of table.entries.entries()) {
    const keywords = entry.keywords.filter((keyword) => normalized.includes(keyword));
    if (keywords.length > 0) {
      return { category: entry.category, priority, keywords };
    }
  }

  return null;
}

/**
 * Classify text into a document category. Any string, including the empty
 * one, yields a category.
 */
export function classify(text: string, table: KeywordTable = defaultKeywordTable()): Category {
  const normalized = normalizeRecognizedText(text);

  for (const entry of table.entries) {
    if (entry.keywords.some((keyword) => normalized.includes(keyword))) {
      return entry.category;
    }
  }

  return UNCLASSIFIED;
}
