/**
 * Keyword Table
 *
 * Ordered list of (category, keywords) pairs. The position of an entry is its
 * classification priority: the classifier walks entries front to back and the
 * first entry with any matching keyword wins.
 */

import fs from 'fs';
import bundledKeywordTable from '../../data/keyword-table.json';
import { config } from '../config';
import { KeywordTableError } from '../errors';
import { logger } from '../logger';
import { validateKeywordTableDocument } from '../schemas';
import { isKeywordCategory, type Category, type KeywordCategory } from '../types';

export interface KeywordTableEntry {
  readonly category: KeywordCategory;
  readonly keywords: readonly string[];
}

export interface KeywordTable {
  readonly version: string;
  readonly entries: readonly KeywordTableEntry[];
}

export interface KeywordTableInput {
  category: string;
  keywords: readonly string[];
}

/**
 * Build an immutable keyword table, rejecting configurations that could never
 * classify correctly (unknown or duplicated categories, keywords that are not
 * lower case). Duplicate keywords inside one entry are dropped, keeping the
 * first occurrence.
 */
export function createKeywordTable(
  inputs: readonly KeywordTableInput[],
  version = 'inline'
): KeywordTable {
  if (inputs.length === 0) {
    throw new KeywordTableError('Keyword table has no entries');
  }

  const seen = new Set<KeywordCategory>();
  const entries: KeywordTableEntry[] = [];

  for (const [index, input] of inputs.entries()) {
    const { category } = input;
    if (!isKeywordCategory(category)) {
      throw new KeywordTableError(`Entry ${index}: "${category}" is not a keyword category`);
    }
    if (seen.has(category)) {
      throw new KeywordTableError(`Entry ${index}: category "${category}" appears more than once`);
    }
    seen.add(category);

    const keywords: string[] = [];
    for (const keyword of input.keywords) {
      if (keyword.trim() !== keyword || keyword.length === 0) {
        throw new KeywordTableError(`Entry ${index} (${category}): keyword "${keyword}" is blank or padded`);
      }
      if (keyword.toLowerCase() !== keyword) {
        throw new KeywordTableError(`Entry ${index} (${category}): keyword "${keyword}" is not lower case`);
      }
      if (!keywords.includes(keyword)) {
        keywords.push(keyword);
      }
    }
    if (keywords.length === 0) {
      throw new KeywordTableError(`Entry ${index} (${category}): no keywords`);
    }

    entries.push(Object.freeze({ category, keywords: Object.freeze(keywords) }));
  }

  return Object.freeze({ version, entries: Object.freeze(entries) });
}

function tableFromDocument(document: unknown, source: string): KeywordTable {
  const validation = validateKeywordTableDocument(document);
  if (!validation.valid) {
    throw new KeywordTableError(`${source}: ${validation.errors.join('; ')}`);
  }
  return createKeywordTable(validation.value.entries, validation.value.version);
}

/**
 * Load a keyword table from a JSON file on disk.
 */
export function loadKeywordTable(filePath: string): KeywordTable {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new KeywordTableError(
      `Cannot read keyword table ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const table = tableFromDocument(document, filePath);
  logger.info('Loaded keyword table', {
    path: filePath,
    version: table.version,
    categories: table.entries.length,
  });
  return table;
}

let defaultTable: KeywordTable | null = null;

/**
 * The process-wide table: KEYWORD_TABLE_PATH when set, otherwise the bundled
 * data/keyword-table.json. Loaded on first use and shared read-only after.
 */
export function defaultKeywordTable(): KeywordTable {
  if (!defaultTable) {
    defaultTable = config.keywordTablePath
      ? loadKeywordTable(config.keywordTablePath)
      : tableFromDocument(bundledKeywordTable, 'bundled keyword table');
  }
  return defaultTable;
}

/**
 * Priority index of a category in the table, or -1 when it has no entry
 * (the sentinel categories never do).
 */
export function categoryPriority(table: KeywordTable, category: Category): number {
  return table.entries.findIndex((entry) => entry.category === category);
}
