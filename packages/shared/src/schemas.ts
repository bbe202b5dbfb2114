/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for keyword tables and queue payloads.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { KeywordTableDocument } from './types';
import type { ClassifyDocumentJob } from './queues';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output in dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;

    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (isSchemaObject(parsed)) {
      return parsed;
    }
    logger.warn('Schema file is not a JSON object, skipping', { schemaPath });
  }

  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

// Compiled validators - lazy loaded on first use
let keywordTableValidator: ValidateFunction<KeywordTableDocument> | null = null;
let classifyJobValidator: ValidateFunction<ClassifyDocumentJob> | null = null;

function getKeywordTableValidator(): ValidateFunction<KeywordTableDocument> {
  if (!keywordTableValidator) {
    keywordTableValidator = ajv.compile<KeywordTableDocument>(loadSchema('keyword_table.schema.json'));
  }
  return keywordTableValidator;
}

function getClassifyJobValidator(): ValidateFunction<ClassifyDocumentJob> {
  if (!classifyJobValidator) {
    classifyJobValidator = ajv.compile<ClassifyDocumentJob>(
      loadSchema('classify_document_job.schema.json')
    );
  }
  return classifyJobValidator;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function runValidator<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string
): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a parsed keyword table file against keyword_table.schema.json
 */
export function validateKeywordTableDocument(data: unknown): ValidationResult<KeywordTableDocument> {
  return runValidator(getKeywordTableValidator(), data, 'KeywordTable');
}

/**
 * Validate a classify_document job payload
 */
export function validateClassifyJob(data: unknown): ValidationResult<ClassifyDocumentJob> {
  return runValidator(getClassifyJobValidator(), data, 'ClassifyDocumentJob');
}
