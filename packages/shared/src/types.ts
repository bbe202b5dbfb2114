/**
 * Shared TypeScript Types
 *
 * Types for the document triage pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Categories
// ============================================================================

/**
 * Every category a document can end up in. The keyword categories are listed
 * in the bundled priority order; the two sentinels come last.
 */
export const CATEGORIES = [
  'trade-registry-gazette',
  'digital-abf-commitment',
  'kvkk-explicit-consent',
  'factoring-agreement',
  'power-of-attorney',
  'signature-declaration',
  'abf',
  'identity-card',
  'invoice',
  'cheque',
  'promissory-note',
  'contract',
  'residence-certificate',
  'driver-license',
  'population-register',
  'tax-plate',
  'offset-and-payment-order',
  'unprocessed-return-payment-order',
  'activity-certificate',
  'independent-audit-certificate',
  'unclassified',
  'processing-error',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** No keyword of any category matched in any attempt. */
export const UNCLASSIFIED = 'unclassified' satisfies Category;

/** The document could not be acquired or processed at all. */
export const PROCESSING_ERROR = 'processing-error' satisfies Category;

export type SentinelCategory = typeof UNCLASSIFIED | typeof PROCESSING_ERROR;

/** Categories that can appear in a keyword table. */
export type KeywordCategory = Exclude<Category, SentinelCategory>;

function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

export function isKeywordCategory(value: string): value is KeywordCategory {
  return isCategory(value) && value !== UNCLASSIFIED && value !== PROCESSING_ERROR;
}

// ============================================================================
// Images & Recognition
// ============================================================================

export type RotationAngle = 0 | 90 | 180 | 270;

export type ImageScale = 'native' | 'upscaled';

/**
 * One in-memory raster derived from a source document. Owned by the attempt
 * that produced it.
 */
export interface ImageVariant {
  data: Buffer;
  orientation: RotationAngle;
  scale: ImageScale;
}

// ============================================================================
// Identifiers
// ============================================================================

/** personal = 11-digit TCKN, tax = 10-digit VKN */
export type IdentifierKind = 'personal' | 'tax';

export interface NationalIdentifier {
  readonly kind: IdentifierKind;
  readonly value: string;
}

// ============================================================================
// Outcomes
// ============================================================================

export type RecognitionAttempt =
  | { readonly kind: 'rotation'; readonly angle: RotationAngle }
  | { readonly kind: 'upscale'; readonly factor: number };

export type AttemptStatus = 'recognized' | 'failed' | 'timeout';

export interface AttemptRecord {
  readonly attempt: RecognitionAttempt;
  readonly status: AttemptStatus;
  readonly category: Category;
  readonly textLength: number;
  readonly durationMs: number;
}

export interface ProcessingFailure {
  readonly stage: 'acquisition';
  readonly message: string;
}

export interface ClassificationOutcome {
  readonly category: Category;
  readonly identifier: NationalIdentifier | null;
  readonly attempts: readonly AttemptRecord[];
  readonly failure?: ProcessingFailure;
}

// ============================================================================
// API Types
// ============================================================================

export interface ScanRequest {
  directory: string;
  max_documents: number | null;
}

export interface ScanResponse {
  correlation_id: string;
  enqueued: number;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

// ============================================================================
// Configuration Documents
// ============================================================================

/** On-disk shape of a keyword table (see keyword_table.schema.json) */
export interface KeywordTableDocument {
  version: string;
  entries: Array<{
    category: string;
    keywords: string[];
  }>;
}
