/**
 * Domain types shared across the catalog, extractor, fill engine and case store.
 *
 * These are the in-memory shapes. The JSON written to disk uses snake_case
 * keys; see schemas.ts for the wire format and the mapping functions.
 */

// ── Catalog ──────────────────────────────────────────────────

export interface CatalogEntry {
  region: string
  formName: string
  /** Unique within a catalog, compared case-insensitively. */
  formCode: string
  description: string
  /** PDF, DOCX, ... as written in the source. */
  format: string
  sourceUrl: string
  infoUrl: string
  onlineAvailable: boolean
  notes: string
}

// ── Provenance ───────────────────────────────────────────────

export interface Provenance {
  originFormCode: string
  originRegion: string
  sourceUrl: string
  /** ISO-8601 */
  downloadedAt: string
  /** ISO-8601; set when the document was last inspected. */
  inspectedAt?: string
}

// ── Templates ────────────────────────────────────────────────

/**
 * Field name → value, in field discovery order. A Map keeps names such as
 * `2` or `__proto__` where a plain object would reorder or drop them.
 */
export type FieldValues = Map<string, string>

export interface Template {
  /** Local path or http(s) URL of the fillable document. */
  documentReference: string
  provenance?: Provenance
  fields: FieldValues
}

// ── Cases ────────────────────────────────────────────────────

export interface ValidationStatus {
  valid: boolean
  missingFields: string[]
  invalidFields: string[]
  checkedAt: string
}

export interface Case {
  caseId: string
  caseName: string
  entity: string
  createdAt: string
  updatedAt: string
  formCode: string
  /** Path of the template this case was prepared against. */
  templateReference?: string
  /** Document to fill; overrides the template's own reference. */
  documentReference?: string
  fields: FieldValues
  validation?: ValidationStatus
}
