/**
 * Zod runtime validation schemas for every JSON document formdesk reads:
 * provenance sidecars, templates and cases. They describe the snake_case wire
 * format and complement (but do not replace) the TypeScript types in types.ts.
 */

import { z } from 'zod'
import type { Case, FieldValues, Provenance, Template, ValidationStatus } from './types.ts'

// ── Reusable validators ──────────────────────────────────────────

const isoTimestamp = z.string().datetime({ offset: true })

/**
 * Field values are strings; JSON null is read as an empty value. Every own
 * key is kept, in the order JSON.parse produced them.
 */
const fieldValuesSchema = z.unknown().transform((raw, ctx): FieldValues => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an object of field values' })
    return z.NEVER
  }
  const fields: FieldValues = new Map()
  for (const [name, value] of Object.entries(raw)) {
    if (value === null) fields.set(name, '')
    else if (typeof value === 'string') fields.set(name, value)
    else ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: 'Expected string or null' })
  }
  return fields
})

/**
 * JSON.parse lists integer-like keys first, so files whose field order would
 * not survive that carry it separately in `field_order`.
 */
const fieldOrderSchema = z.array(z.string()).optional()

function inFieldOrder(fields: FieldValues, order: string[] | undefined): FieldValues {
  if (!order || order.length !== fields.size || new Set(order).size !== order.length) return fields
  if (!order.every((name) => fields.has(name))) return fields
  return new Map(order.map((name): [string, string] => [name, fields.get(name) ?? '']))
}

interface FieldsWire {
  fields: Record<string, string>
  field_order?: string[]
}

function fieldsToWire(fields: FieldValues): FieldsWire {
  const record = Object.fromEntries(fields)
  const names = [...fields.keys()]
  const reordered = Object.keys(record).some((name, i) => name !== names[i])
  return reordered ? { fields: record, field_order: names } : { fields: record }
}

// ── Provenance ───────────────────────────────────────────────────

export const provenanceWireSchema = z.object({
  origin_form_code: z.string(),
  origin_region: z.string(),
  source_url: z.string(),
  downloaded_at: isoTimestamp,
  inspected_at: isoTimestamp.optional(),
})

export type ProvenanceWire = z.input<typeof provenanceWireSchema>

// ── Template ─────────────────────────────────────────────────────

/** `pdf_url` is accepted as the older name of `document_reference`. */
export const templateWireSchema = z
  .object({
    document_reference: z.string().optional(),
    pdf_url: z.string().optional(),
    provenance: provenanceWireSchema.optional(),
    fields: fieldValuesSchema,
    field_order: fieldOrderSchema,
  })
  .transform(({ document_reference, pdf_url, field_order, ...rest }) => ({
    ...rest,
    fields: inFieldOrder(rest.fields, field_order),
    document_reference: document_reference || pdf_url || '',
  }))

export interface TemplateWire extends FieldsWire {
  document_reference: string
  provenance?: ProvenanceWire
}

// ── Case ─────────────────────────────────────────────────────────

export const validationWireSchema = z.object({
  valid: z.boolean(),
  missing_fields: z.array(z.string()).default([]),
  invalid_fields: z.array(z.string()).default([]),
  checked_at: isoTimestamp,
})

export const caseWireSchema = z.object({
  case_metadata: z.object({
    case_id: z.string().min(1),
    case_name: z.string(),
    entity: z.string().min(1).optional(),
    created_at: isoTimestamp,
    updated_at: isoTimestamp,
  }),
  form_reference: z.object({
    form_code: z.string().min(1),
    template_path: z.string().optional(),
    document_reference: z.string().optional(),
  }),
  fields: fieldValuesSchema,
  field_order: fieldOrderSchema,
  validation: validationWireSchema.optional(),
})

export type CaseWire = Omit<z.input<typeof caseWireSchema>, 'fields'> & FieldsWire

// ── Mapping ──────────────────────────────────────────────────────

export function provenanceFromWire(wire: z.output<typeof provenanceWireSchema>): Provenance {
  const prov: Provenance = {
    originFormCode: wire.origin_form_code,
    originRegion: wire.origin_region,
    sourceUrl: wire.source_url,
    downloadedAt: wire.downloaded_at,
  }
  if (wire.inspected_at) prov.inspectedAt = wire.inspected_at
  return prov
}

export function provenanceToWire(prov: Provenance): ProvenanceWire {
  return {
    origin_form_code: prov.originFormCode,
    origin_region: prov.originRegion,
    source_url: prov.sourceUrl,
    downloaded_at: prov.downloadedAt,
    ...(prov.inspectedAt ? { inspected_at: prov.inspectedAt } : {}),
  }
}

export function templateFromWire(wire: z.output<typeof templateWireSchema>): Template {
  return {
    documentReference: wire.document_reference,
    ...(wire.provenance ? { provenance: provenanceFromWire(wire.provenance) } : {}),
    fields: wire.fields,
  }
}

export function templateToWire(template: Template): TemplateWire {
  return {
    document_reference: template.documentReference,
    ...(template.provenance ? { provenance: provenanceToWire(template.provenance) } : {}),
    ...fieldsToWire(template.fields),
  }
}

function validationFromWire(wire: z.output<typeof validationWireSchema>): ValidationStatus {
  return {
    valid: wire.valid,
    missingFields: wire.missing_fields,
    invalidFields: wire.invalid_fields,
    checkedAt: wire.checked_at,
  }
}

/** `entity` is taken from the file when present, else from `fallbackEntity`. */
export function caseFromWire(wire: z.output<typeof caseWireSchema>, fallbackEntity = ''): Case {
  const c: Case = {
    caseId: wire.case_metadata.case_id,
    caseName: wire.case_metadata.case_name,
    entity: wire.case_metadata.entity ?? fallbackEntity,
    createdAt: wire.case_metadata.created_at,
    updatedAt: wire.case_metadata.updated_at,
    formCode: wire.form_reference.form_code,
    fields: inFieldOrder(wire.fields, wire.field_order),
  }
  if (wire.form_reference.template_path) c.templateReference = wire.form_reference.template_path
  if (wire.form_reference.document_reference) c.documentReference = wire.form_reference.document_reference
  if (wire.validation) c.validation = validationFromWire(wire.validation)
  return c
}

export function caseToWire(c: Case): CaseWire {
  return {
    case_metadata: {
      case_id: c.caseId,
      case_name: c.caseName,
      entity: c.entity,
      created_at: c.createdAt,
      updated_at: c.updatedAt,
    },
    form_reference: {
      form_code: c.formCode,
      ...(c.templateReference ? { template_path: c.templateReference } : {}),
      ...(c.documentReference ? { document_reference: c.documentReference } : {}),
    },
    ...fieldsToWire(c.fields),
    ...(c.validation
      ? {
          validation: {
            valid: c.validation.valid,
            missing_fields: c.validation.missingFields,
            invalid_fields: c.validation.invalidFields,
            checked_at: c.validation.checkedAt,
          },
        }
      : {}),
  }
}

/** Flatten zod issues into `path: message` strings for logs and HTTP replies. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  )
}
