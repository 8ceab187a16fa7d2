/**
 * Canonical JSON templates: field name → value, plus the document they
 * belong to and its provenance.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { FillError, errorMessage } from '../errors.ts'
import { describeIssues, templateFromWire, templateToWire, templateWireSchema } from '../model/schemas.ts'
import type { FieldValues, Provenance, Template } from '../model/types.ts'

/**
 * Template for a freshly inspected document: every discovered field, in
 * discovery order, with an empty value. Names are kept byte-for-byte.
 */
export function buildTemplate(
  documentReference: string,
  fieldNames: readonly string[],
  provenance?: Provenance,
): Template {
  const fields: FieldValues = new Map()
  for (const name of fieldNames) fields.set(name, '')
  return {
    documentReference,
    ...(provenance ? { provenance } : {}),
    fields,
  }
}

export function serializeTemplate(template: Template): string {
  return JSON.stringify(templateToWire(template), null, 2) + '\n'
}

export function parseTemplate(raw: string, source: string): Template {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new FillError('InvalidTemplate', `${source} is not valid JSON: ${errorMessage(err)}`, {
      stage: 'load_template',
      cause: err,
    })
  }
  const parsed = templateWireSchema.safeParse(json)
  if (!parsed.success) {
    throw new FillError('InvalidTemplate', `${source} is not a template: ${describeIssues(parsed.error).join('; ')}`, {
      stage: 'load_template',
      context: { issues: describeIssues(parsed.error) },
    })
  }
  return templateFromWire(parsed.data)
}

export async function readTemplate(path: string): Promise<Template> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    throw new FillError('InvalidTemplate', `failed to read template ${path}: ${errorMessage(err)}`, {
      stage: 'load_template',
      cause: err,
    })
  }
  return parseTemplate(raw, path)
}

export async function writeTemplate(path: string, template: Template): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, serializeTemplate(template), 'utf-8')
}
