/**
 * Field discovery for fillable PDFs.
 *
 * Field names come straight from pdf-lib's fully-qualified names and are
 * never trimmed or re-cased, so a template exported here lists exactly the
 * names listFields() reports for the same document.
 */

import { readFile } from 'node:fs/promises'
import {
  PDFButton,
  PDFCheckBox,
  PDFDict,
  PDFDocument,
  PDFDropdown,
  PDFName,
  PDFOptionList,
  PDFRadioGroup,
  PDFSignature,
  PDFTextField,
} from 'pdf-lib'
import type { PDFField } from 'pdf-lib'
import { loadProvenance } from '../catalog/provenance.ts'
import { ExtractError, errorMessage } from '../errors.ts'
import type { Provenance, Template } from '../model/types.ts'
import type { Log } from '../utils/logger.ts'
import { buildTemplate, writeTemplate } from './template.ts'

export type FieldKind =
  | 'text'
  | 'checkbox'
  | 'radio'
  | 'dropdown'
  | 'optionList'
  | 'button'
  | 'signature'
  | 'unknown'

export interface FieldDescriptor {
  name: string
  kind: FieldKind
  readOnly: boolean
  /** Choices for radio groups, dropdowns and option lists. */
  options?: string[]
}

export function fieldKind(field: PDFField): FieldKind {
  if (field instanceof PDFTextField) return 'text'
  if (field instanceof PDFCheckBox) return 'checkbox'
  if (field instanceof PDFRadioGroup) return 'radio'
  if (field instanceof PDFDropdown) return 'dropdown'
  if (field instanceof PDFOptionList) return 'optionList'
  if (field instanceof PDFButton) return 'button'
  if (field instanceof PDFSignature) return 'signature'
  return 'unknown'
}

function describeField(field: PDFField): FieldDescriptor {
  const descriptor: FieldDescriptor = {
    name: field.getName(),
    kind: fieldKind(field),
    readOnly: field.isReadOnly(),
  }
  if (field instanceof PDFRadioGroup || field instanceof PDFDropdown || field instanceof PDFOptionList) {
    descriptor.options = field.getOptions()
  }
  return descriptor
}

/**
 * Drop the XFA entry from the in-memory copy before anything calls
 * `getForm()`, which would otherwise remove it with a console warning. Only
 * AcroForm fields are listed and filled.
 */
export function stripXfa(doc: PDFDocument): boolean {
  const acroForm = doc.catalog.lookupMaybe(PDFName.of('AcroForm'), PDFDict)
  if (!acroForm?.has(PDFName.of('XFA'))) return false
  acroForm.delete(PDFName.of('XFA'))
  return true
}

export async function listFieldDescriptors(bytes: Uint8Array): Promise<FieldDescriptor[]> {
  try {
    const doc = await PDFDocument.load(bytes, { ignoreEncryption: true })
    stripXfa(doc)
    return doc.getForm().getFields().map(describeField)
  } catch (err) {
    throw new ExtractError('ListFieldsFailed', `failed to extract form fields: ${errorMessage(err)}`, {
      stage: 'list_fields',
      cause: err,
    })
  }
}

export async function listFields(bytes: Uint8Array): Promise<string[]> {
  const descriptors = await listFieldDescriptors(bytes)
  return descriptors.map((d) => d.name)
}

export async function readDocument(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path))
  } catch (err) {
    throw new ExtractError('ListFieldsFailed', `failed to open ${path}: ${errorMessage(err)}`, {
      stage: 'list_fields',
      cause: err,
    })
  }
}

export async function listFieldsInFile(path: string): Promise<string[]> {
  return listFields(await readDocument(path))
}

/**
 * Discover the fields of `documentPath` and write an empty template for it
 * to `destination`. An existing provenance sidecar is copied into the
 * template; a missing or unreadable one is skipped.
 */
export async function exportTemplate(documentPath: string, destination: string, log?: Log): Promise<Template> {
  const names = await listFieldsInFile(documentPath)

  let provenance: Provenance | undefined
  try {
    provenance = await loadProvenance(documentPath)
  } catch (err) {
    log?.warn('Ignoring unreadable provenance metadata', { documentPath, error: errorMessage(err) })
  }

  const template = buildTemplate(documentPath, names, provenance)
  try {
    await writeTemplate(destination, template)
  } catch (err) {
    throw new ExtractError('ExportFailed', `failed to write template ${destination}: ${errorMessage(err)}`, {
      stage: 'export_template',
      cause: err,
    })
  }
  return template
}
