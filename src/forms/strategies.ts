/**
 * Fill strategies: interchangeable ways of writing template values into a
 * fillable PDF. The fill engine tries them in order until one succeeds.
 *
 * AcroFormStrategy goes through pdf-lib's high-level field API and rebuilds
 * every appearance stream with the standard font. RawFieldStrategy edits the
 * AcroForm dictionaries directly and leaves appearances to the viewer, which
 * lets it fill documents the first strategy rejects: encrypted files, text
 * the standard font cannot encode, fields with malformed widgets.
 *
 * Both refuse a field name the document does not define.
 */

import {
  PDFAcroCheckBox,
  PDFAcroChoice,
  PDFAcroPushButton,
  PDFAcroRadioButton,
  PDFAcroSignature,
  PDFAcroTerminal,
  PDFAcroText,
  PDFBool,
  PDFButton,
  PDFCheckBox,
  PDFDocument,
  PDFDropdown,
  PDFHexString,
  PDFName,
  PDFOptionList,
  PDFRadioGroup,
  PDFSignature,
  PDFTextField,
} from 'pdf-lib'
import type { PDFField } from 'pdf-lib'
import type { FieldValues } from '../model/types.ts'
import { stripXfa } from './extractor.ts'

export interface FillStrategy {
  readonly name: string
  /** Resolves to the filled document, or rejects with the reason it could not. */
  tryFill(document: Uint8Array, fields: FieldValues): Promise<Uint8Array>
}

const CHECKED_VALUES = new Set(['true', 'yes', 'on', '1', 'x', 'checked'])

export function isChecked(value: string): boolean {
  return CHECKED_VALUES.has(value.trim().toLowerCase())
}

/** `"a, b"` → `["a", "b"]` for multi-select lists. */
export function splitSelection(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '')
}

// ── Primary: high-level field API ────────────────────────────

function applyValue(field: PDFField, value: string): void {
  if (field instanceof PDFTextField) {
    field.setText(value === '' ? undefined : value)
  } else if (field instanceof PDFCheckBox) {
    if (isChecked(value)) field.check()
    else field.uncheck()
  } else if (field instanceof PDFRadioGroup) {
    if (value === '') field.clear()
    else field.select(value)
  } else if (field instanceof PDFDropdown) {
    if (value === '') field.clear()
    else field.select(value)
  } else if (field instanceof PDFOptionList) {
    const selection = splitSelection(value)
    if (selection.length === 0) field.clear()
    else field.select(selection)
  } else if (value !== '') {
    const kind = field instanceof PDFButton ? 'push button' : field instanceof PDFSignature ? 'signature' : 'field of unknown type'
    throw new Error(`field '${field.getName()}' is a ${kind} and cannot take a value`)
  }
}

export class AcroFormStrategy implements FillStrategy {
  readonly name = 'acroform'

  async tryFill(document: Uint8Array, fields: FieldValues): Promise<Uint8Array> {
    // Encrypted or signed documents are left to the raw strategy.
    const doc = await PDFDocument.load(document)
    stripXfa(doc)
    const form = doc.getForm()
    for (const [name, value] of fields) {
      applyValue(form.getField(name), value)
    }
    return doc.save({ updateFieldAppearances: true })
  }
}

// ── Secondary: raw AcroForm dictionaries ─────────────────────

function terminalFields(doc: PDFDocument): Map<string, PDFAcroTerminal> {
  const acroForm = doc.catalog.getAcroForm()
  if (!acroForm) throw new Error('document has no interactive form')

  const byName = new Map<string, PDFAcroTerminal>()
  for (const [field] of acroForm.getAllFields()) {
    if (!(field instanceof PDFAcroTerminal)) continue
    const name = field.getFullyQualifiedName()
    if (name !== undefined) byName.set(name, field)
  }
  return byName
}

function writeRawValue(name: string, field: PDFAcroTerminal, value: string): void {
  const V = PDFName.of('V')

  if (field instanceof PDFAcroText || field instanceof PDFAcroChoice) {
    if (value === '') field.dict.delete(V)
    else field.dict.set(V, PDFHexString.fromText(value))
    return
  }

  if (field instanceof PDFAcroCheckBox) {
    const on = field.getOnValue()
    if (isChecked(value) && !on) throw new Error(`checkbox '${name}' has no on state`)
    field.setValue(isChecked(value) && on ? on : PDFName.of('Off'))
    return
  }

  if (field instanceof PDFAcroRadioButton) {
    if (value === '') {
      field.setValue(PDFName.of('Off'))
      return
    }
    // With /Opt present, states are named by option index.
    const index = field.getExportValues()?.findIndex((opt) => opt.decodeText() === value) ?? -1
    const state =
      index >= 0 ? PDFName.of(String(index)) : field.getOnValues().find((on) => on.decodeText() === value)
    if (!state) throw new Error(`radio group '${name}' has no option '${value}'`)
    field.setValue(state)
    return
  }

  if (value === '') return
  if (field instanceof PDFAcroPushButton || field instanceof PDFAcroSignature) {
    throw new Error(`field '${name}' cannot take a value`)
  }
  field.dict.set(V, PDFHexString.fromText(value))
}

export class RawFieldStrategy implements FillStrategy {
  readonly name = 'raw-acroform'

  async tryFill(document: Uint8Array, fields: FieldValues): Promise<Uint8Array> {
    const doc = await PDFDocument.load(document, { ignoreEncryption: true })
    stripXfa(doc)
    const byName = terminalFields(doc)

    for (const [name, value] of fields) {
      const field = byName.get(name)
      if (!field) throw new Error(`no form field named '${name}'`)
      writeRawValue(name, field, value)
    }

    const acroForm = doc.catalog.getAcroForm()
    acroForm?.dict.set(PDFName.of('NeedAppearances'), PDFBool.True)
    return doc.save({ updateFieldAppearances: false })
  }
}

export function defaultStrategies(): FillStrategy[] {
  return [new AcroFormStrategy(), new RawFieldStrategy()]
}
