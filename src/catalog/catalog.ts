/**
 * Forms catalog: a read-only index over the tabular form registry.
 *
 * Column order (header row is always skipped):
 *   region, form_name, form_code, description, format,
 *   direct_source_url, info_url, online_available, notes
 *
 * Loading is all-or-nothing: one short row or a duplicate form code rejects
 * the whole source.
 */

import { readFile } from 'node:fs/promises'
import { CatalogError, errorMessage } from '../errors.ts'
import type { CatalogEntry } from '../model/types.ts'
import { parseCSVRecords } from './csv.ts'

export const CATALOG_COLUMNS = [
  'region',
  'form_name',
  'form_code',
  'description',
  'format',
  'direct_source_url',
  'info_url',
  'online_available',
  'notes',
] as const

const TRUTHY = new Set(['true', 't', 'yes', 'y', '1'])

function parseBooleanish(raw: string): boolean {
  return TRUTHY.has(raw.trim().toLowerCase())
}

function normalizeKey(value: string): string {
  return value.trim().toUpperCase()
}

export class Catalog {
  readonly entries: readonly CatalogEntry[]
  readonly source: string
  private byCodeIndex: Map<string, CatalogEntry>

  private constructor(entries: CatalogEntry[], source: string) {
    this.entries = Object.freeze(entries.map((e) => Object.freeze(e)))
    this.source = source
    this.byCodeIndex = new Map()
    for (const entry of this.entries) {
      if (entry.formCode) this.byCodeIndex.set(normalizeKey(entry.formCode), entry)
    }
  }

  /** Build a catalog from CSV text. `source` only labels error messages. */
  static parse(text: string, source = '<inline>'): Catalog {
    const records = parseCSVRecords(text)
    if (records.length < 2) {
      throw new CatalogError('MalformedSource', `${source}: catalog is empty or has only a header row`, {
        stage: 'load_catalog',
        context: { source },
      })
    }

    const entries: CatalogEntry[] = []
    const seen = new Map<string, number>()

    for (const { line, fields } of records.slice(1)) {
      if (fields.length < CATALOG_COLUMNS.length) {
        throw new CatalogError(
          'MalformedSource',
          `${source}: line ${line} has ${fields.length} columns, expected ${CATALOG_COLUMNS.length}`,
          { stage: 'load_catalog', context: { source, line } },
        )
      }

      const [region, formName, formCode, description, format, sourceUrl, infoUrl, online, notes] =
        fields.map((f) => f.trim())

      if (formCode) {
        const key = normalizeKey(formCode)
        const firstLine = seen.get(key)
        if (firstLine !== undefined) {
          throw new CatalogError(
            'MalformedSource',
            `${source}: line ${line} repeats form code '${formCode}' from line ${firstLine}`,
            { stage: 'load_catalog', context: { source, line, formCode } },
          )
        }
        seen.set(key, line)
      }

      entries.push({
        region,
        formName,
        formCode,
        description,
        format,
        sourceUrl,
        infoUrl,
        onlineAvailable: parseBooleanish(online),
        notes,
      })
    }

    return new Catalog(entries, source)
  }

  static async load(path: string): Promise<Catalog> {
    let text: string
    try {
      text = await readFile(path, 'utf-8')
    } catch (err) {
      throw new CatalogError('ReadFailed', `failed to read catalog ${path}: ${errorMessage(err)}`, {
        stage: 'load_catalog',
        cause: err,
        context: { source: path },
      })
    }
    return Catalog.parse(text, path)
  }

  get size(): number {
    return this.entries.length
  }

  /** Case-insensitive lookup; surrounding whitespace is ignored. */
  byCode(code: string): CatalogEntry | undefined {
    return this.byCodeIndex.get(normalizeKey(code))
  }

  requireByCode(code: string): CatalogEntry {
    const entry = this.byCode(code)
    if (!entry) {
      throw new CatalogError('NotFound', `form with code '${code}' not found`, {
        stage: 'find_form',
        context: { formCode: code },
      })
    }
    return entry
  }

  byRegion(region: string): CatalogEntry[] {
    const key = normalizeKey(region)
    return this.entries.filter((e) => normalizeKey(e.region) === key)
  }

  /** Distinct regions in first-seen order. */
  regions(): string[] {
    return [...new Set(this.entries.map((e) => e.region))]
  }
}
