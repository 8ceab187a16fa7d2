/**
 * Provenance sidecars: `<document>.meta.json` next to each fetched document,
 * recording where it came from and when it was processed.
 *
 * A missing sidecar means "no history" and is never an error.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { isNotFoundError } from '../errors.ts'
import {
  provenanceFromWire,
  provenanceToWire,
  provenanceWireSchema,
  describeIssues,
} from '../model/schemas.ts'
import type { CatalogEntry, Provenance } from '../model/types.ts'

export const META_JSON_SUFFIX = '.meta.json'

export function provenancePath(documentPath: string): string {
  return documentPath + META_JSON_SUFFIX
}

export function provenanceForEntry(entry: CatalogEntry, downloadedAt: Date): Provenance {
  return {
    originFormCode: entry.formCode,
    originRegion: entry.region,
    sourceUrl: entry.sourceUrl,
    downloadedAt: downloadedAt.toISOString(),
  }
}

export async function saveProvenance(documentPath: string, prov: Provenance): Promise<string> {
  const path = provenancePath(documentPath)
  await writeFile(path, JSON.stringify(provenanceToWire(prov), null, 2) + '\n', 'utf-8')
  return path
}

/** Read the sidecar for a document; `undefined` when there is none. */
export async function loadProvenance(documentPath: string): Promise<Provenance | undefined> {
  const path = provenancePath(documentPath)
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    if (isNotFoundError(err)) return undefined
    throw err
  }

  const parsed = provenanceWireSchema.safeParse(JSON.parse(raw))
  if (!parsed.success) {
    throw new Error(`invalid provenance metadata in ${path}: ${describeIssues(parsed.error).join('; ')}`)
  }
  return provenanceFromWire(parsed.data)
}

/**
 * Stamp `inspected_at` on an existing sidecar. Returns the updated record, or
 * `undefined` when the document has no sidecar to update.
 */
export async function markInspected(documentPath: string, now: Date = new Date()): Promise<Provenance | undefined> {
  const prov = await loadProvenance(documentPath)
  if (!prov) return undefined
  const updated: Provenance = { ...prov, inspectedAt: now.toISOString() }
  await saveProvenance(documentPath, updated)
  return updated
}
