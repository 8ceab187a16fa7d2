/**
 * Turn a template's document reference into a local file: URLs are fetched
 * into a fresh scratch directory, local paths must already exist. Anything
 * else is an error; there is no guessing.
 */

import { mkdir, mkdtemp, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { fetchToFile, isFetchableUrl } from '../catalog/fetchDocument.ts'
import type { FetchLike } from '../catalog/fetchDocument.ts'
import { FillError, errorMessage } from '../errors.ts'

export interface ResolvedDocument {
  path: string
  fetched: boolean
}

export interface ResolveOptions {
  fetch: FetchLike
  scratchDir: string
}

function scratchName(url: string): string {
  const name = basename(new URL(url).pathname)
  return name && name.includes('.') ? name : 'document.pdf'
}

export async function resolveDocument(reference: string, opts: ResolveOptions): Promise<ResolvedDocument> {
  const ref = reference.trim()
  if (ref === '') {
    throw new FillError('DocumentNotFound', 'template has no document reference', { stage: 'resolve_document' })
  }

  if (isFetchableUrl(ref)) {
    try {
      await mkdir(opts.scratchDir, { recursive: true })
      const dir = await mkdtemp(join(opts.scratchDir, 'fetch-'))
      const path = join(dir, scratchName(ref))
      await fetchToFile(opts.fetch, ref, path)
      return { path, fetched: true }
    } catch (err) {
      throw new FillError('DocumentNotFound', `could not fetch document ${ref}: ${errorMessage(err)}`, {
        stage: 'resolve_document',
        cause: err,
      })
    }
  }

  let isFile = false
  try {
    isFile = (await stat(ref)).isFile()
  } catch {
    isFile = false
  }
  if (!isFile) {
    throw new FillError('DocumentNotFound', `document not found: ${ref}`, {
      stage: 'resolve_document',
      context: { reference: ref },
    })
  }
  return { path: ref, fetched: false }
}
