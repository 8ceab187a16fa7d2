/**
 * Fetching form documents over HTTP(S).
 *
 * The fetch implementation is injected so the server uses the global `fetch`
 * and tests hand in an in-process fake.
 */

import { writeFile } from 'node:fs/promises'
import { DownloadError, errorMessage } from '../errors.ts'
import type { CatalogEntry } from '../model/types.ts'

export type FetchLike = (url: string) => Promise<Response>

export function isFetchableUrl(reference: string): boolean {
  let url: URL
  try {
    url = new URL(reference.trim())
  } catch {
    return false
  }
  return url.protocol === 'http:' || url.protocol === 'https:'
}

/** `f3520.pdf` for code F3520; the form name stands in when the code is blank. */
export function documentFileName(entry: CatalogEntry): string {
  const base = entry.formCode || entry.formName.trim().replace(/\s+/g, '_')
  return base.toLowerCase() + '.pdf'
}

/** Fetch `url` and write the body to `destination`. Resolves to the byte count. */
export async function fetchToFile(fetchImpl: FetchLike, url: string, destination: string): Promise<number> {
  let res: Response
  try {
    res = await fetchImpl(url)
  } catch (err) {
    throw new DownloadError('FetchFailed', `failed to fetch ${url}: ${errorMessage(err)}`, {
      stage: 'download_document',
      cause: err,
      context: { url },
    })
  }

  if (!res.ok) {
    throw new DownloadError('FetchFailed', `failed to fetch ${url}: HTTP ${res.status}`, {
      stage: 'download_document',
      context: { url, status: res.status },
    })
  }

  const bytes = new Uint8Array(await res.arrayBuffer())
  await writeFile(destination, bytes)
  return bytes.byteLength
}
