import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { tmpdir } from 'node:os'
import { resolveDocument } from '../../src/forms/resolveDocument.ts'
import { createFakeFetch } from '../fixtures/fakeFetch.ts'

describe('resolveDocument', () => {
  let dir: string
  let scratchDir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'formdesk-resolve-'))
    scratchDir = join(dir, 'temp')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns an existing local file as is', async () => {
    const doc = join(dir, 'a.pdf')
    writeFileSync(doc, 'pdf')
    const fake = createFakeFetch()

    expect(await resolveDocument(` ${doc} `, { fetch: fake.fetch, scratchDir })).toEqual({ path: doc, fetched: false })
    expect(fake.calls).toEqual([])
  })

  it('fetches a URL into its own scratch directory', async () => {
    const fake = createFakeFetch()
    fake.serve('https://forms.example.gov/i-131.pdf', 'remote pdf')

    const resolved = await resolveDocument('https://forms.example.gov/i-131.pdf', { fetch: fake.fetch, scratchDir })

    expect(resolved.fetched).toBe(true)
    expect(basename(resolved.path)).toBe('i-131.pdf')
    expect(dirname(dirname(resolved.path))).toBe(scratchDir)
    expect(readFileSync(resolved.path, 'utf-8')).toBe('remote pdf')
  })

  it('names a URL without a file name document.pdf', async () => {
    const fake = createFakeFetch()
    fake.serve('https://forms.example.gov/get', 'remote pdf')

    const resolved = await resolveDocument('https://forms.example.gov/get', { fetch: fake.fetch, scratchDir })
    expect(basename(resolved.path)).toBe('document.pdf')
  })

  it('reports a failed fetch as DocumentNotFound', async () => {
    const fake = createFakeFetch()
    await expect(
      resolveDocument('https://forms.example.gov/gone.pdf', { fetch: fake.fetch, scratchDir }),
    ).rejects.toMatchObject({
      code: 'DocumentNotFound',
      stage: 'resolve_document',
      message: 'could not fetch document https://forms.example.gov/gone.pdf: failed to fetch https://forms.example.gov/gone.pdf: HTTP 404',
    })
  })

  it('rejects a missing path', async () => {
    const missing = join(dir, 'missing.pdf')
    await expect(resolveDocument(missing, { fetch: createFakeFetch().fetch, scratchDir })).rejects.toMatchObject({
      code: 'DocumentNotFound',
      message: `document not found: ${missing}`,
    })
  })

  it('rejects a directory', async () => {
    mkdirSync(join(dir, 'folder'))
    await expect(
      resolveDocument(join(dir, 'folder'), { fetch: createFakeFetch().fetch, scratchDir }),
    ).rejects.toMatchObject({ code: 'DocumentNotFound' })
  })

  it('rejects an empty reference', async () => {
    await expect(resolveDocument('  ', { fetch: createFakeFetch().fetch, scratchDir })).rejects.toMatchObject({
      code: 'DocumentNotFound',
      message: 'template has no document reference',
    })
  })
})
