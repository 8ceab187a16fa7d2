import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'node:path'
import { browse } from '../../src/commands/browse.ts'
import { CatalogError } from '../../src/errors.ts'
import { CATALOG_HEADER, createTestContext } from '../fixtures/context.ts'
import type { TestContext } from '../fixtures/context.ts'

describe('browse', () => {
  let t: TestContext

  afterEach(() => {
    t.cleanup()
  })

  describe('with the test catalog', () => {
    beforeEach(() => {
      t = createTestContext()
    })

    it('lists regions in first-seen order', async () => {
      expect(await browse(t.ctx)).toEqual({ kind: 'regions', regions: ['US', 'UK'] })

      const events = t.events.drain()
      expect(events.map((e) => e.type)).toEqual(['browse.started', 'browse.completed'])
      expect(events[1].data).toEqual({ catalogPath: t.ctx.config.catalogFile, regionCount: 2, entryCount: 4 })
    })

    it('lists the forms of one region, ignoring case', async () => {
      const result = await browse(t.ctx, { region: 'uk' })
      expect(result.kind).toBe('entries')
      if (result.kind !== 'entries') return
      expect(result.region).toBe('uk')
      expect(result.entries.map((e) => e.formCode)).toEqual(['V-5', 'PR-1'])
    })

    it('treats a blank region as no region', async () => {
      expect((await browse(t.ctx, { region: '  ' })).kind).toBe('regions')
    })

    it('fails at filter_region for a region with no forms', async () => {
      const err = await browse(t.ctx, { region: 'FR' }).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(CatalogError)
      expect(err).toMatchObject({ code: 'NotFound', message: "no forms found for region 'FR'" })

      const last = t.events.drain().at(-1)
      expect(last?.type).toBe('browse.error')
      expect(last?.data).toEqual({ catalogPath: t.ctx.config.catalogFile, region: 'FR', stage: 'filter_region' })
    })

    it('fails at load_catalog for a missing file', async () => {
      await expect(browse(t.ctx, { catalogPath: join(t.dir, 'none.csv') })).rejects.toMatchObject({
        code: 'ReadFailed',
        stage: 'load_catalog',
      })
    })
  })

  it('rejects a catalog with only a header', async () => {
    t = createTestContext(CATALOG_HEADER + '\n')
    await expect(browse(t.ctx)).rejects.toMatchObject({ code: 'MalformedSource', stage: 'load_catalog' })
  })
})
