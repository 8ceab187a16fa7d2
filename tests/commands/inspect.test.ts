import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { provenancePath } from '../../src/catalog/provenance.ts'
import { inspect, templatePathFor } from '../../src/commands/inspect.ts'
import { buildFormPdf } from '../fixtures/pdfs.ts'
import { createTestContext } from '../fixtures/context.ts'
import type { TestContext } from '../fixtures/context.ts'

describe('templatePathFor', () => {
  let t: TestContext

  beforeEach(() => {
    t = createTestContext()
  })

  afterEach(() => {
    t.cleanup()
  })

  it('defaults to the templates directory', async () => {
    expect(await templatePathFor('/dl/ar-11.pdf', undefined, '/tpl')).toBe(join('/tpl', 'ar-11_template.json'))
  })

  it('writes into an existing directory', async () => {
    expect(await templatePathFor('/dl/ar-11.pdf', t.dir, '/tpl')).toBe(join(t.dir, 'ar-11_template.json'))
  })

  it('takes anything else as the file path', async () => {
    expect(await templatePathFor('/dl/ar-11.pdf', join(t.dir, 'mine.json'), '/tpl')).toBe(join(t.dir, 'mine.json'))
  })
})

describe('inspect', () => {
  let t: TestContext
  let documentPath: string

  beforeEach(async () => {
    t = createTestContext()
    mkdirSync(t.ctx.config.downloadsDir, { recursive: true })
    documentPath = join(t.ctx.config.downloadsDir, 'ar-11.pdf')
    writeFileSync(documentPath, await buildFormPdf({ text: ['Name', 'City'], checkboxes: ['Agree'] }))
  })

  afterEach(() => {
    t.cleanup()
  })

  it('exports an empty template into the templates directory', async () => {
    const result = await inspect(t.ctx, { documentPath })

    const templatePath = join(t.ctx.config.templatesDir, 'ar-11_template.json')
    expect(result.templatePath).toBe(templatePath)
    expect(result.fieldCount).toBe(3)
    expect(result.fields).toEqual(['Name', 'City', 'Agree'])
    expect(JSON.parse(readFileSync(templatePath, 'utf-8'))).toEqual({
      document_reference: documentPath,
      fields: { Name: '', City: '', Agree: '' },
    })

    const events = t.events.drain()
    expect(events.map((e) => e.type)).toEqual(['inspect.started', 'inspect.completed'])
    expect(events[1].data).toEqual({ documentPath, templatePath, fieldCount: 3, hasProvenance: false })
  })

  it('carries provenance into the template and stamps the inspection time', async () => {
    writeFileSync(
      provenancePath(documentPath),
      JSON.stringify({
        origin_form_code: 'AR-11',
        origin_region: 'US',
        source_url: 'https://forms.example.gov/ar-11.pdf',
        downloaded_at: '2024-01-01T00:00:00.000Z',
      }),
    )

    const result = await inspect(t.ctx, { documentPath })

    expect(result.template.provenance?.originFormCode).toBe('AR-11')
    expect(JSON.parse(readFileSync(provenancePath(documentPath), 'utf-8')).inspected_at).toBe('2024-04-05T06:07:08.000Z')
    expect(t.events.drain().at(-1)?.data).toMatchObject({ hasProvenance: true })
  })

  it('honours an explicit output file', async () => {
    const output = join(t.dir, 'custom', 'ar.json')
    const result = await inspect(t.ctx, { documentPath, output })
    expect(result.templatePath).toBe(output)
    expect(JSON.parse(readFileSync(output, 'utf-8')).fields).toEqual({ Name: '', City: '', Agree: '' })
  })

  it('fails at list_fields for a missing document', async () => {
    const missing = join(t.dir, 'missing.pdf')
    await expect(inspect(t.ctx, { documentPath: missing })).rejects.toMatchObject({ code: 'ListFieldsFailed' })

    const events = t.events.drain()
    expect(events.map((e) => e.type)).toEqual(['inspect.started', 'inspect.error'])
    expect(events[1].data).toEqual({ documentPath: missing, stage: 'list_fields' })
  })

  it('fails at create_dir when the output directory cannot be created', async () => {
    writeFileSync(join(t.dir, 'blocker'), '')
    await expect(
      inspect(t.ctx, { documentPath, output: join(t.dir, 'blocker', 'sub', 't.json') }),
    ).rejects.toMatchObject({ code: 'CreateDirFailed', stage: 'create_dir' })
  })
})
