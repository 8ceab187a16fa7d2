import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { PDFDocument } from 'pdf-lib'
import { fill, fillFromCase } from '../../src/commands/fill.ts'
import { writeTemplate } from '../../src/forms/template.ts'
import { buildFormPdf, readTextFields } from '../fixtures/pdfs.ts'
import { createTestContext } from '../fixtures/context.ts'
import type { TestContext } from '../fixtures/context.ts'

describe('fill', () => {
  let t: TestContext
  let documentPath: string
  let templatePath: string

  beforeEach(async () => {
    t = createTestContext()
    mkdirSync(t.ctx.config.downloadsDir, { recursive: true })
    documentPath = join(t.ctx.config.downloadsDir, 'ar-11.pdf')
    writeFileSync(documentPath, await buildFormPdf({ text: ['Name', 'City'] }))
    templatePath = join(t.ctx.config.templatesDir, 'ar-11_template.json')
    await writeTemplate(templatePath, { documentReference: documentPath, fields: new Map([['Name', 'Ada'], ['City', 'London']]) })
  })

  afterEach(() => {
    t.cleanup()
  })

  it('writes <stem>_filled.pdf into the outputs directory', async () => {
    const result = await fill(t.ctx, { templatePath })

    const filledPath = join(t.ctx.config.outputsDir, 'ar-11_filled.pdf')
    expect(result).toEqual({
      outputPath: filledPath,
      filledPath,
      inputDocument: documentPath,
      flattened: false,
      strategy: 'acroform',
    })
    expect(await readTextFields(readFileSync(filledPath))).toEqual({ Name: 'Ada', City: 'London' })

    const events = t.events.drain()
    expect(events.map((e) => e.type)).toEqual(['fill.started', 'fill.progress', 'fill.completed'])
    expect(events[1].data).toEqual({ templatePath, stage: 'resolve_document' })
  })

  it('honours an explicit output path', async () => {
    const outputPath = join(t.dir, 'out', 'mine.pdf')
    const result = await fill(t.ctx, { templatePath, outputPath })
    expect(result.filledPath).toBe(outputPath)
    expect(existsSync(outputPath)).toBe(true)
  })

  it('accepts a template object', async () => {
    const result = await fill(t.ctx, {
      template: { documentReference: documentPath, fields: new Map([['City', 'Paris']]) },
      outputDir: join(t.dir, 'out'),
    })
    expect(result.filledPath).toBe(join(t.dir, 'out', 'ar-11_filled.pdf'))
    expect((await readTextFields(readFileSync(result.filledPath))).City).toBe('Paris')
  })

  it('reports a fallback as progress and still completes', async () => {
    await writeTemplate(templatePath, { documentReference: documentPath, fields: new Map([['Name', '✓ checked']]) })

    const result = await fill(t.ctx, { templatePath })

    expect(result.strategy).toBe('raw-acroform')
    const fallback = t.events.drain().find((e) => e.type === 'fill.progress' && e.data.stage === 'fallback')
    expect(fallback?.data).toMatchObject({ stage: 'fallback', strategy: 'acroform', inputDocument: documentPath })
  })

  it('keeps the filled copy and adds a locked one when flattening', async () => {
    const result = await fill(t.ctx, { templatePath, flatten: true })

    expect(result.flattened).toBe(true)
    expect(result.outputPath).toBe(join(t.ctx.config.outputsDir, 'ar-11_filled_flat.pdf'))
    expect(existsSync(result.filledPath)).toBe(true)

    const locked = (await PDFDocument.load(readFileSync(result.outputPath))).getForm()
    expect(locked.getFields().every((f) => f.isReadOnly())).toBe(true)

    const stages = t.events.drain().flatMap((e) => (e.type === 'fill.progress' ? [e.data.stage] : []))
    expect(stages).toEqual(['resolve_document', 'flatten'])
  })

  it('fetches a document referenced by URL', async () => {
    t.fake.serve('https://forms.example.gov/ar-11.pdf', readFileSync(documentPath))
    await writeTemplate(templatePath, {
      documentReference: 'https://forms.example.gov/ar-11.pdf',
      fields: new Map([['Name', 'Ada']]),
    })

    const result = await fill(t.ctx, { templatePath })

    expect(t.fake.calls).toEqual(['https://forms.example.gov/ar-11.pdf'])
    expect(result.inputDocument.startsWith(t.ctx.config.tempDir)).toBe(true)
    expect(result.filledPath).toBe(join(t.ctx.config.outputsDir, 'ar-11_filled.pdf'))
  })

  it('fails at resolve_document when the document is gone', async () => {
    await writeTemplate(templatePath, { documentReference: join(t.dir, 'gone.pdf'), fields: new Map() })

    await expect(fill(t.ctx, { templatePath })).rejects.toMatchObject({ code: 'DocumentNotFound' })
    const last = t.events.drain().at(-1)
    expect(last?.type).toBe('fill.error')
    expect(last?.data).toEqual({ templatePath, stage: 'resolve_document' })
  })

  it('fails at load_template without a template', async () => {
    await expect(fill(t.ctx, {})).rejects.toMatchObject({ code: 'InvalidTemplate', stage: 'load_template' })
  })

  it('fails at load_template for a template that does not exist', async () => {
    await expect(fill(t.ctx, { templatePath: join(t.dir, 'none.json') })).rejects.toMatchObject({
      code: 'InvalidTemplate',
      stage: 'load_template',
    })
  })

  it('fails at fill_document when no strategy can fill', async () => {
    await writeTemplate(templatePath, { documentReference: documentPath, fields: new Map([['Unknown', 'x']]) })
    await expect(fill(t.ctx, { templatePath })).rejects.toMatchObject({
      code: 'SecondaryFillFailed',
      stage: 'fill_document',
    })
  })
})

describe('fillFromCase', () => {
  let t: TestContext
  let documentPath: string

  beforeEach(async () => {
    t = createTestContext()
    documentPath = join(t.dir, 'g-639.pdf')
    writeFileSync(documentPath, await buildFormPdf({ text: ['Name', 'City'] }))
  })

  afterEach(() => {
    t.cleanup()
  })

  it('fills the case document with the case fields', async () => {
    const { case: c, path } = await t.ctx.cases.create({
      formCode: 'G-639',
      caseName: 'Records',
      entity: 'acme',
      documentReference: documentPath,
    })
    c.fields = new Map([['Name', 'Grace']])
    await t.ctx.cases.save(c, path)
    t.events.drain()

    const result = await fillFromCase(t.ctx, { casePath: path })

    expect(result.filledPath).toBe(join(t.ctx.config.outputsDir, 'g-639_filled.pdf'))
    expect((await readTextFields(readFileSync(result.filledPath))).Name).toBe('Grace')
    const completed = t.events.drain().at(-1)
    expect(completed?.type).toBe('fill.completed')
    expect(completed?.data).toMatchObject({ casePath: path })
  })

  it('fails at load_case for a missing case', async () => {
    await expect(fillFromCase(t.ctx, { casePath: join(t.dir, 'nope.json') })).rejects.toMatchObject({
      code: 'NotFound',
      stage: 'load_case',
    })
  })
})
