/**
 * fill: write a template's (or a case's) values into its document.
 *
 * The filled copy is always kept; with `flatten` a second, locked copy is
 * written next to it. A failed lock leaves the filled copy in place.
 */

import { dirname } from 'node:path'
import { FillError } from '../errors.ts'
import type { CommandRun } from '../events/commandRun.ts'
import { FILLED_SUFFIX, flatPathFor, resolveOutputPath } from '../forms/outputPath.ts'
import { resolveDocument } from '../forms/resolveDocument.ts'
import { readTemplate } from '../forms/template.ts'
import type { Template } from '../model/types.ts'
import { ensureDir, failure, startRun } from './context.ts'
import type { CommandContext } from './context.ts'

export interface FillOptions {
  template?: Template
  templatePath?: string
  /** Exact path of the filled document. */
  outputPath?: string
  /** Defaults to the configured outputs directory. */
  outputDir?: string
  flatten?: boolean
}

export interface FillResult {
  /** The final document: the locked copy when flattened, else the filled one. */
  outputPath: string
  filledPath: string
  inputDocument: string
  flattened: boolean
  strategy: string
}

export interface CaseFillOptions {
  casePath: string
  outputDir?: string
  flatten?: boolean
}

interface Origin {
  templatePath?: string
  casePath?: string
}

interface Target {
  outputPath?: string
  outputDir?: string
  flatten: boolean
}

async function execute(
  ctx: CommandContext,
  run: CommandRun,
  origin: Origin,
  target: Target,
  loadTemplate: () => Promise<Template>,
): Promise<FillResult> {
  const outputDir = target.outputDir ?? ctx.config.outputsDir
  const log = ctx.log.child({ command: 'fill', ...origin })

  run.emit({
    type: 'fill.started',
    data: { ...origin, outputDir, ...(target.outputPath ? { outputPath: target.outputPath } : {}), flatten: target.flatten },
  })

  let stage = 'load_template'
  try {
    const template = await loadTemplate()

    stage = 'resolve_document'
    run.emit({ type: 'fill.progress', data: { ...origin, stage: 'resolve_document' } })
    const document = await resolveDocument(template.documentReference, {
      fetch: ctx.fetch,
      scratchDir: ctx.config.tempDir,
    })
    if (document.fetched) log.info('Fetched remote document', { reference: template.documentReference, path: document.path })

    stage = 'create_dir'
    const filledPath = resolveOutputPath({
      outputPath: target.outputPath,
      outputDir,
      inputName: document.path,
      suffix: FILLED_SUFFIX,
    })
    await ensureDir(dirname(filledPath))

    stage = 'fill_document'
    const outcome = await ctx.engine.fillFile(document.path, template.fields, filledPath, (attempt) => {
      if (attempt.ok) return
      run.emit({
        type: 'fill.progress',
        data: { ...origin, stage: 'fallback', inputDocument: document.path, strategy: attempt.strategy, reason: attempt.reason },
      })
    })

    let outputPath = filledPath
    if (target.flatten) {
      stage = 'flatten'
      run.emit({ type: 'fill.progress', data: { ...origin, stage: 'flatten', inputDocument: document.path } })
      outputPath = flatPathFor(filledPath)
      await ctx.engine.lockFields(filledPath, outputPath)
    }

    const result: FillResult = {
      outputPath,
      filledPath,
      inputDocument: document.path,
      flattened: target.flatten,
      strategy: outcome.strategy,
    }
    log.info('Document filled', { outputPath, strategy: outcome.strategy, fieldCount: template.fields.size })
    run.emit({ type: 'fill.completed', data: { ...origin, ...result } })
    return result
  } catch (err) {
    const { error, stage: failedStage } = failure(err, stage)
    run.emit({ type: 'fill.error', data: { ...origin, stage: failedStage }, error: error.message })
    throw error
  }
}

export async function fill(ctx: CommandContext, opts: FillOptions): Promise<FillResult> {
  const origin: Origin = opts.templatePath ? { templatePath: opts.templatePath } : {}
  return execute(
    ctx,
    startRun(ctx),
    origin,
    { outputPath: opts.outputPath, outputDir: opts.outputDir, flatten: opts.flatten ?? false },
    async () => {
      if (opts.template) return opts.template
      if (opts.templatePath) return readTemplate(opts.templatePath)
      throw new FillError('InvalidTemplate', 'either a template or a template path is required', { stage: 'load_template' })
    },
  )
}

/** Fill the document a case points at with the case's field values. */
export async function fillFromCase(ctx: CommandContext, opts: CaseFillOptions): Promise<FillResult> {
  return execute(
    ctx,
    startRun(ctx),
    { casePath: opts.casePath },
    { outputDir: opts.outputDir, flatten: opts.flatten ?? false },
    async () => {
      const c = await ctx.cases.load(opts.casePath)
      const documentReference = await ctx.cases.resolveDocumentReference(c)
      return { documentReference, fields: c.fields }
    },
  )
}
