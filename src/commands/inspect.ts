/**
 * inspect: list a document's fields and export an empty template for them.
 */

import { stat } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { markInspected } from '../catalog/provenance.ts'
import { errorMessage } from '../errors.ts'
import { exportTemplate } from '../forms/extractor.ts'
import { TEMPLATE_SUFFIX, stem } from '../forms/outputPath.ts'
import type { Template } from '../model/types.ts'
import { ensureDir, failure, startRun } from './context.ts'
import type { CommandContext } from './context.ts'

export interface InspectOptions {
  documentPath: string
  /** Template file, or an existing directory to write `<name>_template.json` into. */
  output?: string
}

export interface InspectResult {
  templatePath: string
  fieldCount: number
  fields: string[]
  template: Template
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

export async function templatePathFor(documentPath: string, output: string | undefined, templatesDir: string): Promise<string> {
  const name = stem(documentPath) + TEMPLATE_SUFFIX
  if (output === undefined || output === '') return join(templatesDir, name)
  if (await isDirectory(output)) return join(output, name)
  return output
}

export async function inspect(ctx: CommandContext, opts: InspectOptions): Promise<InspectResult> {
  const run = startRun(ctx)
  const { documentPath } = opts
  const log = ctx.log.child({ command: 'inspect', documentPath })

  run.emit({
    type: 'inspect.started',
    data: { documentPath, ...(opts.output ? { output: opts.output } : {}) },
  })

  let stage = 'create_dir'
  try {
    const templatePath = await templatePathFor(documentPath, opts.output, ctx.config.templatesDir)
    await ensureDir(dirname(templatePath))

    stage = 'list_fields'
    const template = await exportTemplate(documentPath, templatePath, log)
    const fields = [...template.fields.keys()]

    try {
      await markInspected(documentPath, ctx.now())
    } catch (err) {
      log.warn('Could not record inspection time', { error: errorMessage(err) })
    }

    run.emit({
      type: 'inspect.completed',
      data: { documentPath, templatePath, fieldCount: fields.length, hasProvenance: template.provenance !== undefined },
    })
    return { templatePath, fieldCount: fields.length, fields, template }
  } catch (err) {
    const { error, stage: failedStage } = failure(err, stage)
    run.emit({ type: 'inspect.error', data: { documentPath, stage: failedStage }, error: error.message })
    throw error
  }
}
