/**
 * Multi-step workflows composed from the commands:
 *
 *   runWorkflow        browse → download → inspect → fill, for one form
 *   runBulkWorkflow    runWorkflow per form code; one failure never stops the batch
 *   runUpdateWorkflow  re-download a form only when forced or when no copy exists
 *
 * Step errors are wrapped in WorkflowError, which names the step and keeps
 * the original error as `cause`.
 */

import { stat } from 'node:fs/promises'
import { join } from 'node:path'
import { Catalog } from '../catalog/catalog.ts'
import { documentFileName } from '../catalog/fetchDocument.ts'
import { loadProvenance } from '../catalog/provenance.ts'
import { download } from '../commands/download.ts'
import { fill } from '../commands/fill.ts'
import { inspect } from '../commands/inspect.ts'
import { startRun } from '../commands/context.ts'
import type { CommandContext } from '../commands/context.ts'
import { WorkflowError, errorMessage } from '../errors.ts'
import type { WorkflowStep } from '../errors.ts'
import type { CommandRun } from '../events/commandRun.ts'
import type { WorkflowKind } from '../events/types.ts'
import { TEMPLATE_SUFFIX, stem } from '../forms/outputPath.ts'
import type { FieldValues, Provenance } from '../model/types.ts'

export interface WorkflowOptions {
  formCode: string
  fieldData: FieldValues
  /** Receives `downloads/`, `templates/` and `outputs/` subdirectories. */
  outputDir: string
  flatten?: boolean
  catalogPath?: string
}

export interface WorkflowResult {
  formCode: string
  documentPath: string
  templatePath: string
  filledPath: string
  /** Locked copy when flattened, else the filled document. */
  outputPath: string
  flattened: boolean
  strategy: string
  provenance?: Provenance
}

const STEP_NUMBERS: Record<WorkflowStep, number> = { browse: 1, download: 2, inspect: 3, fill: 4 }

class StepRunner {
  constructor(
    private readonly run: CommandRun,
    private readonly kind: WorkflowKind,
    private readonly formCode: string,
  ) {}

  async step<T>(step: WorkflowStep, fn: () => Promise<T>): Promise<T> {
    this.run.emit({
      type: 'workflow.progress',
      data: { kind: this.kind, formCode: this.formCode, step, stepNumber: STEP_NUMBERS[step] },
    })
    try {
      return await fn()
    } catch (err) {
      throw new WorkflowError(step, err)
    }
  }

  fail(err: unknown): WorkflowError {
    const error = err instanceof WorkflowError ? err : new WorkflowError('browse', err)
    this.run.emit({
      type: 'workflow.error',
      data: { kind: this.kind, formCode: this.formCode, stage: error.step },
      error: error.message,
    })
    return error
  }
}

export async function runWorkflow(ctx: CommandContext, opts: WorkflowOptions): Promise<WorkflowResult> {
  const formCode = opts.formCode.trim()
  const flatten = opts.flatten ?? false
  const catalogPath = opts.catalogPath ?? ctx.config.catalogFile
  const run = startRun(ctx)
  const steps = new StepRunner(run, 'single', formCode)

  run.emit({ type: 'workflow.started', data: { kind: 'single', formCode } })
  try {
    await steps.step('browse', async () => {
      const catalog = await Catalog.load(catalogPath)
      return catalog.requireByCode(formCode)
    })

    const downloaded = await steps.step('download', () =>
      download(ctx, { formCode, catalogPath, outputDir: join(opts.outputDir, 'downloads') }),
    )

    const inspected = await steps.step('inspect', () =>
      inspect(ctx, {
        documentPath: downloaded.documentPath,
        output: join(opts.outputDir, 'templates', stem(downloaded.documentPath) + TEMPLATE_SUFFIX),
      }),
    )

    const filled = await steps.step('fill', () =>
      fill(ctx, {
        template: {
          ...inspected.template,
          documentReference: downloaded.documentPath,
          fields: new Map([...inspected.template.fields, ...opts.fieldData]),
        },
        outputDir: join(opts.outputDir, 'outputs'),
        flatten,
      }),
    )

    let provenance: Provenance | undefined
    try {
      provenance = await loadProvenance(downloaded.documentPath)
    } catch (err) {
      ctx.log.warn('Ignoring unreadable provenance metadata', { documentPath: downloaded.documentPath, error: errorMessage(err) })
    }

    const result: WorkflowResult = {
      formCode,
      documentPath: downloaded.documentPath,
      templatePath: inspected.templatePath,
      filledPath: filled.filledPath,
      outputPath: filled.outputPath,
      flattened: filled.flattened,
      strategy: filled.strategy,
      ...(provenance ? { provenance } : {}),
    }
    run.emit({
      type: 'workflow.completed',
      data: { kind: 'single', formCode, documentPath: result.documentPath, filledPath: result.outputPath },
    })
    return result
  } catch (err) {
    throw steps.fail(err)
  }
}

export interface BulkWorkflowOptions {
  formCodes: string[]
  /** Field values per form code; codes without an entry are filled with nothing. */
  fieldData?: Record<string, FieldValues>
  outputDir: string
  flatten?: boolean
  catalogPath?: string
}

export interface BulkWorkflowResult {
  results: Record<string, WorkflowResult>
  errors: Record<string, WorkflowError>
  total: number
  succeeded: number
  failed: number
}

export async function runBulkWorkflow(ctx: CommandContext, opts: BulkWorkflowOptions): Promise<BulkWorkflowResult> {
  const run = startRun(ctx)
  const outcome: BulkWorkflowResult = { results: {}, errors: {}, total: opts.formCodes.length, succeeded: 0, failed: 0 }

  run.emit({ type: 'bulk.started', data: { formCodes: [...opts.formCodes] } })

  for (const [index, formCode] of opts.formCodes.entries()) {
    let ok = true
    try {
      outcome.results[formCode] = await runWorkflow(ctx, {
        formCode,
        fieldData: opts.fieldData?.[formCode] ?? new Map(),
        outputDir: opts.outputDir,
        flatten: opts.flatten,
        catalogPath: opts.catalogPath,
      })
      outcome.succeeded++
    } catch (err) {
      ok = false
      outcome.errors[formCode] = err instanceof WorkflowError ? err : new WorkflowError('browse', err)
      outcome.failed++
      ctx.log.warn('Bulk workflow item failed', { formCode, error: errorMessage(err) })
    }
    run.emit({ type: 'bulk.progress', data: { formCode, index, total: outcome.total, ok } })
  }

  run.emit({
    type: 'bulk.completed',
    data: { total: outcome.total, succeeded: outcome.succeeded, failed: outcome.failed },
  })
  return outcome
}

export interface UpdateWorkflowOptions {
  formCode: string
  /** Where the current copy lives, if there is one. */
  existingDir: string
  /** Where a new copy goes; defaults to `existingDir`. */
  outputDir?: string
  force?: boolean
  catalogPath?: string
}

export interface UpdateWorkflowResult {
  formCode: string
  updated: boolean
  previousPath?: string
  currentPath: string
  previousProvenance?: Provenance
  currentProvenance?: Provenance
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

async function readProvenanceQuietly(ctx: CommandContext, documentPath: string): Promise<Provenance | undefined> {
  try {
    return await loadProvenance(documentPath)
  } catch (err) {
    ctx.log.warn('Ignoring unreadable provenance metadata', { documentPath, error: errorMessage(err) })
    return undefined
  }
}

/** Presence is all that is compared; document contents are never diffed. */
export async function runUpdateWorkflow(ctx: CommandContext, opts: UpdateWorkflowOptions): Promise<UpdateWorkflowResult> {
  const formCode = opts.formCode.trim()
  const catalogPath = opts.catalogPath ?? ctx.config.catalogFile
  const run = startRun(ctx)
  const steps = new StepRunner(run, 'update', formCode)

  run.emit({ type: 'workflow.started', data: { kind: 'update', formCode } })
  try {
    const entry = await steps.step('browse', async () => {
      const catalog = await Catalog.load(catalogPath)
      return catalog.requireByCode(formCode)
    })

    const existingPath = join(opts.existingDir, documentFileName(entry))
    const result: UpdateWorkflowResult = { formCode, updated: false, currentPath: existingPath }
    if (await fileExists(existingPath)) {
      result.previousPath = existingPath
      result.previousProvenance = await readProvenanceQuietly(ctx, existingPath)
    }

    if (opts.force || result.previousPath === undefined) {
      const downloaded = await steps.step('download', () =>
        download(ctx, { formCode, catalogPath, outputDir: opts.outputDir ?? opts.existingDir }),
      )
      result.updated = true
      result.currentPath = downloaded.documentPath
      result.currentProvenance = downloaded.provenance
    } else {
      result.currentProvenance = result.previousProvenance
    }

    run.emit({
      type: 'workflow.completed',
      data: { kind: 'update', formCode, documentPath: result.currentPath, updated: result.updated },
    })
    return result
  } catch (err) {
    throw steps.fail(err)
  }
}
