/**
 * Case commands. Each one reports through `case.*` events tagged with its
 * action; listing is a plain query and publishes nothing.
 */

import type { NewCase, StoredCase } from '../cases/caseStore.ts'
import type { CaseAction, CaseCompletedData, CaseStartedData } from '../events/types.ts'
import { readTemplate } from '../forms/template.ts'
import type { Case, FieldValues, Template, ValidationStatus } from '../model/types.ts'
import { failure, startRun } from './context.ts'
import type { CommandContext } from './context.ts'

function completedData(action: CaseAction, casePath: string, c: Case): CaseCompletedData {
  const data: CaseCompletedData = {
    action,
    casePath,
    caseId: c.caseId,
    caseName: c.caseName,
    entity: c.entity,
    formCode: c.formCode,
  }
  if (c.validation) {
    data.valid = c.validation.valid
    data.missingFields = [...c.validation.missingFields]
  }
  return data
}

async function caseCommand<T>(
  ctx: CommandContext,
  started: CaseStartedData,
  firstStage: string,
  body: (setStage: (stage: string) => void) => Promise<{ result: T; casePath: string; case: Case }>,
): Promise<T> {
  const run = startRun(ctx)
  run.emit({ type: 'case.started', data: started })

  let stage = firstStage
  try {
    const { result, casePath, case: c } = await body((next) => {
      stage = next
    })
    run.emit({ type: 'case.completed', data: completedData(started.action, casePath, c) })
    return result
  } catch (err) {
    const { error, stage: failedStage } = failure(err, stage)
    run.emit({
      type: 'case.error',
      data: { action: started.action, ...(started.casePath ? { casePath: started.casePath } : {}), stage: failedStage },
      error: error.message,
    })
    throw error
  }
}

export interface CreateCaseOptions {
  formCode: string
  caseName: string
  entity: string
  templatePath?: string
  documentReference?: string
}

export async function createCase(ctx: CommandContext, opts: CreateCaseOptions): Promise<StoredCase> {
  return caseCommand(ctx, { action: 'create', entity: opts.entity, formCode: opts.formCode }, 'validate_input', async (setStage) => {
    const input: NewCase = {
      formCode: opts.formCode.trim(),
      caseName: opts.caseName,
      entity: opts.entity.trim(),
      templateReference: opts.templatePath,
      documentReference: opts.documentReference,
    }
    setStage('save_case')
    const stored = await ctx.cases.create(input)
    ctx.log.info('Case created', { caseId: stored.case.caseId, path: stored.path })
    return { result: stored, casePath: stored.path, case: stored.case }
  })
}

export async function loadCase(ctx: CommandContext, opts: { casePath: string }): Promise<Case> {
  return caseCommand(ctx, { action: 'load', casePath: opts.casePath }, 'load_case', async () => {
    const c = await ctx.cases.load(opts.casePath)
    return { result: c, casePath: opts.casePath, case: c }
  })
}

export async function saveCase(ctx: CommandContext, opts: { case: Case; casePath: string }): Promise<Case> {
  return caseCommand(ctx, { action: 'save', casePath: opts.casePath }, 'save_case', async () => {
    await ctx.cases.save(opts.case, opts.casePath)
    return { result: opts.case, casePath: opts.casePath, case: opts.case }
  })
}

/** Merge `fields` into the stored case and save it. */
export async function updateCaseFields(
  ctx: CommandContext,
  opts: { casePath: string; fields: FieldValues },
): Promise<Case> {
  return caseCommand(ctx, { action: 'update', casePath: opts.casePath }, 'load_case', async (setStage) => {
    const c = await ctx.cases.load(opts.casePath)
    c.fields = new Map([...c.fields, ...opts.fields])
    setStage('save_case')
    await ctx.cases.save(c, opts.casePath)
    return { result: c, casePath: opts.casePath, case: c }
  })
}

export interface ValidateCaseOptions {
  casePath: string
  /** Write the validation result back to the case file. */
  persist?: boolean
}

export interface ValidateCaseResult {
  case: Case
  validation: ValidationStatus
}

/**
 * Compare the case against the template it references. A case without a
 * template reference has nothing to be missing and validates clean.
 */
export async function validateCase(ctx: CommandContext, opts: ValidateCaseOptions): Promise<ValidateCaseResult> {
  return caseCommand(ctx, { action: 'validate', casePath: opts.casePath }, 'load_case', async (setStage) => {
    const c = await ctx.cases.load(opts.casePath)

    setStage('load_template')
    const template: Template = c.templateReference
      ? await readTemplate(c.templateReference)
      : { documentReference: c.documentReference ?? '', fields: new Map() }
    const validation = ctx.cases.validate(c, template)

    if (opts.persist) {
      setStage('save_case')
      await ctx.cases.save(c, opts.casePath)
    }
    return { result: { case: c, validation }, casePath: opts.casePath, case: c }
  })
}

export async function listCases(ctx: CommandContext, opts: { entity?: string } = {}): Promise<string[]> {
  return ctx.cases.list(opts.entity)
}
