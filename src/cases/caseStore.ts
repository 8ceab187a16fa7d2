/**
 * File-backed case store.
 *
 * Cases live at `<casesDir>/<entity>/<caseId>.json`. A case file without
 * an entity takes it from its directory name. There is no locking:
 * one writer per case file is assumed, and a crash during save can leave a
 * truncated file behind.
 */

import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { CaseError, errorMessage, isNotFoundError } from '../errors.ts'
import { readTemplate } from '../forms/template.ts'
import { caseFromWire, caseToWire, caseWireSchema, describeIssues } from '../model/schemas.ts'
import type { Case, Template, ValidationStatus } from '../model/types.ts'
import { createCaseId } from './caseId.ts'

export interface NewCase {
  formCode: string
  caseName: string
  entity: string
  templateReference?: string
  documentReference?: string
}

export interface StoredCase {
  case: Case
  path: string
}

/** Non-empty, no separators, not hidden, no surrounding whitespace. */
export function isPathSafe(segment: string): boolean {
  return (
    segment !== '' &&
    segment === segment.trim() &&
    !segment.startsWith('.') &&
    !/[/\\\0]/.test(segment)
  )
}

function requireSafe(label: string, value: string): void {
  if (!isPathSafe(value)) {
    throw new CaseError('InvalidInput', `invalid ${label} '${value}': must be a non-empty name without path separators`, {
      stage: 'validate_input',
      context: { [label]: value },
    })
  }
}

export class CaseStore {
  constructor(
    readonly casesDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  casePath(entity: string, caseId: string): string {
    return join(this.casesDir, entity, `${caseId}.json`)
  }

  async create(input: NewCase): Promise<StoredCase> {
    requireSafe('entity', input.entity)
    requireSafe('form code', input.formCode)

    const now = this.now()
    const timestamp = now.toISOString()
    const c: Case = {
      caseId: createCaseId(input.entity, input.formCode, now),
      caseName: input.caseName,
      entity: input.entity,
      createdAt: timestamp,
      updatedAt: timestamp,
      formCode: input.formCode,
      fields: new Map(),
    }
    if (input.templateReference) c.templateReference = input.templateReference
    if (input.documentReference) c.documentReference = input.documentReference

    const path = this.casePath(c.entity, c.caseId)
    await this.save(c, path)
    return { case: c, path }
  }

  async load(path: string): Promise<Case> {
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (err) {
      throw new CaseError(
        isNotFoundError(err) ? 'NotFound' : 'MalformedCase',
        isNotFoundError(err) ? `case not found: ${path}` : `failed to read case ${path}: ${errorMessage(err)}`,
        { stage: 'load_case', cause: err },
      )
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw new CaseError('MalformedCase', `case ${path} is not valid JSON: ${errorMessage(err)}`, {
        stage: 'load_case',
        cause: err,
      })
    }

    const parsed = caseWireSchema.safeParse(json)
    if (!parsed.success) {
      const issues = describeIssues(parsed.error)
      throw new CaseError('MalformedCase', `case ${path} is malformed: ${issues.join('; ')}`, {
        stage: 'load_case',
        context: { issues },
      })
    }
    return caseFromWire(parsed.data, basename(dirname(path)))
  }

  /** Stamp `updatedAt` and write the case, creating parent directories. */
  async save(c: Case, path: string): Promise<void> {
    c.updatedAt = this.now().toISOString()
    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, JSON.stringify(caseToWire(c), null, 2) + '\n', 'utf-8')
    } catch (err) {
      throw new CaseError('WriteFailed', `failed to save case ${path}: ${errorMessage(err)}`, {
        stage: 'save_case',
        cause: err,
      })
    }
  }

  /** Sorted case paths, for one entity or the whole tree. */
  async list(entity?: string): Promise<string[]> {
    if (entity !== undefined) requireSafe('entity', entity)
    const root = entity ? join(this.casesDir, entity) : this.casesDir
    const paths: string[] = []
    await collectJson(root, paths)
    return paths.sort()
  }

  /**
   * Record which template fields the case has no value for. Only
   * `c.validation` changes; nothing is written to disk.
   */
  validate(c: Case, template: Template): ValidationStatus {
    const missingFields = [...template.fields.keys()].filter((name) => !c.fields.has(name))
    const status: ValidationStatus = {
      valid: missingFields.length === 0,
      missingFields,
      invalidFields: [],
      checkedAt: this.now().toISOString(),
    }
    c.validation = status
    return status
  }

  /** The case's own document reference, else the one in its template. */
  async resolveDocumentReference(c: Case): Promise<string> {
    if (c.documentReference) return c.documentReference
    if (!c.templateReference) {
      throw new CaseError('CannotResolveDocument', `case ${c.caseId} has neither a document nor a template reference`, {
        stage: 'resolve_document',
      })
    }

    let template: Template
    try {
      template = await readTemplate(c.templateReference)
    } catch (err) {
      throw new CaseError('CannotResolveDocument', `cannot resolve document for case ${c.caseId}: ${errorMessage(err)}`, {
        stage: 'load_template',
        cause: err,
      })
    }
    if (!template.documentReference) {
      throw new CaseError('CannotResolveDocument', `template ${c.templateReference} has no document reference`, {
        stage: 'resolve_document',
      })
    }
    return template.documentReference
  }
}

async function collectJson(dir: string, out: string[]): Promise<void> {
  let entries
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isNotFoundError(err)) return
    throw err
  }
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const path = join(dir, entry.name)
    if (entry.isDirectory()) await collectJson(path, out)
    else if (entry.isFile() && entry.name.endsWith('.json')) out.push(path)
  }
}
