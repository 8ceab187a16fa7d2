/**
 * Error hierarchy for formdesk.
 *
 * Every error a command surfaces is a FormDeskError: `code` names the kind,
 * `stage` names the internal step that failed. Commands copy `stage` into the
 * error event they publish so observers never parse messages.
 */

export interface ErrorDetails {
  stage?: string
  cause?: unknown
  context?: Record<string, unknown>
}

export class FormDeskError extends Error {
  readonly code: string
  readonly stage?: string
  readonly context?: Record<string, unknown>

  constructor(code: string, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = new.target.name
    this.code = code
    this.stage = details.stage
    this.context = details.context
  }
}

// ── Catalog ──────────────────────────────────────────────────

export type CatalogErrorCode = 'MalformedSource' | 'NotFound' | 'ReadFailed'

export class CatalogError extends FormDeskError {
  declare readonly code: CatalogErrorCode

  constructor(code: CatalogErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details)
  }
}

// ── Download ─────────────────────────────────────────────────

export type DownloadErrorCode = 'NotFound' | 'NoSource' | 'FetchFailed' | 'MetadataWriteFailed'

export class DownloadError extends FormDeskError {
  declare readonly code: DownloadErrorCode

  constructor(code: DownloadErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details)
  }
}

// ── Extraction ───────────────────────────────────────────────

export type ExtractErrorCode = 'ListFieldsFailed' | 'ExportFailed'

export class ExtractError extends FormDeskError {
  declare readonly code: ExtractErrorCode

  constructor(code: ExtractErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details)
  }
}

// ── Filling ──────────────────────────────────────────────────

export type FillErrorCode =
  | 'DocumentNotFound'
  | 'PrimaryFillFailed'
  | 'SecondaryFillFailed'
  | 'FlattenFailed'
  | 'InvalidTemplate'
  | 'WriteFailed'

export class FillError extends FormDeskError {
  declare readonly code: FillErrorCode

  constructor(code: FillErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details)
  }
}

// ── Cases ────────────────────────────────────────────────────

export type CaseErrorCode =
  | 'NotFound'
  | 'MalformedCase'
  | 'CannotResolveDocument'
  | 'InvalidInput'
  | 'WriteFailed'

export class CaseError extends FormDeskError {
  declare readonly code: CaseErrorCode

  constructor(code: CaseErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details)
  }
}

// ── Workflows ────────────────────────────────────────────────

export type WorkflowStep = 'browse' | 'download' | 'inspect' | 'fill'

const STEP_NUMBER: Record<WorkflowStep, number> = {
  browse: 1,
  download: 2,
  inspect: 3,
  fill: 4,
}

/**
 * Wraps the error of one workflow step. The original error stays reachable
 * through `cause`, and its message is kept verbatim after the step prefix.
 */
export class WorkflowError extends FormDeskError {
  declare readonly code: 'StepFailed'
  readonly step: WorkflowStep

  constructor(step: WorkflowStep, cause: unknown) {
    super('StepFailed', `step ${STEP_NUMBER[step]} (${step}) failed: ${errorMessage(cause)}`, {
      stage: step,
      cause,
    })
    this.step = step
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

export function isNotFoundError(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT'
}
