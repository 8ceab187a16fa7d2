/**
 * Typed event catalogue.
 *
 * Every event type string maps to one data interface in EventDataMap, and
 * FormEvent is the discriminated union over all of them, so a consumer that
 * switches on `event.type` gets the matching `data` shape without assertions.
 *
 * Command families publish `<family>.started`, zero or more
 * `<family>.progress`, then exactly one of `<family>.completed` /
 * `<family>.error`. Error data always carries `stage`.
 */

// ── Browse ───────────────────────────────────────────────────

export interface BrowseStartedData {
  catalogPath: string
  region?: string
}

export interface BrowseCompletedData {
  catalogPath: string
  region?: string
  regionCount: number
  entryCount: number
}

export interface BrowseErrorData {
  catalogPath: string
  region?: string
  stage: string
}

// ── Download ─────────────────────────────────────────────────

export type DownloadStage = 'found_form' | 'downloading' | 'saving_metadata'

export interface DownloadStartedData {
  formCode: string
  outputDir: string
}

export interface DownloadProgressData {
  formCode: string
  stage: DownloadStage
  /** Fixed checkpoint between 0 and 1. */
  progress: number
  formName?: string
  region?: string
  documentPath?: string
}

export interface DownloadCompletedData {
  formCode: string
  formName: string
  region: string
  documentPath: string
  provenancePath: string
  progress: number
  metadataWarning?: string
}

export interface DownloadErrorData {
  formCode: string
  stage: string
}

// ── Inspect ──────────────────────────────────────────────────

export interface InspectStartedData {
  documentPath: string
  output?: string
}

export interface InspectCompletedData {
  documentPath: string
  templatePath: string
  fieldCount: number
  hasProvenance: boolean
}

export interface InspectErrorData {
  documentPath: string
  stage: string
}

// ── Fill ─────────────────────────────────────────────────────

export type FillProgressStage = 'resolve_document' | 'fallback' | 'flatten'

export interface FillStartedData {
  templatePath?: string
  casePath?: string
  outputDir?: string
  outputPath?: string
  flatten: boolean
}

export interface FillProgressData {
  stage: FillProgressStage
  templatePath?: string
  casePath?: string
  inputDocument?: string
  /** Strategy that just failed, for `fallback`. */
  strategy?: string
  reason?: string
}

export interface FillCompletedData {
  templatePath?: string
  casePath?: string
  inputDocument: string
  outputPath: string
  filledPath: string
  strategy: string
  flattened: boolean
}

export interface FillErrorData {
  templatePath?: string
  casePath?: string
  stage: string
}

// ── Cases ────────────────────────────────────────────────────

export type CaseAction = 'create' | 'load' | 'save' | 'update' | 'validate'

export interface CaseStartedData {
  action: CaseAction
  casePath?: string
  entity?: string
  formCode?: string
}

export interface CaseCompletedData {
  action: CaseAction
  casePath: string
  caseId: string
  caseName: string
  entity: string
  formCode: string
  valid?: boolean
  missingFields?: string[]
}

export interface CaseErrorData {
  action: CaseAction
  casePath?: string
  stage: string
}

// ── Workflows ────────────────────────────────────────────────

export type WorkflowKind = 'single' | 'update'

export interface WorkflowStartedData {
  kind: WorkflowKind
  formCode: string
}

export interface WorkflowProgressData {
  kind: WorkflowKind
  formCode: string
  step: string
  stepNumber: number
}

export interface WorkflowCompletedData {
  kind: WorkflowKind
  formCode: string
  documentPath: string
  filledPath?: string
  updated?: boolean
}

export interface WorkflowErrorData {
  kind: WorkflowKind
  formCode: string
  stage: string
}

export interface BulkStartedData {
  formCodes: string[]
}

export interface BulkProgressData {
  formCode: string
  index: number
  total: number
  ok: boolean
}

export interface BulkCompletedData {
  total: number
  succeeded: number
  failed: number
}

// ── Type map ─────────────────────────────────────────────────

export interface EventDataMap {
  'browse.started': BrowseStartedData
  'browse.completed': BrowseCompletedData
  'browse.error': BrowseErrorData

  'download.started': DownloadStartedData
  'download.progress': DownloadProgressData
  'download.completed': DownloadCompletedData
  'download.error': DownloadErrorData

  'inspect.started': InspectStartedData
  'inspect.completed': InspectCompletedData
  'inspect.error': InspectErrorData

  'fill.started': FillStartedData
  'fill.progress': FillProgressData
  'fill.completed': FillCompletedData
  'fill.error': FillErrorData

  'case.started': CaseStartedData
  'case.completed': CaseCompletedData
  'case.error': CaseErrorData

  'workflow.started': WorkflowStartedData
  'workflow.progress': WorkflowProgressData
  'workflow.completed': WorkflowCompletedData
  'workflow.error': WorkflowErrorData

  'bulk.started': BulkStartedData
  'bulk.progress': BulkProgressData
  'bulk.completed': BulkCompletedData
}

export type EventType = keyof EventDataMap

/** What a publisher supplies; the bus stamps the timestamp. */
export type EventInput = {
  [T in EventType]: { type: T; data: EventDataMap[T]; error?: string }
}[EventType]

export type FormEvent = {
  [T in EventType]: {
    readonly type: T
    /** RFC 3339 */
    readonly timestamp: string
    readonly data: Readonly<EventDataMap[T]>
    readonly error?: string
  }
}[EventType]

export type EventOf<T extends EventType> = Extract<FormEvent, { type: T }>

export function createEvent(input: EventInput, now: Date = new Date()): FormEvent {
  const event: FormEvent = { ...input, timestamp: now.toISOString() }
  Object.freeze(event.data)
  return Object.freeze(event)
}

export function isTerminalType(type: string): boolean {
  return type.endsWith('.completed') || type.endsWith('.error')
}

/** The JSON shape streamed to consumers, one per message. */
export interface WireEvent {
  type: string
  timestamp: string
  data: Record<string, unknown>
  error?: string
}

export function toWireEvent(event: FormEvent): WireEvent {
  return {
    type: event.type,
    timestamp: event.timestamp,
    data: { ...event.data },
    ...(event.error !== undefined ? { error: event.error } : {}),
  }
}
