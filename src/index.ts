export { Catalog, CATALOG_COLUMNS } from './catalog/catalog.ts'
export { parseCSV } from './catalog/csv.ts'
export { documentFileName, fetchToFile, isFetchableUrl } from './catalog/fetchDocument.ts'
export type { FetchLike } from './catalog/fetchDocument.ts'
export { loadProvenance, markInspected, provenancePath, saveProvenance } from './catalog/provenance.ts'

export { CaseStore } from './cases/caseStore.ts'
export type { NewCase, StoredCase } from './cases/caseStore.ts'
export { createCaseId } from './cases/caseId.ts'

export { browse } from './commands/browse.ts'
export type { BrowseOptions, BrowseResult } from './commands/browse.ts'
export { createCase, listCases, loadCase, saveCase, updateCaseFields, validateCase } from './commands/cases.ts'
export { createCommandContext } from './commands/context.ts'
export type { CommandContext, ContextOptions } from './commands/context.ts'
export { download } from './commands/download.ts'
export type { DownloadOptions, DownloadResult } from './commands/download.ts'
export { fill, fillFromCase } from './commands/fill.ts'
export type { CaseFillOptions, FillOptions, FillResult } from './commands/fill.ts'
export { inspect } from './commands/inspect.ts'
export type { InspectOptions, InspectResult } from './commands/inspect.ts'

export { configFromEnv, createConfig, ensureDirectories, findDataDir } from './config.ts'
export type { FormDeskConfig } from './config.ts'

export * from './errors.ts'

export { EventBus, Subscription, matchesPattern } from './events/bus.ts'
export { createEvent, toWireEvent } from './events/types.ts'
export type { EventDataMap, EventOf, EventType, FormEvent, WireEvent } from './events/types.ts'

export { listFieldDescriptors, listFields, exportTemplate } from './forms/extractor.ts'
export type { FieldDescriptor, FieldKind } from './forms/extractor.ts'
export { FillEngine } from './forms/fillEngine.ts'
export type { AttemptObserver, FillOutcome, StrategyAttempt } from './forms/fillEngine.ts'
export { AcroFormStrategy, RawFieldStrategy, defaultStrategies } from './forms/strategies.ts'
export type { FillStrategy } from './forms/strategies.ts'
export { buildTemplate, readTemplate, writeTemplate } from './forms/template.ts'

export type { Case, CatalogEntry, FieldValues, Provenance, Template, ValidationStatus } from './model/types.ts'

export { TaskRunner } from './tasks/taskRunner.ts'
export type { TaskRecord, TaskRunnerOptions, TaskStatus } from './tasks/taskRunner.ts'

export { Logger } from './utils/logger.ts'
export type { Log, LogLevel } from './utils/logger.ts'

export { runBulkWorkflow, runUpdateWorkflow, runWorkflow } from './workflows/orchestrator.ts'
export type { BulkWorkflowResult, UpdateWorkflowResult, WorkflowResult } from './workflows/orchestrator.ts'
