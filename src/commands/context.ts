/**
 * Everything a command needs, passed explicitly: configuration, the event
 * bus it reports through, a logger, the fetch used for downloads, the fill
 * engine and the case store.
 */

import { mkdir } from 'node:fs/promises'
import { CaseStore } from '../cases/caseStore.ts'
import type { FetchLike } from '../catalog/fetchDocument.ts'
import type { FormDeskConfig } from '../config.ts'
import { FormDeskError, errorMessage } from '../errors.ts'
import { EventBus } from '../events/bus.ts'
import { CommandRun } from '../events/commandRun.ts'
import { FillEngine } from '../forms/fillEngine.ts'
import { Logger } from '../utils/logger.ts'
import type { Log } from '../utils/logger.ts'

export interface CommandContext {
  config: FormDeskConfig
  bus: EventBus
  log: Log
  fetch: FetchLike
  engine: FillEngine
  cases: CaseStore
  now: () => Date
}

export interface ContextOptions {
  bus?: EventBus
  log?: Log
  fetch?: FetchLike
  engine?: FillEngine
  now?: () => Date
}

export function createCommandContext(config: FormDeskConfig, opts: ContextOptions = {}): CommandContext {
  const log = opts.log ?? new Logger(config.logLevel)
  const now = opts.now ?? (() => new Date())
  return {
    config,
    bus: opts.bus ?? new EventBus(config.eventBufferSize),
    log,
    fetch: opts.fetch ?? ((url) => fetch(url)),
    engine: opts.engine ?? new FillEngine(undefined, { log }),
    cases: new CaseStore(config.casesDir, now),
    now,
  }
}

export function startRun(ctx: CommandContext): CommandRun {
  return new CommandRun(ctx.bus, ctx.log, ctx.now)
}

export async function ensureDir(dir: string, stage = 'create_dir'): Promise<void> {
  try {
    await mkdir(dir, { recursive: true })
  } catch (err) {
    throw new FormDeskError('CreateDirFailed', `failed to create directory ${dir}: ${errorMessage(err)}`, {
      stage,
      cause: err,
    })
  }
}

export interface Failure {
  error: FormDeskError
  stage: string
}

/**
 * What a failing command reports and rethrows: a FormDeskError that already
 * names its stage passes through untouched, anything else is wrapped at
 * `stage`.
 */
export function failure(err: unknown, stage: string): Failure {
  if (err instanceof FormDeskError && err.stage !== undefined) return { error: err, stage: err.stage }
  return { error: new FormDeskError('Unexpected', errorMessage(err), { stage, cause: err }), stage }
}
