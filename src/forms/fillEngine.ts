/**
 * Fill engine: applies template values with an ordered list of strategies
 * and locks the result on request.
 *
 * Strategies run strictly in order: the first success wins and later
 * strategies are never touched. When every strategy fails, the last failure
 * is the one reported.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { PDFDocument } from 'pdf-lib'
import { FillError, errorMessage, isNotFoundError } from '../errors.ts'
import type { FieldValues } from '../model/types.ts'
import type { Log } from '../utils/logger.ts'
import { defaultStrategies } from './strategies.ts'
import type { FillStrategy } from './strategies.ts'

export interface StrategyAttempt {
  strategy: string
  ok: boolean
  /** Set on failures. */
  reason?: string
}

export type AttemptObserver = (attempt: StrategyAttempt) => void

export interface FillOutcome {
  bytes: Uint8Array
  strategy: string
  attempts: StrategyAttempt[]
}

export interface FillEngineOptions {
  log: Log
  /** Sees every attempt of every fill this engine runs. */
  onAttempt?: AttemptObserver
}

export class FillEngine {
  readonly strategies: readonly FillStrategy[]
  private readonly log: Log
  private readonly onAttempt?: AttemptObserver

  constructor(strategies: FillStrategy[] = defaultStrategies(), options: FillEngineOptions) {
    if (strategies.length === 0) throw new Error('FillEngine needs at least one strategy')
    this.strategies = [...strategies]
    this.log = options.log.child({ component: 'fill-engine' })
    this.onAttempt = options.onAttempt
  }

  private report(attempt: StrategyAttempt, observe?: AttemptObserver): void {
    this.onAttempt?.(attempt)
    observe?.(attempt)
  }

  async fillBytes(document: Uint8Array, fields: FieldValues, observe?: AttemptObserver): Promise<FillOutcome> {
    const attempts: StrategyAttempt[] = []
    let lastError: unknown

    for (const [index, strategy] of this.strategies.entries()) {
      try {
        const bytes = await strategy.tryFill(document, fields)
        const attempt: StrategyAttempt = { strategy: strategy.name, ok: true }
        attempts.push(attempt)
        this.report(attempt, observe)
        return { bytes, strategy: strategy.name, attempts }
      } catch (err) {
        lastError = err
        const attempt: StrategyAttempt = { strategy: strategy.name, ok: false, reason: errorMessage(err) }
        attempts.push(attempt)
        this.log.warn('Fill strategy failed', {
          strategy: strategy.name,
          code: index === 0 ? 'PrimaryFillFailed' : 'FallbackFillFailed',
          reason: attempt.reason,
          remaining: this.strategies.length - index - 1,
        })
        this.report(attempt, observe)
      }
    }

    const last = attempts[attempts.length - 1]
    throw new FillError(
      'SecondaryFillFailed',
      `all fill strategies failed; ${last.strategy}: ${last.reason}`,
      { stage: 'fill_document', cause: lastError, context: { attempts } },
    )
  }

  /** Fill the document at `inputPath` and write the result to `outputPath`. */
  async fillFile(
    inputPath: string,
    fields: FieldValues,
    outputPath: string,
    observe?: AttemptObserver,
  ): Promise<FillOutcome> {
    const document = await readInput(inputPath)
    const outcome = await this.fillBytes(document, fields, observe)
    try {
      await mkdir(dirname(outputPath), { recursive: true })
      await writeFile(outputPath, outcome.bytes)
    } catch (err) {
      throw new FillError('WriteFailed', `failed to write ${outputPath}: ${errorMessage(err)}`, {
        stage: 'fill_document',
        cause: err,
      })
    }
    return outcome
  }

  /** Mark every field read-only and write the locked copy to `outputPath`. */
  async lockFields(inputPath: string, outputPath: string): Promise<void> {
    try {
      const doc = await PDFDocument.load(await readFile(inputPath), { ignoreEncryption: true })
      for (const field of doc.getForm().getFields()) field.enableReadOnly()
      const bytes = await doc.save({ updateFieldAppearances: false })
      await mkdir(dirname(outputPath), { recursive: true })
      await writeFile(outputPath, bytes)
    } catch (err) {
      throw new FillError('FlattenFailed', `failed to flatten ${inputPath}: ${errorMessage(err)}`, {
        stage: 'flatten',
        cause: err,
      })
    }
  }
}

async function readInput(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path))
  } catch (err) {
    throw new FillError(
      'DocumentNotFound',
      isNotFoundError(err) ? `document not found: ${path}` : `failed to read ${path}: ${errorMessage(err)}`,
      { stage: 'resolve_document', cause: err },
    )
  }
}
