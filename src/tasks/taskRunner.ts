/**
 * Background tasks for commands started over HTTP.
 *
 * A task is submitted, runs to completion on its own, and leaves a record
 * behind until `retain` newer tasks have finished. Its `done` promise always resolves to the final record; a failure
 * is recorded rather than rejected, so no caller is left with an unhandled
 * rejection.
 */

import { randomUUID } from 'node:crypto'
import { FormDeskError, errorMessage } from '../errors.ts'
import type { Log } from '../utils/logger.ts'

export type TaskStatus = 'running' | 'succeeded' | 'failed'

export interface TaskFailure {
  message: string
  code?: string
  stage?: string
}

export interface TaskRecord {
  id: string
  name: string
  status: TaskStatus
  startedAt: string
  finishedAt?: string
  result?: unknown
  error?: TaskFailure
}

export interface SubmittedTask {
  id: string
  done: Promise<TaskRecord>
}

function describeFailure(err: unknown): TaskFailure {
  if (err instanceof FormDeskError) {
    return { message: err.message, code: err.code, ...(err.stage ? { stage: err.stage } : {}) }
  }
  return { message: errorMessage(err) }
}

export const DEFAULT_TASK_RETENTION = 100

export interface TaskRunnerOptions {
  /** Finished records kept for lookup; older ones are dropped first. */
  retain?: number
  now?: () => Date
  newId?: () => string
}

export class TaskRunner {
  private readonly records = new Map<string, TaskRecord>()
  private readonly finished: string[] = []
  private readonly inFlight = new Set<Promise<TaskRecord>>()
  private readonly log: Log
  private readonly retain: number
  private readonly now: () => Date
  private readonly newId: () => string

  constructor(log: Log, options: TaskRunnerOptions = {}) {
    this.log = log.child({ component: 'tasks' })
    this.retain = options.retain ?? DEFAULT_TASK_RETENTION
    this.now = options.now ?? (() => new Date())
    this.newId = options.newId ?? randomUUID
  }

  submit(name: string, fn: () => Promise<unknown>): SubmittedTask {
    const record: TaskRecord = {
      id: this.newId(),
      name,
      status: 'running',
      startedAt: this.now().toISOString(),
    }
    this.records.set(record.id, record)
    this.log.debug('Task started', { taskId: record.id, name })

    const done = this.execute(record, fn)
    this.inFlight.add(done)
    void done.finally(() => this.inFlight.delete(done))
    return { id: record.id, done }
  }

  private async execute(record: TaskRecord, fn: () => Promise<unknown>): Promise<TaskRecord> {
    try {
      record.result = await fn()
      record.status = 'succeeded'
    } catch (err) {
      record.status = 'failed'
      record.error = describeFailure(err)
      this.log.warn('Task failed', { taskId: record.id, name: record.name, ...record.error })
    }
    record.finishedAt = this.now().toISOString()
    this.evict(record.id)
    return { ...record }
  }

  private evict(finishedId: string): void {
    this.finished.push(finishedId)
    while (this.finished.length > this.retain) {
      const oldest = this.finished.shift()
      if (oldest !== undefined) this.records.delete(oldest)
    }
  }

  get(id: string): TaskRecord | undefined {
    const record = this.records.get(id)
    return record ? { ...record } : undefined
  }

  list(): TaskRecord[] {
    return [...this.records.values()].map((r) => ({ ...r }))
  }

  get running(): number {
    return this.inFlight.size
  }

  /** Wait for every task submitted so far, including ones submitted while waiting. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight)
    }
  }
}
