/**
 * GracefulShutdown: ordered cleanup on process signals.
 *
 * Handlers run in LIFO (reverse registration) order, so the HTTP service
 * registered last stops accepting work before the task runner it feeds is
 * drained. A stuck handler cannot hold the process past `timeoutMs`.
 *
 *   const shutdown = new GracefulShutdown(log)
 *   shutdown.register('tasks', () => tasks.drain())
 *   shutdown.register('http', () => http.stop())
 *   shutdown.installSignalHandlers()
 */

import { errorMessage } from '../src/errors.ts'
import type { Log } from '../src/utils/logger.ts'

export interface ShutdownHandler {
  name: string
  fn: () => Promise<void> | void
}

export interface ShutdownOptions {
  timeoutMs?: number
  /** Replaced in tests. */
  exit?: (code: number) => void
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = []
  private inProgress: Promise<void> | undefined
  private readonly timeoutMs: number
  private readonly exit: (code: number) => void
  private readonly log: Log

  constructor(log: Log, opts: ShutdownOptions = {}) {
    this.log = log.child({ component: 'shutdown' })
    this.timeoutMs = opts.timeoutMs ?? 10_000
    this.exit = opts.exit ?? ((code) => process.exit(code))
  }

  register(name: string, fn: () => Promise<void> | void): void {
    this.handlers.push({ name, fn })
  }

  /** Runs every handler once; later calls wait for the first run. */
  shutdown(): Promise<void> {
    this.inProgress ??= this.run()
    return this.inProgress
  }

  private async run(): Promise<void> {
    this.log.info('Graceful shutdown started', { handlerCount: this.handlers.length, timeoutMs: this.timeoutMs })

    const runHandlers = async (): Promise<void> => {
      for (const handler of [...this.handlers].reverse()) {
        try {
          await handler.fn()
          this.log.info('Shutdown handler completed', { handler: handler.name })
        } catch (err) {
          this.log.error('Shutdown handler failed', { handler: handler.name, error: errorMessage(err) })
        }
      }
    }

    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.log.error('Shutdown timed out', { timeoutMs: this.timeoutMs })
        resolve()
      }, this.timeoutMs)
    })

    await Promise.race([runHandlers(), timedOut])
    clearTimeout(timer)
    this.log.info('Graceful shutdown complete')
  }

  /** SIGTERM and SIGINT start a shutdown; a second signal exits at once. */
  installSignalHandlers(): void {
    let forceOnNextSignal = false

    const onSignal = (signal: string) => {
      if (forceOnNextSignal) {
        this.log.warn('Received second signal, forcing exit', { signal })
        this.exit(1)
        return
      }
      forceOnNextSignal = true
      this.log.info('Received signal, starting shutdown', { signal })
      void this.shutdown().then(
        () => this.exit(0),
        (err: unknown) => {
          this.log.error('Shutdown error', { error: errorMessage(err) })
          this.exit(1)
        },
      )
    }

    process.on('SIGTERM', () => onSignal('SIGTERM'))
    process.on('SIGINT', () => onSignal('SIGINT'))
  }
}
