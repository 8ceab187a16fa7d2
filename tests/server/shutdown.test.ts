import { describe, it, expect } from 'vitest'
import { GracefulShutdown } from '../../server/shutdown.ts'
import { recordingLog } from '../fixtures/log.ts'

describe('GracefulShutdown', () => {
  it('runs handlers in reverse registration order', async () => {
    const order: string[] = []
    const shutdown = new GracefulShutdown(recordingLog())

    shutdown.register('first', () => { order.push('first') })
    shutdown.register('second', async () => { order.push('second') })
    shutdown.register('third', () => { order.push('third') })

    await shutdown.shutdown()

    expect(order).toEqual(['third', 'second', 'first'])
  })

  it('keeps going when a handler fails, and logs it', async () => {
    const order: string[] = []
    const log = recordingLog()
    const shutdown = new GracefulShutdown(log)

    shutdown.register('first', () => { order.push('first') })
    shutdown.register('failing', async () => { throw new Error('boom') })
    shutdown.register('third', () => { order.push('third') })

    await shutdown.shutdown()

    expect(order).toEqual(['third', 'first'])
    expect(log.lines.filter((l) => l.level === 'error')).toEqual([
      { level: 'error', message: 'Shutdown handler failed', context: { component: 'shutdown', handler: 'failing', error: 'boom' } },
    ])
  })

  it('runs once however often it is called', async () => {
    let calls = 0
    const shutdown = new GracefulShutdown(recordingLog())
    shutdown.register('counter', () => { calls++ })

    await Promise.all([shutdown.shutdown(), shutdown.shutdown()])
    await shutdown.shutdown()

    expect(calls).toBe(1)
  })

  it('gives up on a stuck handler after the timeout', async () => {
    const log = recordingLog()
    const shutdown = new GracefulShutdown(log, { timeoutMs: 20 })
    shutdown.register('stuck', () => new Promise<void>(() => {}))

    await shutdown.shutdown()

    expect(log.lines.map((l) => l.message)).toContain('Shutdown timed out')
  })
})
