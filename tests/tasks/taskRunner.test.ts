import { describe, it, expect } from 'vitest'
import { FillError } from '../../src/errors.ts'
import { TaskRunner } from '../../src/tasks/taskRunner.ts'
import { recordingLog } from '../fixtures/log.ts'

function runner(retain?: number) {
  let n = 0
  const log = recordingLog()
  const tasks = new TaskRunner(log, {
    retain,
    now: () => new Date('2024-01-01T00:00:00.000Z'),
    newId: () => `task-${++n}`,
  })
  return { tasks, log }
}

describe('TaskRunner', () => {
  it('records a successful task with its result', async () => {
    const { tasks } = runner()
    const { id, done } = tasks.submit('download', async () => ({ documentPath: '/d/a.pdf' }))

    expect(id).toBe('task-1')
    expect(tasks.get(id)?.status).toBe('running')
    expect(tasks.running).toBe(1)

    expect(await done).toEqual({
      id: 'task-1',
      name: 'download',
      status: 'succeeded',
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:00.000Z',
      result: { documentPath: '/d/a.pdf' },
    })
    expect(tasks.get(id)?.status).toBe('succeeded')
  })

  it('records a failure without rejecting', async () => {
    const { tasks, log } = runner()
    const { done } = tasks.submit('fill', async () => {
      throw new FillError('DocumentNotFound', 'document not found: /x.pdf', { stage: 'resolve_document' })
    })

    const record = await done
    expect(record.status).toBe('failed')
    expect(record.error).toEqual({ message: 'document not found: /x.pdf', code: 'DocumentNotFound', stage: 'resolve_document' })
    expect(log.lines.map((l) => l.message)).toContain('Task failed')
  })

  it('records foreign errors by message only', async () => {
    const { tasks } = runner()
    const record = await tasks.submit('x', async () => {
      throw new Error('plain')
    }).done
    expect(record.error).toEqual({ message: 'plain' })
  })

  it('returns copies, so callers cannot edit records', async () => {
    const { tasks } = runner()
    const { id, done } = tasks.submit('x', async () => 1)
    await done
    const copy = tasks.get(id)
    if (copy) copy.status = 'failed'
    expect(tasks.get(id)?.status).toBe('succeeded')
  })

  it('lists every task and returns undefined for unknown ids', async () => {
    const { tasks } = runner()
    tasks.submit('a', async () => 1)
    tasks.submit('b', async () => 2)
    await tasks.drain()

    expect(tasks.list().map((r) => [r.id, r.name, r.status])).toEqual([
      ['task-1', 'a', 'succeeded'],
      ['task-2', 'b', 'succeeded'],
    ])
    expect(tasks.get('nope')).toBeUndefined()
  })

  it('drops the oldest finished records beyond the retention limit', async () => {
    const { tasks } = runner(2)
    await tasks.submit('a', async () => 1).done
    await tasks.submit('b', async () => 2).done
    await tasks.submit('c', async () => 3).done

    expect(tasks.list().map((r) => r.id)).toEqual(['task-2', 'task-3'])
    expect(tasks.get('task-1')).toBeUndefined()
  })

  it('never drops a running task, and evicts in order of completion', async () => {
    const { tasks } = runner(1)
    let release: () => void = () => {}
    const slow = tasks.submit('slow', () => new Promise<void>((resolve) => { release = resolve }))
    await tasks.submit('quick-1', async () => 1).done
    await tasks.submit('quick-2', async () => 2).done

    expect(tasks.list().map((r) => [r.id, r.status])).toEqual([
      ['task-1', 'running'],
      ['task-3', 'succeeded'],
    ])

    release()
    await slow.done
    expect(tasks.list().map((r) => r.id)).toEqual(['task-1'])
  })

  it('drains tasks submitted while draining', async () => {
    const { tasks } = runner()
    let inner: Promise<unknown> | undefined
    tasks.submit('outer', async () => {
      inner = tasks.submit('inner', async () => 'late').done
    })

    await tasks.drain()

    expect(inner).toBeDefined()
    expect(tasks.running).toBe(0)
    expect(tasks.list().map((r) => r.status)).toEqual(['succeeded', 'succeeded'])
  })
})
