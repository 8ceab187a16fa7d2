/**
 * In-process publish/subscribe with bounded, non-blocking delivery.
 *
 * A Subscription is a buffered channel: `publish` offers the event to every
 * open subscription whose pattern matches, and a subscription whose buffer is
 * full drops that event (counted in `dropped`) instead of holding up the
 * publisher. Consumers read with `for await`, `next()` or `tryNext()`.
 *
 * Pattern grammar:
 *   "*"          every event
 *   "prefix.*"   every type that starts with "prefix."
 *   anything     exactly that type
 */

import type { FormEvent } from './types.ts'

export const DEFAULT_BUFFER_SIZE = 100

export function matchesPattern(pattern: string, type: string): boolean {
  if (pattern === '*') return true
  if (pattern.length > 2 && pattern.endsWith('.*')) {
    return type.startsWith(pattern.slice(0, -1))
  }
  return pattern === type
}

type Waiter = (result: IteratorResult<FormEvent, undefined>) => void

export class Subscription implements AsyncIterable<FormEvent> {
  readonly pattern: string
  /** Events discarded because the buffer was full. */
  dropped = 0

  private readonly capacity: number
  private buffer: FormEvent[] = []
  private waiters: Waiter[] = []
  private isClosed = false

  constructor(pattern: string, capacity: number) {
    this.pattern = pattern
    this.capacity = Math.max(1, capacity)
  }

  get closed(): boolean {
    return this.isClosed
  }

  /** Events buffered and not yet received. */
  get pending(): number {
    return this.buffer.length
  }

  /**
   * Non-blocking send. Hands the event straight to a waiting reader when
   * there is one, else buffers it; returns false when it was dropped.
   */
  offer(event: FormEvent): boolean {
    if (this.isClosed) return false
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value: event, done: false })
      return true
    }
    if (this.buffer.length >= this.capacity) {
      this.dropped++
      return false
    }
    this.buffer.push(event)
    return true
  }

  /** Next event; resolves `done` once closed and drained. */
  next(): Promise<IteratorResult<FormEvent, undefined>> {
    const event = this.buffer.shift()
    if (event) return Promise.resolve({ value: event, done: false })
    if (this.isClosed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  /** Non-blocking receive. */
  tryNext(): FormEvent | undefined {
    return this.buffer.shift()
  }

  /** Take every buffered event. */
  drain(): FormEvent[] {
    const events = this.buffer
    this.buffer = []
    return events
  }

  /**
   * Close the channel. Buffered events stay readable; pending readers are
   * released. Returns false when it was already closed.
   */
  close(): boolean {
    if (this.isClosed) return false
    this.isClosed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
    return true
  }

  [Symbol.asyncIterator](): AsyncIterator<FormEvent, undefined> {
    return {
      next: () => this.next(),
    }
  }
}

export class EventBus {
  private subscriptions = new Set<Subscription>()
  private readonly bufferSize: number

  constructor(bufferSize: number = DEFAULT_BUFFER_SIZE) {
    this.bufferSize = bufferSize
  }

  get subscriberCount(): number {
    return this.subscriptions.size
  }

  subscribe(pattern: string): Subscription {
    const sub = new Subscription(pattern, this.bufferSize)
    this.subscriptions.add(sub)
    return sub
  }

  /** Removes and closes the subscription; unknown or closed handles are ignored. */
  unsubscribe(sub: Subscription): void {
    if (!this.subscriptions.delete(sub)) return
    sub.close()
  }

  publish(event: FormEvent): void {
    // Snapshot, so registry changes during fan-out do not affect this event.
    for (const sub of [...this.subscriptions]) {
      if (matchesPattern(sub.pattern, event.type)) sub.offer(event)
    }
  }

  /** Close every subscription. */
  clear(): void {
    for (const sub of this.subscriptions) sub.close()
    this.subscriptions.clear()
  }
}
