/**
 * Event lifecycle of one command invocation.
 *
 * A run publishes `started` at most once, any number of progress events, and
 * exactly one terminal event. Anything published after the terminal event is
 * dropped and logged, so a command cannot report two outcomes.
 */

import type { EventBus } from './bus.ts'
import { createEvent, isTerminalType } from './types.ts'
import type { EventInput } from './types.ts'
import type { Log } from '../utils/logger.ts'

export class CommandRun {
  private started = false
  private finished = false

  constructor(
    private readonly bus: EventBus,
    private readonly log: Log,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get isFinished(): boolean {
    return this.finished
  }

  emit(input: EventInput): void {
    if (this.finished) {
      this.log.warn('Event after terminal event dropped', { type: input.type })
      return
    }
    if (input.type.endsWith('.started')) {
      if (this.started) {
        this.log.warn('Duplicate started event dropped', { type: input.type })
        return
      }
      this.started = true
    }
    if (isTerminalType(input.type)) this.finished = true
    this.bus.publish(createEvent(input, this.now()))
  }
}
