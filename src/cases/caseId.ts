/**
 * Case identifiers: `<entity>_<form>_<YYYYMMDD>_<HHMMSS>.<microseconds>` in UTC.
 *
 * The microsecond part comes from a clock that never repeats or goes
 * backwards within a process, so creating cases in a tight loop still yields
 * distinct ids.
 */

export class MicrosecondClock {
  private last = 0

  /** Microseconds since the epoch, strictly greater than the previous call. */
  next(now: Date = new Date()): number {
    const micros = Math.max(now.getTime() * 1000, this.last + 1)
    this.last = micros
    return micros
  }
}

const processClock = new MicrosecondClock()

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/** `20240131_094500.123456` */
export function formatCaseTimestamp(micros: number): string {
  const d = new Date(Math.floor(micros / 1000))
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  return `${date}_${time}.${pad(micros % 1_000_000, 6)}`
}

export function createCaseId(
  entity: string,
  formCode: string,
  now: Date = new Date(),
  clock: MicrosecondClock = processClock,
): string {
  return `${entity}_${formCode}_${formatCaseTimestamp(clock.next(now))}`
}
