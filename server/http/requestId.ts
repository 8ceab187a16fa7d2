/**
 * Request correlation ID: the caller's `x-request-id` when it sent a usable
 * one, otherwise a fresh UUID. Echoed on every response and logged with it.
 */

import { randomUUID } from 'node:crypto'
import type { IncomingMessage } from 'node:http'

const MAX_REQUEST_ID_LENGTH = 128

export function getRequestId(req: IncomingMessage): string {
  const header = req.headers['x-request-id']
  if (typeof header === 'string' && header.length > 0 && header.length <= MAX_REQUEST_ID_LENGTH && /^[\x21-\x7e]+$/.test(header)) {
    return header
  }
  return randomUUID()
}
