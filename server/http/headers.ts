/**
 * Response headers shared by every route: CORS against an explicit
 * allow-list, and a locked-down header set for a JSON/SSE API.
 */

import type { IncomingMessage, ServerResponse } from 'node:http'

// ── CORS ──────────────────────────────────────────────────────────

export interface CorsConfig {
  /** Empty means same-origin only: no CORS headers are sent. */
  allowedOrigins: string[]
}

/** `"http://localhost:5173, http://localhost:7891"` → two origins. `*` is not accepted. */
export function parseCorsOrigins(value: string | undefined): CorsConfig {
  if (!value || value.trim() === '') return { allowedOrigins: [] }
  return {
    allowedOrigins: value
      .split(',')
      .map((o) => o.trim())
      .filter((o) => o !== '' && o !== '*'),
  }
}

/** Returns whether the request's origin (if any) is allowed. */
export function setCorsHeaders(req: IncomingMessage, res: ServerResponse, config: CorsConfig): boolean {
  const origin = req.headers.origin
  if (!origin) return true

  const allowed = config.allowedOrigins.includes(origin)
  if (allowed) {
    res.setHeader('Access-Control-Allow-Origin', origin)
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-Id')
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-Id')
    res.setHeader('Vary', 'Origin')
  }
  return allowed
}

// ── Security headers ──────────────────────────────────────────────

const CSP = "default-src 'none'; frame-ancestors 'none'"

export function setSecurityHeaders(res: ServerResponse): void {
  res.setHeader('X-Content-Type-Options', 'nosniff')
  res.setHeader('X-Frame-Options', 'DENY')
  res.setHeader('Referrer-Policy', 'no-referrer')
  res.setHeader('Content-Security-Policy', CSP)
}
