/**
 * HTTP service: a small JSON API over the commands plus a Server-Sent
 * Events stream of the event bus.
 *
 * Commands that take time (download, inspect, fill, case creation) are
 * handed to the TaskRunner and answered with `202 {taskId}` straight away;
 * their progress is only visible on `/api/events`. Quick reads (health,
 * catalog, case listing, task records) answer directly.
 */

import { createServer } from 'node:http'
import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import { z } from 'zod'
import { browse } from '../../src/commands/browse.ts'
import { createCase, listCases } from '../../src/commands/cases.ts'
import type { CommandContext } from '../../src/commands/context.ts'
import { download } from '../../src/commands/download.ts'
import { fill, fillFromCase } from '../../src/commands/fill.ts'
import { inspect } from '../../src/commands/inspect.ts'
import { FormDeskError, errorMessage } from '../../src/errors.ts'
import type { Subscription } from '../../src/events/bus.ts'
import { toWireEvent } from '../../src/events/types.ts'
import { describeIssues, templateFromWire, templateWireSchema } from '../../src/model/schemas.ts'
import type { TaskRunner } from '../../src/tasks/taskRunner.ts'
import { parseCorsOrigins, setCorsHeaders, setSecurityHeaders } from './headers.ts'
import { getRequestId } from './requestId.ts'

/** Maximum allowed request body size in bytes (1 MB). */
export const MAX_BODY_SIZE = 1024 * 1024

/** Maximum time (ms) to wait for the full request body before aborting. */
export const BODY_TIMEOUT_MS = 30_000

export interface HttpServiceOptions {
  /** Defaults to the configured port; 0 picks a free one. */
  port?: number
  host?: string
  heartbeatMs?: number
  bodyTimeoutMs?: number
}

export interface HttpService {
  readonly server: Server
  /** Actual port once started. */
  port: number
  start(): Promise<void>
  stop(): Promise<void>
}

// ── Request bodies ────────────────────────────────────────────────

const downloadBody = z.object({
  formCode: z.string().trim().min(1),
  outputDir: z.string().min(1).optional(),
})

const inspectBody = z.object({
  documentPath: z.string().min(1),
  output: z.string().min(1).optional(),
})

const fillBody = z
  .object({
    templatePath: z.string().min(1).optional(),
    template: templateWireSchema.optional(),
    outputPath: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    flatten: z.boolean().default(false),
  })
  .refine((b) => b.templatePath !== undefined || b.template !== undefined, {
    message: 'templatePath or template is required',
  })

const createCaseBody = z.object({
  formCode: z.string().trim().min(1),
  caseName: z.string(),
  entity: z.string().trim().min(1),
  templatePath: z.string().min(1).optional(),
  documentReference: z.string().min(1).optional(),
})

const caseFillBody = z.object({
  casePath: z.string().min(1),
  outputDir: z.string().min(1).optional(),
  flatten: z.boolean().default(false),
})

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: Record<string, unknown>,
  ) {
    super(String(body.error))
  }
}

function statusFor(err: unknown): number {
  if (!(err instanceof FormDeskError)) return 500
  if (err.code === 'NotFound') return 404
  if (err.code === 'InvalidInput') return 400
  return 500
}

export function createHttpService(
  ctx: CommandContext,
  tasks: TaskRunner,
  options: HttpServiceOptions = {},
): HttpService {
  const log = ctx.log.child({ component: 'http' })
  const cors = parseCorsOrigins(ctx.config.corsOrigin)
  const heartbeatMs = options.heartbeatMs ?? ctx.config.sseHeartbeatMs
  const bodyTimeoutMs = options.bodyTimeoutMs ?? BODY_TIMEOUT_MS
  const streams = new Map<Subscription, ServerResponse>()

  function sendJson(res: ServerResponse, data: unknown, status = 200): void {
    if (res.headersSent) return
    res.writeHead(status, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify(data))
  }

  function sendError(res: ServerResponse, err: unknown): void {
    if (err instanceof HttpError) {
      sendJson(res, err.body, err.status)
      return
    }
    const body: Record<string, unknown> = { error: errorMessage(err) }
    if (err instanceof FormDeskError) {
      body.code = err.code
      if (err.stage) body.stage = err.stage
    }
    sendJson(res, body, statusFor(err))
  }

  function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const contentLength = req.headers['content-length']
      if (contentLength !== undefined && parseInt(contentLength, 10) > MAX_BODY_SIZE) {
        req.resume()
        reject(new HttpError(413, { error: 'payload_too_large' }))
        return
      }

      const chunks: Buffer[] = []
      let size = 0
      let settled = false
      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        fn()
      }

      const timer = setTimeout(() => {
        settle(() => reject(new HttpError(408, { error: 'request_timeout' })))
        req.destroy()
      }, bodyTimeoutMs)

      req.on('data', (chunk: Buffer) => {
        if (settled) return
        size += chunk.length
        if (size > MAX_BODY_SIZE) {
          settle(() => reject(new HttpError(413, { error: 'payload_too_large' })))
          req.resume()
          return
        }
        chunks.push(chunk)
      })
      req.on('end', () => settle(() => resolve(Buffer.concat(chunks).toString('utf-8'))))
      req.on('error', (err) => settle(() => reject(err)))
    })
  }

  async function parseBody<S extends z.ZodTypeAny>(req: IncomingMessage, schema: S): Promise<z.output<S>> {
    const raw = await readBody(req)
    let json: unknown
    try {
      json = raw.trim() === '' ? {} : JSON.parse(raw)
    } catch {
      throw new HttpError(400, { error: 'invalid_json' })
    }
    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new HttpError(400, { error: 'invalid_request', issues: describeIssues(parsed.error) })
    }
    return parsed.data
  }

  function accept(res: ServerResponse, name: string, fn: () => Promise<unknown>): void {
    const task = tasks.submit(name, fn)
    sendJson(res, { taskId: task.id }, 202)
  }

  // ── SSE ───────────────────────────────────────────────────────────

  function closeStream(sub: Subscription): void {
    const res = streams.get(sub)
    streams.delete(sub)
    ctx.bus.unsubscribe(sub)
    if (res && !res.writableEnded) res.end()
  }

  function openStream(req: IncomingMessage, res: ServerResponse, pattern: string): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    })
    res.write(': connected\n\n')

    const sub = ctx.bus.subscribe(pattern)
    streams.set(sub, res)
    log.debug('SSE client connected', { pattern, clients: streams.size })

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) res.write(': heartbeat\n\n')
    }, heartbeatMs)
    heartbeat.unref()

    req.on('close', () => {
      clearInterval(heartbeat)
      closeStream(sub)
      log.debug('SSE client disconnected', { clients: streams.size, dropped: sub.dropped })
    })

    const pump = async () => {
      for await (const event of sub) {
        if (res.writableEnded) break
        res.write(`data: ${JSON.stringify(toWireEvent(event))}\n\n`)
      }
      clearInterval(heartbeat)
      if (!res.writableEnded) res.end()
    }
    pump().catch((err) => {
      log.warn('SSE stream failed', { error: errorMessage(err) })
      closeStream(sub)
    })
  }

  // ── Routing ───────────────────────────────────────────────────────

  async function route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const path = url.pathname
    const method = req.method ?? 'GET'

    if (method === 'GET' && path === '/api/health') {
      sendJson(res, { ok: true })
      return
    }

    if (method === 'GET' && path === '/api/catalog') {
      const region = url.searchParams.get('region') ?? undefined
      sendJson(res, await browse(ctx, { region }))
      return
    }

    if (method === 'GET' && path === '/api/events') {
      openStream(req, res, url.searchParams.get('pattern') || '*')
      return
    }

    if (method === 'GET' && path === '/api/cases') {
      const entity = url.searchParams.get('entity') || undefined
      sendJson(res, { cases: await listCases(ctx, { entity }) })
      return
    }

    if (method === 'GET' && path === '/api/tasks') {
      sendJson(res, { tasks: tasks.list() })
      return
    }

    const taskMatch = /^\/api\/tasks\/([^/]+)$/.exec(path)
    if (method === 'GET' && taskMatch) {
      const record = tasks.get(decodeURIComponent(taskMatch[1]))
      if (record) sendJson(res, record)
      else sendJson(res, { error: 'task_not_found' }, 404)
      return
    }

    if (method === 'POST' && path === '/api/download') {
      const body = await parseBody(req, downloadBody)
      accept(res, 'download', () => download(ctx, body))
      return
    }

    if (method === 'POST' && path === '/api/inspect') {
      const body = await parseBody(req, inspectBody)
      accept(res, 'inspect', () => inspect(ctx, body))
      return
    }

    if (method === 'POST' && path === '/api/fill') {
      const body = await parseBody(req, fillBody)
      const template = body.template ? templateFromWire(body.template) : undefined
      accept(res, 'fill', () =>
        fill(ctx, {
          template,
          templatePath: body.templatePath,
          outputPath: body.outputPath,
          outputDir: body.outputDir,
          flatten: body.flatten,
        }),
      )
      return
    }

    if (method === 'POST' && path === '/api/cases') {
      const body = await parseBody(req, createCaseBody)
      accept(res, 'case.create', () => createCase(ctx, body))
      return
    }

    if (method === 'POST' && path === '/api/cases/fill') {
      const body = await parseBody(req, caseFillBody)
      accept(res, 'case.fill', () => fillFromCase(ctx, body))
      return
    }

    sendJson(res, { error: 'not_found' }, 404)
  }

  function handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const startTime = Date.now()
    const requestId = getRequestId(req)
    const url = new URL(req.url ?? '/', 'http://localhost')

    res.setHeader('x-request-id', requestId)
    setSecurityHeaders(res)
    setCorsHeaders(req, res, cors)

    res.on('finish', () => {
      if (url.pathname === '/api/events') return
      log.info('request', {
        requestId,
        method: req.method,
        path: url.pathname,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      })
    })

    if (req.method === 'OPTIONS') {
      res.writeHead(204)
      res.end()
      return
    }

    route(req, res, url).catch((err) => {
      if (!(err instanceof HttpError) && statusFor(err) === 500) {
        log.error('Request failed', { requestId, path: url.pathname, error: errorMessage(err) })
      }
      sendError(res, err)
    })
  }

  const server = createServer(handleRequest)

  const svc: HttpService = {
    server,
    port: options.port ?? ctx.config.port,
    start() {
      return new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(svc.port, options.host, () => {
          server.off('error', reject)
          const addr = server.address()
          if (addr && typeof addr === 'object') svc.port = addr.port
          resolve()
        })
      })
    },
    stop() {
      return new Promise<void>((resolve, reject) => {
        for (const sub of [...streams.keys()]) closeStream(sub)
        server.close((err) => (err ? reject(err) : resolve()))
        server.closeAllConnections()
      })
    },
  }

  return svc
}
