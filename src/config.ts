/**
 * Runtime configuration.
 *
 * A FormDeskConfig is built once (by the server from its environment, by
 * tests from a temp directory) and passed down explicitly; nothing reads
 * process.env below this module.
 */

import { existsSync, statSync } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import { z } from 'zod'
import { DEFAULT_BUFFER_SIZE } from './events/bus.ts'
import { describeIssues } from './model/schemas.ts'
import { LOG_THRESHOLDS } from './utils/logger.ts'
import type { LogThreshold } from './utils/logger.ts'

export const DEFAULT_PORT = 7891
export const DEFAULT_SSE_HEARTBEAT_MS = 30_000
export const DATA_DIR_NAME = '.data'
export const CATALOG_FILE_NAME = 'forms_catalog.csv'

export interface FormDeskConfig {
  dataDir: string
  catalogFile: string
  downloadsDir: string
  templatesDir: string
  outputsDir: string
  casesDir: string
  tempDir: string
  eventBufferSize: number
  logLevel: LogThreshold
  port: number
  corsOrigin?: string
  sseHeartbeatMs: number
}

export function createConfig(dataDir: string, overrides: Partial<FormDeskConfig> = {}): FormDeskConfig {
  return {
    dataDir,
    catalogFile: join(dataDir, 'catalog', CATALOG_FILE_NAME),
    downloadsDir: join(dataDir, 'downloads'),
    templatesDir: join(dataDir, 'templates'),
    outputsDir: join(dataDir, 'outputs'),
    casesDir: join(dataDir, 'cases'),
    tempDir: join(dataDir, 'temp'),
    eventBufferSize: DEFAULT_BUFFER_SIZE,
    logLevel: 'info',
    port: DEFAULT_PORT,
    sseHeartbeatMs: DEFAULT_SSE_HEARTBEAT_MS,
    ...overrides,
  }
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory()
}

/**
 * FORMDESK_DATA_DIR when set; otherwise the nearest `.data` directory in `cwd`
 * or up to three parents; otherwise `<cwd>/.data`.
 */
export function findDataDir(env: NodeJS.ProcessEnv, cwd: string): string {
  const explicit = env.FORMDESK_DATA_DIR?.trim()
  if (explicit) return isAbsolute(explicit) ? explicit : resolve(cwd, explicit)

  let dir = resolve(cwd)
  for (let depth = 0; depth <= 3; depth++) {
    const candidate = join(dir, DATA_DIR_NAME)
    if (isDirectory(candidate)) return candidate
    const parent = dirname(dir)
    if (parent === dir) break
    dir = parent
  }
  return join(resolve(cwd), DATA_DIR_NAME)
}

const intFromEnv = (min: number, max: number) => z.coerce.number().int().min(min).max(max)

const envSchema = z.object({
  FORMDESK_DATA_DIR: z.string().optional(),
  FORMDESK_CATALOG: z.string().min(1).optional(),
  FORMDESK_PORT: intFromEnv(0, 65_535).optional(),
  FORMDESK_EVENT_BUFFER: intFromEnv(1, 100_000).optional(),
  FORMDESK_CORS_ORIGIN: z.string().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_THRESHOLDS))
    .optional(),
})

/** Empty variables count as unset. */
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim()
  }
  return out
}

export function configFromEnv(env: NodeJS.ProcessEnv, cwd: string): FormDeskConfig {
  const parsed = envSchema.safeParse(presentOnly(env))
  if (!parsed.success) {
    throw new Error(`invalid environment: ${describeIssues(parsed.error).join('; ')}`)
  }
  const vars = parsed.data

  const overrides: Partial<FormDeskConfig> = {}
  if (vars.FORMDESK_CATALOG) overrides.catalogFile = resolve(cwd, vars.FORMDESK_CATALOG)
  if (vars.FORMDESK_PORT !== undefined) overrides.port = vars.FORMDESK_PORT
  if (vars.FORMDESK_EVENT_BUFFER !== undefined) overrides.eventBufferSize = vars.FORMDESK_EVENT_BUFFER
  if (vars.FORMDESK_CORS_ORIGIN) overrides.corsOrigin = vars.FORMDESK_CORS_ORIGIN
  if (vars.LOG_LEVEL) overrides.logLevel = vars.LOG_LEVEL

  return createConfig(findDataDir(env, cwd), overrides)
}

/** Create every configured directory. Safe to call repeatedly. */
export async function ensureDirectories(config: FormDeskConfig): Promise<void> {
  const dirs = [
    dirname(config.catalogFile),
    config.downloadsDir,
    config.templatesDir,
    config.outputsDir,
    config.casesDir,
    config.tempDir,
  ]
  for (const dir of dirs) await mkdir(dir, { recursive: true })
}
