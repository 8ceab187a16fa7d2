import { existsSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { createCommandContext } from '../src/commands/context.ts'
import { configFromEnv, ensureDirectories } from '../src/config.ts'
import { errorMessage } from '../src/errors.ts'
import { TaskRunner } from '../src/tasks/taskRunner.ts'
import { Logger } from '../src/utils/logger.ts'
import { createHttpService } from './http/httpService.ts'
import { GracefulShutdown } from './shutdown.ts'

const BUNDLED_CATALOG = fileURLToPath(new URL('../data/forms_catalog.csv', import.meta.url))

async function main(): Promise<void> {
  let config = configFromEnv(process.env, process.cwd())
  const log = new Logger(config.logLevel)

  if (!process.env.FORMDESK_CATALOG && !existsSync(config.catalogFile)) {
    log.info('No catalog in data directory, using bundled sample', { catalogFile: BUNDLED_CATALOG })
    config = { ...config, catalogFile: BUNDLED_CATALOG }
  }
  await ensureDirectories(config)

  const ctx = createCommandContext(config, { log })
  const tasks = new TaskRunner(log)
  const http = createHttpService(ctx, tasks)

  const shutdown = new GracefulShutdown(log)
  shutdown.register('tasks', () => tasks.drain())
  shutdown.register('http', () => http.stop())
  shutdown.installSignalHandlers()

  await http.start()
  log.info('Server started', {
    port: http.port,
    dataDir: config.dataDir,
    catalogFile: config.catalogFile,
    nodeVersion: process.version,
    logLevel: config.logLevel,
  })
}

main().catch((err) => {
  process.stderr.write(`formdesk: ${errorMessage(err)}\n`)
  process.exit(1)
})
