/**
 * browse: list the catalog's regions, or the forms of one region.
 */

import { Catalog } from '../catalog/catalog.ts'
import { CatalogError } from '../errors.ts'
import type { CatalogEntry } from '../model/types.ts'
import { failure, startRun } from './context.ts'
import type { CommandContext } from './context.ts'

export interface BrowseOptions {
  catalogPath?: string
  region?: string
}

export type BrowseResult =
  | { kind: 'regions'; regions: string[] }
  | { kind: 'entries'; region: string; entries: CatalogEntry[] }

export async function browse(ctx: CommandContext, opts: BrowseOptions = {}): Promise<BrowseResult> {
  const run = startRun(ctx)
  const catalogPath = opts.catalogPath ?? ctx.config.catalogFile
  const region = opts.region?.trim() || undefined
  const ids = { catalogPath, ...(region ? { region } : {}) }

  run.emit({ type: 'browse.started', data: ids })

  let stage = 'load_catalog'
  try {
    const catalog = await Catalog.load(catalogPath)

    if (region === undefined) {
      const regions = catalog.regions()
      run.emit({ type: 'browse.completed', data: { ...ids, regionCount: regions.length, entryCount: catalog.size } })
      return { kind: 'regions', regions }
    }

    stage = 'filter_region'
    const entries = catalog.byRegion(region)
    if (entries.length === 0) {
      throw new CatalogError('NotFound', `no forms found for region '${region}'`, { stage, context: { region } })
    }
    run.emit({ type: 'browse.completed', data: { ...ids, regionCount: 1, entryCount: entries.length } })
    return { kind: 'entries', region, entries }
  } catch (err) {
    const { error, stage: failedStage } = failure(err, stage)
    run.emit({ type: 'browse.error', data: { ...ids, stage: failedStage }, error: error.message })
    throw error
  }
}
