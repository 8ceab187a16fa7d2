/**
 * download: fetch a catalog form's document and record where it came from.
 *
 * Progress checkpoints are fixed: 0.2 once the form is found, 0.4 before the
 * transfer, 0.8 before the provenance sidecar is written, 1.0 on completion.
 * A sidecar that cannot be written is reported as a warning, never as a
 * failed download.
 */

import { join } from 'node:path'
import { Catalog } from '../catalog/catalog.ts'
import { documentFileName, fetchToFile, isFetchableUrl } from '../catalog/fetchDocument.ts'
import { provenanceForEntry, provenancePath, saveProvenance } from '../catalog/provenance.ts'
import { DownloadError, errorMessage } from '../errors.ts'
import type { CatalogEntry, Provenance } from '../model/types.ts'
import { ensureDir, failure, startRun } from './context.ts'
import type { CommandContext } from './context.ts'

export interface DownloadOptions {
  formCode: string
  /** Defaults to the configured downloads directory. */
  outputDir?: string
  /** Defaults to the configured catalog file. */
  catalogPath?: string
}

export interface DownloadResult {
  documentPath: string
  entry: CatalogEntry
  provenancePath: string
  /** Absent when the sidecar could not be written. */
  provenance?: Provenance
  metadataWarning?: string
}

export async function download(ctx: CommandContext, opts: DownloadOptions): Promise<DownloadResult> {
  const run = startRun(ctx)
  const formCode = opts.formCode.trim()
  const outputDir = opts.outputDir ?? ctx.config.downloadsDir
  const log = ctx.log.child({ command: 'download', formCode })

  run.emit({ type: 'download.started', data: { formCode, outputDir } })

  let stage = 'load_catalog'
  try {
    const catalog = await Catalog.load(opts.catalogPath ?? ctx.config.catalogFile)

    stage = 'find_form'
    const entry = catalog.byCode(formCode)
    if (!entry) {
      throw new DownloadError('NotFound', `form code '${formCode}' is not in the catalog`, { stage })
    }
    run.emit({
      type: 'download.progress',
      data: { formCode, stage: 'found_form', progress: 0.2, formName: entry.formName, region: entry.region },
    })

    stage = 'check_url'
    if (!isFetchableUrl(entry.sourceUrl)) {
      throw new DownloadError(
        'NoSource',
        entry.sourceUrl
          ? `form ${entry.formCode} has no downloadable source (${entry.sourceUrl})`
          : `form ${entry.formCode} has no direct source URL`,
        { stage, context: { sourceUrl: entry.sourceUrl } },
      )
    }

    stage = 'create_dir'
    await ensureDir(outputDir)

    stage = 'download_document'
    const documentPath = join(outputDir, documentFileName(entry))
    run.emit({ type: 'download.progress', data: { formCode, stage: 'downloading', progress: 0.4, documentPath } })
    const bytes = await fetchToFile(ctx.fetch, entry.sourceUrl, documentPath)
    log.info('Document downloaded', { documentPath, bytes })

    run.emit({ type: 'download.progress', data: { formCode, stage: 'saving_metadata', progress: 0.8, documentPath } })
    const result: DownloadResult = { documentPath, entry, provenancePath: provenancePath(documentPath) }
    const provenance = provenanceForEntry(entry, ctx.now())
    try {
      await saveProvenance(documentPath, provenance)
      result.provenance = provenance
    } catch (err) {
      const warning = new DownloadError('MetadataWriteFailed', `failed to write provenance for ${documentPath}: ${errorMessage(err)}`, {
        stage: 'saving_metadata',
        cause: err,
      })
      log.warn('Provenance write failed', { code: warning.code, documentPath, error: errorMessage(err) })
      result.metadataWarning = warning.message
    }

    run.emit({
      type: 'download.completed',
      data: {
        formCode: entry.formCode,
        formName: entry.formName,
        region: entry.region,
        documentPath,
        provenancePath: result.provenancePath,
        progress: 1.0,
        ...(result.metadataWarning ? { metadataWarning: result.metadataWarning } : {}),
      },
    })
    return result
  } catch (err) {
    const { error, stage: failedStage } = failure(err, stage)
    run.emit({ type: 'download.error', data: { formCode, stage: failedStage }, error: error.message })
    throw error
  }
}
