import { basename, dirname, extname, join } from 'node:path'

export const FILLED_SUFFIX = '_filled.pdf'
export const FLAT_SUFFIX = '_flat.pdf'
export const TEMPLATE_SUFFIX = '_template.json'

/** File name without directory or extension. */
export function stem(path: string): string {
  const base = basename(path)
  return base.slice(0, base.length - extname(base).length)
}

export interface OutputPathOptions {
  outputPath?: string
  outputDir?: string
  /** Path whose base name names the output. */
  inputName: string
  suffix: string
  cwd?: string
}

/**
 * Explicit path first, then `<outputDir>/<stem><suffix>`, then the same name
 * in the working directory.
 */
export function resolveOutputPath(opts: OutputPathOptions): string {
  if (opts.outputPath) return opts.outputPath
  const name = stem(opts.inputName) + opts.suffix
  if (opts.outputDir) return join(opts.outputDir, name)
  return join(opts.cwd ?? process.cwd(), name)
}

/** `out/a_filled.pdf` → `out/a_filled_flat.pdf` */
export function flatPathFor(filledPath: string): string {
  return join(dirname(filledPath), stem(filledPath) + FLAT_SUFFIX)
}
