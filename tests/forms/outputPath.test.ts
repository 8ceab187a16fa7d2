import { describe, it, expect } from 'vitest'
import { join } from 'node:path'
import { FILLED_SUFFIX, TEMPLATE_SUFFIX, flatPathFor, resolveOutputPath, stem } from '../../src/forms/outputPath.ts'

describe('stem', () => {
  it('drops directory and extension', () => {
    expect(stem('/forms/us/i-131.pdf')).toBe('i-131')
    expect(stem('archive.tar.gz')).toBe('archive.tar')
    expect(stem('README')).toBe('README')
  })
})

describe('resolveOutputPath', () => {
  it('prefers an explicit path', () => {
    expect(
      resolveOutputPath({ outputPath: '/tmp/x.pdf', outputDir: '/out', inputName: 'a.pdf', suffix: FILLED_SUFFIX }),
    ).toBe('/tmp/x.pdf')
  })

  it('names the file after the input inside the output directory', () => {
    expect(resolveOutputPath({ outputDir: '/out', inputName: '/dl/ar-11.pdf', suffix: FILLED_SUFFIX })).toBe(
      join('/out', 'ar-11_filled.pdf'),
    )
  })

  it('falls back to the working directory', () => {
    expect(resolveOutputPath({ inputName: 'ar-11.pdf', suffix: TEMPLATE_SUFFIX, cwd: '/work' })).toBe(
      join('/work', 'ar-11_template.json'),
    )
  })
})

describe('flatPathFor', () => {
  it('keeps the filled name and adds the flat suffix', () => {
    expect(flatPathFor('/out/a_filled.pdf')).toBe(join('/out', 'a_filled_flat.pdf'))
  })
})
