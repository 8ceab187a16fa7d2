/**
 * RFC 4180 CSV reader for the forms catalog (no papaparse dependency).
 *
 * Handles:
 * - Quoted fields (including embedded commas, newlines, quotes)
 * - Escaped quotes ("" inside quoted fields)
 * - CRLF, LF and bare CR line endings
 * - Trailing newline (does not produce an extra empty row)
 * - A leading UTF-8 byte order mark
 * - Blank lines between records (skipped)
 */

export interface CsvRecord {
  /** 1-based line on which the record starts. */
  line: number
  fields: string[]
}

export function parseCSV(raw: string): string[][] {
  return parseCSVRecords(raw).map((r) => r.fields)
}

export function parseCSVRecords(raw: string): CsvRecord[] {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw
  const records: CsvRecord[] = []
  const len = text.length
  if (len === 0) return records

  let fields: string[] = []
  let field = ''
  let quoted = false
  let line = 1
  let recordLine = 1
  let i = 0

  const endRecord = () => {
    fields.push(field)
    if (fields.length > 1 || fields[0] !== '') records.push({ line: recordLine, fields })
    fields = []
    field = ''
  }

  while (i < len) {
    const ch = text[i]

    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        quoted = false
        i++
        continue
      }
      if (ch === '\n') line++
      field += ch
      i++
      continue
    }

    if (ch === '"' && field === '') {
      quoted = true
      i++
    } else if (ch === ',') {
      fields.push(field)
      field = ''
      i++
    } else if (ch === '\r' || ch === '\n') {
      endRecord()
      i += ch === '\r' && text[i + 1] === '\n' ? 2 : 1
      line++
      recordLine = line
    } else {
      field += ch
      i++
    }
  }

  // Last record without a trailing newline
  if (field !== '' || fields.length > 0 || quoted) endRecord()

  return records
}
