import { readFile } from 'node:fs/promises'
import Papa from 'papaparse'

import {
  canonicalColumnName,
  createDataset,
  type CellValue,
  type CrashRecord,
  type Dataset,
  type Schema,
} from '@/lib/schema'

export class DataSourceUnavailableError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`data source unavailable: ${path}`, options)
    this.name = 'DataSourceUnavailableError'
  }
}

function toNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null
  const trimmed = raw.trim()
  if (trimmed === '') return null
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : null
}

function toText(raw: string | undefined): string | null {
  if (raw === undefined) return null
  const trimmed = raw.trim()
  return trimmed === '' ? null : trimmed
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Parses CSV text into a frozen dataset. Headers go through the registry's
 * rename rules; numeric columns are coerced (unparseable → null) and text
 * columns trimmed (blank → null). Other columns are kept as trimmed strings.
 */
export function parseDataset(csvText: string, schema: Schema): Dataset {
  const result = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => canonicalColumnName(schema, header),
  })

  const columns = result.meta.fields ?? []
  const rows: CrashRecord[] = result.data.map((raw) => {
    const row: Record<string, CellValue> = {}
    for (const column of columns) {
      const value = raw[column]
      if (schema.numericColumns.has(column)) row[column] = toNumber(value)
      else if (schema.textColumns.has(column)) row[column] = toText(value)
      else row[column] = value === undefined ? null : value.trim()
    }
    return Object.freeze(row)
  })

  return createDataset(columns, rows)
}

export async function loadDataset(path: string, schema: Schema): Promise<Dataset> {
  let csvText: string
  try {
    csvText = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) throw new DataSourceUnavailableError(path, { cause: error })
    throw error
  }
  return parseDataset(csvText, schema)
}
