import type { CellValue, Dataset } from '@/lib/schema'

function escapeCell(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function cellText(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value)
}

/** Serializes a (filtered) dataset with its own column order as the header row. */
export function generateCsv(dataset: Dataset): string {
  const header = [...dataset.columns]
  const rows = dataset.rows.map((row) => dataset.columns.map((column) => cellText(row[column])))

  const lines = [header, ...rows].map((row) => row.map(escapeCell).join(','))
  return '\ufeff' + lines.join('\r\n') // BOM prefix for Excel compatibility
}
