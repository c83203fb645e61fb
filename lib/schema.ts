// ── Canonical columns ─────────────────────────────────────────────────────────

export const COLUMNS = {
  borough: 'BOROUGH',
  year: 'CRASH_YEAR',
  month: 'CRASH_MONTH',
  hour: 'CRASH_HOUR',
  latitude: 'LATITUDE',
  longitude: 'LONGITUDE',
  collisionId: 'COLLISION_ID',
  personInjury: 'PERSON_INJURY',
  personType: 'PERSON_TYPE',
  vehicleType: 'VEHICLE_TYPE_CODE_1',
  factor: 'CONTRIBUTING_FACTOR_VEHICLE_1',
} as const

export type ColumnKey = keyof typeof COLUMNS
export type ColumnName = (typeof COLUMNS)[ColumnKey]

// Header variants seen in exports of the source data (trailing spaces, spaced names).
const DEFAULT_RENAMES: Record<string, ColumnName> = {
  'BOROUGH ': COLUMNS.borough,
  'CRASH YEAR': COLUMNS.year,
  'CRASH MONTH': COLUMNS.month,
  'CRASH HOUR': COLUMNS.hour,
  'LATITUDE ': COLUMNS.latitude,
  'LONGITUDE ': COLUMNS.longitude,
  'VEHICLE TYPE CODE 1': COLUMNS.vehicleType,
  'CONTRIBUTING FACTOR VEHICLE 1': COLUMNS.factor,
  'PERSON TYPE': COLUMNS.personType,
  'PERSON INJURY': COLUMNS.personInjury,
  'COLLISION ID': COLUMNS.collisionId,
}

// ── Types ─────────────────────────────────────────────────────────────────────

export type CellValue = string | number | null

// One person-involvement row, keyed by canonical column name.
export type CrashRecord = Readonly<Record<string, CellValue>>

export interface Dataset {
  readonly columns: readonly string[]
  readonly rows: readonly CrashRecord[]
}

export interface Schema {
  readonly columns: readonly ColumnName[]
  readonly renames: ReadonlyMap<string, string>
  readonly numericColumns: ReadonlySet<string>
  readonly textColumns: ReadonlySet<string>
  // Columns scanned by the free-text criterion, in match order.
  readonly searchColumns: readonly string[]
}

export type FilterOptions = {
  boroughs: readonly string[]
  years: readonly number[]
  months: readonly number[]
  hours: readonly number[]
  injuries: readonly string[]
  personTypes: readonly string[]
  vehicleTypes: readonly string[]
  factors: readonly string[]
}

// ── Registry ──────────────────────────────────────────────────────────────────

/**
 * Builds the immutable column registry handed to the loader and consulted by
 * the filter engine. `extraRenames` are merged over the built-in variants.
 */
export function createSchema(extraRenames: Record<string, string> = {}): Schema {
  const renames = new Map<string, string>(Object.entries(DEFAULT_RENAMES))
  for (const [raw, canonical] of Object.entries(extraRenames)) {
    renames.set(raw, canonical)
  }

  return Object.freeze({
    columns: Object.freeze(Object.values(COLUMNS)),
    renames,
    numericColumns: new Set<string>([
      COLUMNS.year,
      COLUMNS.month,
      COLUMNS.hour,
      COLUMNS.latitude,
      COLUMNS.longitude,
    ]),
    textColumns: new Set<string>([
      COLUMNS.borough,
      COLUMNS.personInjury,
      COLUMNS.personType,
      COLUMNS.vehicleType,
      COLUMNS.factor,
    ]),
    searchColumns: Object.freeze([COLUMNS.factor, COLUMNS.vehicleType, COLUMNS.borough]),
  })
}

export const DEFAULT_SCHEMA = createSchema()

/**
 * Resolves a raw CSV header to its canonical name. Unknown headers come back
 * trimmed so they still survive into the dataset.
 */
export function canonicalColumnName(schema: Schema, raw: string): string {
  const renamed = schema.renames.get(raw)
  if (renamed) return renamed

  const trimmed = raw.trim()
  const known = new Set<string>(schema.columns)
  if (known.has(trimmed)) return trimmed

  const underscored = trimmed.toUpperCase().replace(/\s+/g, '_')
  if (known.has(underscored)) return underscored

  return trimmed
}

// ── Dataset helpers ───────────────────────────────────────────────────────────

export function createDataset(columns: readonly string[], rows: readonly CrashRecord[]): Dataset {
  return Object.freeze({ columns: Object.freeze([...columns]), rows: Object.freeze([...rows]) })
}

export function hasColumn(dataset: Dataset, column: string): boolean {
  return dataset.columns.includes(column)
}

const collator = new Intl.Collator('en', { numeric: true })

/** Sorted distinct non-empty values of a column, rendered as strings. */
export function distinctValues(dataset: Dataset, column: string): string[] {
  if (!hasColumn(dataset, column)) return []

  const seen = new Set<string>()
  for (const row of dataset.rows) {
    const value = row[column]
    if (value === null || value === undefined) continue
    const text = String(value)
    if (text !== '') seen.add(text)
  }
  return Array.from(seen).sort(collator.compare)
}

function distinctIntegers(dataset: Dataset, column: string): number[] {
  return distinctValues(dataset, column)
    .map(Number)
    .filter((n) => Number.isInteger(n))
}

/** Option lists for every selectable facet. Computed once per loaded snapshot. */
export function buildFilterOptions(dataset: Dataset): FilterOptions {
  return Object.freeze({
    boroughs: distinctValues(dataset, COLUMNS.borough),
    years: distinctIntegers(dataset, COLUMNS.year),
    months: distinctIntegers(dataset, COLUMNS.month),
    hours: distinctIntegers(dataset, COLUMNS.hour),
    injuries: distinctValues(dataset, COLUMNS.personInjury),
    personTypes: distinctValues(dataset, COLUMNS.personType),
    vehicleTypes: distinctValues(dataset, COLUMNS.vehicleType),
    factors: distinctValues(dataset, COLUMNS.factor),
  })
}
