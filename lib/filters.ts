import type { ParsedQuery } from '@/lib/query-parser'
import {
  COLUMNS,
  DEFAULT_SCHEMA,
  createDataset,
  hasColumn,
  type ColumnName,
  type CrashRecord,
  type Dataset,
  type Schema,
} from '@/lib/schema'

// ── Types ─────────────────────────────────────────────────────────────────────

type OneOrMany<T> = T | readonly T[] | null | undefined

// Raw selections as they arrive from dropdowns or API input.
export type FilterInput = {
  boroughs?: OneOrMany<string>
  years?: OneOrMany<number | string>
  months?: OneOrMany<number | string>
  hours?: OneOrMany<number | string>
  injuries?: OneOrMany<string>
  personTypes?: OneOrMany<string>
  vehicleTypes?: OneOrMany<string>
  factors?: OneOrMany<string>
  search?: string | null
  keywords?: readonly string[] | null
}

type CategoricalField = 'boroughs' | 'injuries' | 'personTypes' | 'vehicleTypes' | 'factors'
type NumericField = 'years' | 'months' | 'hours'

// Validated, normalized criteria. null means "no criterion" for that field.
// `search` is one substring; `keywords` are separate terms that must each match.
export type FilterSpec = Readonly<
  Record<CategoricalField, readonly string[] | null> &
    Record<NumericField, readonly number[] | null> & {
      search: string | null
      keywords: readonly string[] | null
    }
>

export class FilterSpecError extends Error {
  constructor(
    readonly field: keyof FilterInput,
    message: string
  ) {
    super(message)
    this.name = 'FilterSpecError'
  }
}

// ── Criteria table ────────────────────────────────────────────────────────────
// Listed in display order; describeFilters() walks the same order.

const CATEGORICAL_CRITERIA: ReadonlyArray<{
  field: CategoricalField
  column: ColumnName
  label: string
}> = [
  { field: 'boroughs', column: COLUMNS.borough, label: 'Borough' },
  { field: 'injuries', column: COLUMNS.personInjury, label: 'Injury' },
  { field: 'personTypes', column: COLUMNS.personType, label: 'Person type' },
  { field: 'vehicleTypes', column: COLUMNS.vehicleType, label: 'Vehicle type' },
  { field: 'factors', column: COLUMNS.factor, label: 'Factor' },
]

const NUMERIC_CRITERIA: ReadonlyArray<{ field: NumericField; column: ColumnName; label: string }> = [
  { field: 'years', column: COLUMNS.year, label: 'Year' },
  { field: 'months', column: COLUMNS.month, label: 'Month' },
  { field: 'hours', column: COLUMNS.hour, label: 'Hour' },
]

// Years carry no calendar validation, only the four-digit shape.
const NUMERIC_BOUNDS: Record<NumericField, { min: number; max: number }> = {
  years: { min: 0, max: 9999 },
  months: { min: 1, max: 12 },
  hours: { min: 0, max: 23 },
}

const FIELD_NAMES: Record<CategoricalField | NumericField, string> = {
  boroughs: 'borough',
  injuries: 'injury',
  personTypes: 'person type',
  vehicleTypes: 'vehicle type',
  factors: 'factor',
  years: 'year',
  months: 'month',
  hours: 'hour',
}

export const EMPTY_FILTER_SPEC: FilterSpec = Object.freeze({
  boroughs: null,
  injuries: null,
  personTypes: null,
  vehicleTypes: null,
  factors: null,
  years: null,
  months: null,
  hours: null,
  search: null,
  keywords: null,
})

// ── Construction ──────────────────────────────────────────────────────────────

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value)
}

function toList<T>(value: OneOrMany<T>): readonly T[] {
  if (value === null || value === undefined) return []
  return isList<T>(value) ? value : [value]
}

const DIGITS_RE = /^[0-9]+$/

function toInteger(field: NumericField, raw: number | string): number {
  const n = typeof raw === 'number' ? raw : DIGITS_RE.test(raw.trim()) ? Number(raw.trim()) : NaN
  if (!Number.isInteger(n)) {
    throw new FilterSpecError(field, `Invalid ${FIELD_NAMES[field]}: "${raw}" is not an integer`)
  }
  return n
}

function normalizeCategorical(field: CategoricalField, values: readonly string[]): readonly string[] | null {
  if (values.length === 0) return null
  const normalized = values.map((v) => {
    const trimmed = v.trim()
    if (trimmed === '') {
      throw new FilterSpecError(field, `Empty ${FIELD_NAMES[field]} value`)
    }
    return trimmed.toUpperCase()
  })
  return Object.freeze(Array.from(new Set(normalized)))
}

function normalizeNumeric(
  field: NumericField,
  values: readonly (number | string)[]
): readonly number[] | null {
  if (values.length === 0) return null
  const { min, max } = NUMERIC_BOUNDS[field]
  const normalized = values.map((v) => {
    const n = toInteger(field, v)
    if (n < min || n > max) {
      throw new FilterSpecError(field, `Invalid ${FIELD_NAMES[field]}: ${n} is outside ${min}–${max}`)
    }
    return n
  })
  return Object.freeze(Array.from(new Set(normalized)))
}

// Words naming the records themselves; they carry no criterion.
const GENERIC_TERMS = new Set(['crash', 'crashes', 'collision', 'collisions', 'accident', 'accidents'])

function normalizeKeywords(values: readonly string[]): readonly string[] | null {
  const terms = values
    .map((v) => v.trim().toLowerCase())
    .filter((term) => term !== '' && !GENERIC_TERMS.has(term))
  return terms.length === 0 ? null : Object.freeze(Array.from(new Set(terms)))
}

/**
 * Validates raw selections into an immutable FilterSpec. Malformed values are
 * rejected here with a FilterSpecError so that filtering itself never fails.
 */
export function createFilterSpec(input: FilterInput = {}): FilterSpec {
  const search = input.search?.trim().toLowerCase() ?? ''

  return Object.freeze({
    boroughs: normalizeCategorical('boroughs', toList(input.boroughs)),
    injuries: normalizeCategorical('injuries', toList(input.injuries)),
    personTypes: normalizeCategorical('personTypes', toList(input.personTypes)),
    vehicleTypes: normalizeCategorical('vehicleTypes', toList(input.vehicleTypes)),
    factors: normalizeCategorical('factors', toList(input.factors)),
    years: normalizeNumeric('years', toList(input.years)),
    months: normalizeNumeric('months', toList(input.months)),
    hours: normalizeNumeric('hours', toList(input.hours)),
    search: search === '' ? null : search,
    keywords: normalizeKeywords(input.keywords ?? []),
  })
}

// ── Merging ───────────────────────────────────────────────────────────────────

/** Field-wise merge; where both specs constrain a field, `override` wins. */
export function mergeFilterSpecs(base: FilterSpec, override: FilterSpec): FilterSpec {
  return Object.freeze({
    boroughs: override.boroughs ?? base.boroughs,
    injuries: override.injuries ?? base.injuries,
    personTypes: override.personTypes ?? base.personTypes,
    vehicleTypes: override.vehicleTypes ?? base.vehicleTypes,
    factors: override.factors ?? base.factors,
    years: override.years ?? base.years,
    months: override.months ?? base.months,
    hours: override.hours ?? base.hours,
    search: override.search ?? base.search,
    keywords: override.keywords ?? base.keywords,
  })
}

/**
 * Folds a parsed free-text query into dropdown selections. Explicit selections
 * override the parsed query field by field: the parsed borough and year only
 * apply when no borough or year is selected, and the leftover keywords apply
 * only when no search text was given.
 */
export function mergeParsedQuery(spec: FilterSpec, parsed: ParsedQuery): FilterSpec {
  const fromQuery = createFilterSpec({
    boroughs: parsed.borough,
    years: parsed.year,
    keywords: spec.search === null ? parsed.keywords : null,
  })
  return mergeFilterSpecs(fromQuery, spec)
}

// ── Filtering ─────────────────────────────────────────────────────────────────

type Predicate = (row: CrashRecord) => boolean

function buildPredicates(dataset: Dataset, spec: FilterSpec, schema: Schema): Predicate[] {
  const predicates: Predicate[] = []

  for (const { field, column } of CATEGORICAL_CRITERIA) {
    const values = spec[field]
    // Criteria on columns the dataset lacks are no-ops.
    if (!values || values.length === 0 || !hasColumn(dataset, column)) continue
    const allowed = new Set(values)
    predicates.push((row) => {
      const value = row[column]
      return value !== null && value !== undefined && allowed.has(String(value).toUpperCase())
    })
  }

  for (const { field, column } of NUMERIC_CRITERIA) {
    const values = spec[field]
    if (!values || values.length === 0 || !hasColumn(dataset, column)) continue
    const allowed = new Set(values)
    predicates.push((row) => {
      const value = row[column]
      return typeof value === 'number' && allowed.has(value)
    })
  }

  const text = spec.search?.trim().toLowerCase() ?? ''
  const searched = schema.searchColumns.filter((column) => hasColumn(dataset, column))
  if (text !== '' && searched.length > 0) {
    predicates.push((row) =>
      searched.some((column) => {
        const value = row[column]
        return value !== null && value !== undefined && String(value).toLowerCase().includes(text)
      })
    )
  }

  // Each keyword must appear in some text column; keywords combine with AND.
  const keywordColumns = Array.from(schema.textColumns).filter((column) => hasColumn(dataset, column))
  if (spec.keywords && spec.keywords.length > 0 && keywordColumns.length > 0) {
    const terms = spec.keywords
    predicates.push((row) =>
      terms.every((term) =>
        keywordColumns.some((column) => {
          const value = row[column]
          return value !== null && value !== undefined && String(value).toLowerCase().includes(term)
        })
      )
    )
  }

  return predicates
}

/**
 * Returns the rows matching every supplied criterion, in source order. The
 * source dataset is never touched; the result is a new frozen dataset.
 */
export function applyFilters(
  dataset: Dataset,
  spec: FilterSpec,
  schema: Schema = DEFAULT_SCHEMA
): Dataset {
  const predicates = buildPredicates(dataset, spec, schema)
  const rows =
    predicates.length === 0
      ? dataset.rows
      : dataset.rows.filter((row) => predicates.every((matches) => matches(row)))
  return createDataset(dataset.columns, rows)
}

// ── Labels ────────────────────────────────────────────────────────────────────

/** Human-readable labels for the active criteria, e.g. "Borough: BROOKLYN". */
export function describeFilters(spec: FilterSpec): string[] {
  const labels: string[] = []
  for (const { field, label } of CATEGORICAL_CRITERIA) {
    const values = spec[field]
    if (values && values.length > 0) labels.push(`${label}: ${values.join(', ')}`)
  }
  for (const { field, label } of NUMERIC_CRITERIA) {
    const values = spec[field]
    if (values && values.length > 0) labels.push(`${label}: ${values.join(', ')}`)
  }
  if (spec.search) labels.push(`Search: "${spec.search}"`)
  if (spec.keywords && spec.keywords.length > 0) labels.push(`Keywords: ${spec.keywords.join(', ')}`)
  return labels
}
