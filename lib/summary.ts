import { COLUMNS, hasColumn, type CellValue, type CrashRecord, type Dataset } from '@/lib/schema'

// ── Injury categories ─────────────────────────────────────────────────────────
// PERSON_INJURY labels differ between exports, so which labels mean "no injury"
// and which mean "fatal" is configuration rather than code.

export type InjuryCategories = {
  none: readonly string[]
  fatal: readonly string[]
}

export const DEFAULT_INJURY_CATEGORIES: InjuryCategories = {
  none: ['Unspecified', 'None'],
  fatal: ['Killed'],
}

export type SummaryMetrics = {
  totalCrashes: number
  totalPersons: number
  totalInjuries: number
  totalFatalities: number
}

export type CountStat = { value: string; count: number }
export type TimePoint = { year: number; month: number; crashes: number }
export type HourStat = { hour: number; crashes: number }
export type LocationPoint = { latitude: number; longitude: number; injury: string | null }

function labelSet(labels: readonly string[]): Set<string> {
  return new Set(labels.map((l) => l.trim().toUpperCase()))
}

function normalize(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null
  const text = String(value).trim()
  return text === '' ? null : text.toUpperCase()
}

// ── Summary ───────────────────────────────────────────────────────────────────

/**
 * Scalar metrics over an already-filtered dataset, in a single pass.
 * Crashes count distinct collision ids (rows are per person), injuries include
 * fatalities, and every metric depending on an absent column is 0.
 */
export function summarize(
  dataset: Dataset,
  categories: InjuryCategories = DEFAULT_INJURY_CATEGORIES
): SummaryMetrics {
  const noneLabels = labelSet(categories.none)
  const fatalLabels = labelSet(categories.fatal)
  const hasIds = hasColumn(dataset, COLUMNS.collisionId)
  const hasInjury = hasColumn(dataset, COLUMNS.personInjury)

  const collisions = new Set<string>()
  let totalInjuries = 0
  let totalFatalities = 0

  for (const row of dataset.rows) {
    if (hasIds) {
      const id = row[COLUMNS.collisionId]
      if (id !== null && id !== undefined && id !== '') collisions.add(String(id))
    }
    if (hasInjury) {
      const injury = normalize(row[COLUMNS.personInjury])
      if (injury !== null && !noneLabels.has(injury)) totalInjuries++
      if (injury !== null && fatalLabels.has(injury)) totalFatalities++
    }
  }

  return {
    totalCrashes: collisions.size,
    totalPersons: dataset.rows.length,
    totalInjuries,
    totalFatalities,
  }
}

// ── Breakdowns ────────────────────────────────────────────────────────────────

/**
 * Row counts per value of a column, most frequent first (ties by value).
 * Null cells are grouped under "Unknown".
 */
export function countBy(dataset: Dataset, column: string, options: { limit?: number } = {}): CountStat[] {
  if (!hasColumn(dataset, column)) return []

  const totals = new Map<string, number>()
  for (const row of dataset.rows) {
    const raw = row[column]
    const value = raw === null || raw === undefined || raw === '' ? 'Unknown' : String(raw)
    totals.set(value, (totals.get(value) ?? 0) + 1)
  }

  const stats = Array.from(totals.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0))

  return options.limit !== undefined ? stats.slice(0, Math.max(options.limit, 0)) : stats
}

function collisionKey(row: CrashRecord, index: number, hasIds: boolean): string {
  const id = hasIds ? row[COLUMNS.collisionId] : null
  // Without an id every row stands for its own collision.
  return id === null || id === undefined || id === '' ? `#${index}` : String(id)
}

/** Distinct collisions per year-month, in chronological order. */
export function crashesOverTime(dataset: Dataset): TimePoint[] {
  if (!hasColumn(dataset, COLUMNS.year) || !hasColumn(dataset, COLUMNS.month)) return []
  const hasIds = hasColumn(dataset, COLUMNS.collisionId)

  const buckets = new Map<number, Set<string>>()
  dataset.rows.forEach((row, index) => {
    const year = row[COLUMNS.year]
    const month = row[COLUMNS.month]
    if (typeof year !== 'number' || typeof month !== 'number') return
    const key = year * 100 + month
    const ids = buckets.get(key) ?? new Set<string>()
    ids.add(collisionKey(row, index, hasIds))
    buckets.set(key, ids)
  })

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a - b)
    .map(([key, ids]) => ({ year: Math.floor(key / 100), month: key % 100, crashes: ids.size }))
}

/** Distinct collisions for each hour of the day, always 24 entries. */
export function crashesByHour(dataset: Dataset): HourStat[] {
  const buckets = Array.from({ length: 24 }, () => new Set<string>())
  if (hasColumn(dataset, COLUMNS.hour)) {
    const hasIds = hasColumn(dataset, COLUMNS.collisionId)
    dataset.rows.forEach((row, index) => {
      const hour = row[COLUMNS.hour]
      if (typeof hour !== 'number' || !Number.isInteger(hour) || hour < 0 || hour > 23) return
      buckets[hour].add(collisionKey(row, index, hasIds))
    })
  }
  return buckets.map((ids, hour) => ({ hour, crashes: ids.size }))
}

/** Rows with both coordinates, for the scatter map. Coordinates are not range-checked. */
export function locations(dataset: Dataset, options: { limit: number }): LocationPoint[] {
  const points: LocationPoint[] = []
  for (const row of dataset.rows) {
    if (points.length >= options.limit) break
    const latitude = row[COLUMNS.latitude]
    const longitude = row[COLUMNS.longitude]
    if (typeof latitude !== 'number' || typeof longitude !== 'number') continue
    const injury = row[COLUMNS.personInjury]
    points.push({
      latitude,
      longitude,
      injury: injury === null || injury === undefined ? null : String(injury),
    })
  }
  return points
}
