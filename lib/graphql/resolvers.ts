import { GraphQLError } from 'graphql'

import { generateCsv } from '@/lib/csv-export'
import {
  applyFilters,
  createFilterSpec,
  describeFilters,
  FilterSpecError,
  mergeParsedQuery,
  type FilterSpec,
} from '@/lib/filters'
import { parseSearchQuery } from '@/lib/query-parser'
import { COLUMNS, type CellValue, type CrashRecord, type Dataset } from '@/lib/schema'
import { countBy, crashesByHour, crashesOverTime, locations, summarize } from '@/lib/summary'

import type { ExplorerContext } from './context'

// ── Argument types ────────────────────────────────────────────────────────────
// Mirrors the CollisionFilter input in typeDefs. GraphQL lists may be null.

export type CollisionFilterInput = {
  boroughs?: string[] | null
  years?: number[] | null
  months?: number[] | null
  hours?: number[] | null
  injuries?: string[] | null
  personTypes?: string[] | null
  vehicleTypes?: string[] | null
  factors?: string[] | null
  search?: string | null
  query?: string | null
}

type FilterArgs = { filter?: CollisionFilterInput | null }
type PageArgs = FilterArgs & { limit?: number | null; offset?: number | null }
type LimitArgs = { limit?: number | null }

const MAX_PAGE_SIZE = 5000

// ── Filter assembly ───────────────────────────────────────────────────────────

/**
 * Builds the FilterSpec for one request: explicit selections are validated,
 * then the free-text query fills in whatever fields they leave open.
 */
export function buildFilterSpec(filter?: CollisionFilterInput | null): FilterSpec {
  const { query, ...selections } = filter ?? {}

  let spec: FilterSpec
  try {
    spec = createFilterSpec(selections)
  } catch (error) {
    if (error instanceof FilterSpecError) {
      throw new GraphQLError(error.message, {
        extensions: { code: 'BAD_USER_INPUT', field: error.field },
      })
    }
    throw error
  }

  return mergeParsedQuery(spec, parseSearchQuery(query))
}

function checkLimit(limit?: number | null): number | undefined {
  if (limit === null || limit === undefined) return undefined
  if (limit < 0) {
    throw new GraphQLError(`Invalid limit: ${limit} is negative`, {
      extensions: { code: 'BAD_USER_INPUT', field: 'limit' },
    })
  }
  return limit
}

function filtered(context: ExplorerContext, filter?: CollisionFilterInput | null): Dataset {
  return applyFilters(context.dataset, buildFilterSpec(filter), context.schema)
}

// ── Cell readers ──────────────────────────────────────────────────────────────

function text(value: CellValue | undefined): string | null {
  return value === null || value === undefined ? null : String(value)
}

function int(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null
}

function float(value: CellValue | undefined): number | null {
  return typeof value === 'number' ? value : null
}

// ── Resolvers ─────────────────────────────────────────────────────────────────
// collisionStats hands the filtered dataset down as the parent; each stats
// field computes only when selected.

export const resolvers = {
  Query: {
    collisions: (_: unknown, { filter, limit, offset }: PageArgs, context: ExplorerContext) => {
      const { rows } = filtered(context, filter)
      const start = Math.max(offset ?? 0, 0)
      const cappedLimit = Math.min(Math.max(limit ?? 1000, 0), MAX_PAGE_SIZE)
      return { items: rows.slice(start, start + cappedLimit), totalCount: rows.length }
    },

    collisionStats: (_: unknown, { filter }: FilterArgs, context: ExplorerContext) =>
      filtered(context, filter),

    filterOptions: (_: unknown, __: unknown, context: ExplorerContext) => context.options,

    parseQuery: (_: unknown, args: { text?: string | null }) => parseSearchQuery(args.text),

    activeFilters: (_: unknown, { filter }: FilterArgs) => describeFilters(buildFilterSpec(filter)),

    exportCsv: (_: unknown, { filter }: FilterArgs, context: ExplorerContext) =>
      generateCsv(filtered(context, filter)),
  },

  Collision: {
    collisionId: (row: CrashRecord) => text(row[COLUMNS.collisionId]),
    borough: (row: CrashRecord) => text(row[COLUMNS.borough]),
    crashYear: (row: CrashRecord) => int(row[COLUMNS.year]),
    crashMonth: (row: CrashRecord) => int(row[COLUMNS.month]),
    crashHour: (row: CrashRecord) => int(row[COLUMNS.hour]),
    latitude: (row: CrashRecord) => float(row[COLUMNS.latitude]),
    longitude: (row: CrashRecord) => float(row[COLUMNS.longitude]),
    personInjury: (row: CrashRecord) => text(row[COLUMNS.personInjury]),
    personType: (row: CrashRecord) => text(row[COLUMNS.personType]),
    vehicleType: (row: CrashRecord) => text(row[COLUMNS.vehicleType]),
    contributingFactor: (row: CrashRecord) => text(row[COLUMNS.factor]),
  },

  CollisionStats: {
    summary: (dataset: Dataset, _: unknown, context: ExplorerContext) =>
      summarize(dataset, context.injuryCategories),
    byBorough: (dataset: Dataset) => countBy(dataset, COLUMNS.borough),
    byInjury: (dataset: Dataset) => countBy(dataset, COLUMNS.personInjury),
    byPersonType: (dataset: Dataset) => countBy(dataset, COLUMNS.personType),
    byFactor: (dataset: Dataset, { limit }: LimitArgs) =>
      countBy(dataset, COLUMNS.factor, { limit: checkLimit(limit) }),
    byVehicleType: (dataset: Dataset, { limit }: LimitArgs) =>
      countBy(dataset, COLUMNS.vehicleType, { limit: checkLimit(limit) }),
    byHour: (dataset: Dataset) => crashesByHour(dataset),
    overTime: (dataset: Dataset) => crashesOverTime(dataset),
    locations: (dataset: Dataset, { limit }: LimitArgs) =>
      locations(dataset, { limit: Math.min(checkLimit(limit) ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE) }),
  },
}
