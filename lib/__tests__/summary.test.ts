import { describe, it, expect } from 'vitest'
import { countBy, crashesByHour, crashesOverTime, locations, summarize } from '../summary'
import { COLUMNS } from '../schema'
import { ALL_COLUMNS, makeDataset, makeRow } from './helpers'

function person(id: string, injury: string | null) {
  return makeRow({ [COLUMNS.collisionId]: id, [COLUMNS.personInjury]: injury })
}

// ── summarize ───────────────────────────────────────────────────────────────

describe('summarize', () => {
  it('counts crashes by distinct collision id and people by row', () => {
    const dataset = makeDataset([
      person('A', 'Killed'),
      person('A', 'Injured'),
      person('A', 'Unspecified'),
      person('B', 'Killed'),
      person('B', 'Unspecified'),
      person('C', 'Injured'),
      person('C', 'Unspecified'),
      person('C', 'Unspecified'),
      person('D', 'Injured'),
      person('D', 'Unspecified'),
    ])

    expect(summarize(dataset)).toEqual({
      totalCrashes: 4,
      totalPersons: 10,
      totalInjuries: 5,
      totalFatalities: 2,
    })
  })

  it('returns zeros for an empty dataset', () => {
    expect(summarize(makeDataset([]))).toEqual({
      totalCrashes: 0,
      totalPersons: 0,
      totalInjuries: 0,
      totalFatalities: 0,
    })
  })

  it('compares injury labels case-insensitively', () => {
    const dataset = makeDataset([person('A', 'killed'), person('B', 'UNSPECIFIED'), person('C', ' none ')])
    expect(summarize(dataset)).toMatchObject({ totalInjuries: 1, totalFatalities: 1 })
  })

  it('does not count a null injury as an injury', () => {
    expect(summarize(makeDataset([person('A', null)])).totalInjuries).toBe(0)
  })

  it('uses the configured injury labels', () => {
    const dataset = makeDataset([
      person('A', 'No Injury'),
      person('B', 'Fatal'),
      person('C', 'Minor'),
      person('D', 'Unspecified'),
    ])
    const metrics = summarize(dataset, { none: ['No Injury'], fatal: ['Fatal'] })
    expect(metrics).toMatchObject({ totalInjuries: 3, totalFatalities: 1 })
  })

  it('ignores null collision ids when counting crashes', () => {
    const dataset = makeDataset([person('A', 'Injured'), makeRow({ [COLUMNS.collisionId]: null })])
    expect(summarize(dataset)).toMatchObject({ totalCrashes: 1, totalPersons: 2 })
  })

  it('reports 0 for metrics whose column is absent', () => {
    const rows = [person('A', 'Killed'), person('B', 'Injured')]
    const noIds = makeDataset(
      rows,
      ALL_COLUMNS.filter((c) => c !== COLUMNS.collisionId)
    )
    const noInjury = makeDataset(
      rows,
      ALL_COLUMNS.filter((c) => c !== COLUMNS.personInjury)
    )
    expect(summarize(noIds)).toEqual({
      totalCrashes: 0,
      totalPersons: 2,
      totalInjuries: 2,
      totalFatalities: 1,
    })
    expect(summarize(noInjury)).toEqual({
      totalCrashes: 2,
      totalPersons: 2,
      totalInjuries: 0,
      totalFatalities: 0,
    })
  })
})

// ── countBy ─────────────────────────────────────────────────────────────────

describe('countBy', () => {
  const dataset = makeDataset([
    makeRow({ [COLUMNS.borough]: 'QUEENS' }),
    makeRow({ [COLUMNS.borough]: 'QUEENS' }),
    makeRow({ [COLUMNS.borough]: 'BROOKLYN' }),
    makeRow({ [COLUMNS.borough]: null }),
  ])

  it('sorts by count, then by value, grouping nulls as Unknown', () => {
    expect(countBy(dataset, COLUMNS.borough)).toEqual([
      { value: 'QUEENS', count: 2 },
      { value: 'BROOKLYN', count: 1 },
      { value: 'Unknown', count: 1 },
    ])
  })

  it('applies a limit', () => {
    expect(countBy(dataset, COLUMNS.borough, { limit: 1 })).toEqual([{ value: 'QUEENS', count: 2 }])
  })

  it('returns nothing for a negative limit', () => {
    expect(countBy(dataset, COLUMNS.borough, { limit: -1 })).toEqual([])
  })

  it('returns nothing for an absent column', () => {
    expect(countBy(dataset, 'NOT_A_COLUMN')).toEqual([])
  })
})

// ── Time breakdowns ─────────────────────────────────────────────────────────

describe('crashesOverTime', () => {
  it('counts distinct collisions per month, oldest first', () => {
    const dataset = makeDataset([
      makeRow({ [COLUMNS.collisionId]: 'a', [COLUMNS.year]: 2022, [COLUMNS.month]: 3 }),
      makeRow({ [COLUMNS.collisionId]: 'a', [COLUMNS.year]: 2022, [COLUMNS.month]: 3 }),
      makeRow({ [COLUMNS.collisionId]: 'b', [COLUMNS.year]: 2022, [COLUMNS.month]: 3 }),
      makeRow({ [COLUMNS.collisionId]: 'c', [COLUMNS.year]: 2021, [COLUMNS.month]: 12 }),
      makeRow({ [COLUMNS.collisionId]: 'd', [COLUMNS.year]: 2021, [COLUMNS.month]: null }),
    ])

    expect(crashesOverTime(dataset)).toEqual([
      { year: 2021, month: 12, crashes: 1 },
      { year: 2022, month: 3, crashes: 2 },
    ])
  })

  it('returns nothing without a month column', () => {
    const dataset = makeDataset(
      [makeRow()],
      ALL_COLUMNS.filter((c) => c !== COLUMNS.month)
    )
    expect(crashesOverTime(dataset)).toEqual([])
  })
})

describe('crashesByHour', () => {
  it('always returns 24 hours', () => {
    const hours = crashesByHour(makeDataset([]))
    expect(hours).toHaveLength(24)
    expect(hours[0]).toEqual({ hour: 0, crashes: 0 })
    expect(hours[23]).toEqual({ hour: 23, crashes: 0 })
  })

  it('counts distinct collisions per hour', () => {
    const dataset = makeDataset([
      makeRow({ [COLUMNS.collisionId]: 'a', [COLUMNS.hour]: 8 }),
      makeRow({ [COLUMNS.collisionId]: 'a', [COLUMNS.hour]: 8 }),
      makeRow({ [COLUMNS.collisionId]: 'b', [COLUMNS.hour]: 8 }),
      makeRow({ [COLUMNS.collisionId]: 'c', [COLUMNS.hour]: 0 }),
    ])
    const hours = crashesByHour(dataset)
    expect(hours[8]).toEqual({ hour: 8, crashes: 2 })
    expect(hours[0]).toEqual({ hour: 0, crashes: 1 })
  })

  it('treats every row as its own collision without an id column', () => {
    const dataset = makeDataset(
      [makeRow({ [COLUMNS.hour]: 5 }), makeRow({ [COLUMNS.hour]: 5 })],
      ALL_COLUMNS.filter((c) => c !== COLUMNS.collisionId)
    )
    expect(crashesByHour(dataset)[5].crashes).toBe(2)
  })
})

// ── locations ───────────────────────────────────────────────────────────────

describe('locations', () => {
  it('skips rows missing a coordinate and honors the limit', () => {
    const dataset = makeDataset([
      makeRow({ [COLUMNS.latitude]: null }),
      makeRow({ [COLUMNS.latitude]: 40.6, [COLUMNS.longitude]: -73.8, [COLUMNS.personInjury]: 'Killed' }),
      makeRow({ [COLUMNS.latitude]: 40.5, [COLUMNS.longitude]: -74.1 }),
    ])

    expect(locations(dataset, { limit: 1 })).toEqual([
      { latitude: 40.6, longitude: -73.8, injury: 'Killed' },
    ])
    expect(locations(dataset, { limit: 10 })).toHaveLength(2)
  })
})
