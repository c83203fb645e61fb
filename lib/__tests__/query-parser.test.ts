import { describe, it, expect } from 'vitest'
import { parseSearchQuery } from '../query-parser'

describe('parseSearchQuery', () => {
  // Worked queries
  it('extracts borough, year and keywords', () => {
    expect(parseSearchQuery('Brooklyn 2022 pedestrian crashes killed')).toEqual({
      borough: 'BROOKLYN',
      year: 2022,
      keywords: ['pedestrian', 'crashes', 'killed'],
    })
  })

  it('reads "staten island" as a single borough', () => {
    expect(parseSearchQuery('staten island 2019')).toEqual({
      borough: 'STATEN ISLAND',
      year: 2019,
      keywords: [],
    })
  })

  it('normalizes a lone "staten" to STATEN ISLAND', () => {
    expect(parseSearchQuery('Staten').borough).toBe('STATEN ISLAND')
  })

  it('keeps "island" as a keyword when it does not follow "staten"', () => {
    expect(parseSearchQuery('island queens')).toEqual({
      borough: 'QUEENS',
      year: null,
      keywords: ['island'],
    })
  })

  it('only swallows one "island" after "staten"', () => {
    expect(parseSearchQuery('staten island island').keywords).toEqual(['island'])
  })

  // Empty input
  it('returns an empty result for an empty string', () => {
    expect(parseSearchQuery('')).toEqual({ borough: null, year: null, keywords: [] })
  })

  it('returns an empty result for whitespace only', () => {
    expect(parseSearchQuery('   \t ')).toEqual({ borough: null, year: null, keywords: [] })
  })

  it('returns an empty result for null and undefined', () => {
    expect(parseSearchQuery(null)).toEqual({ borough: null, year: null, keywords: [] })
    expect(parseSearchQuery(undefined)).toEqual({ borough: null, year: null, keywords: [] })
  })

  // Tie-breaks
  it('keeps the last borough and the last year', () => {
    expect(parseSearchQuery('queens 2019 bronx 2020')).toEqual({
      borough: 'BRONX',
      year: 2020,
      keywords: [],
    })
  })

  // Year shape
  it('treats only four ASCII digits as a year', () => {
    expect(parseSearchQuery('20221 202 12a4').keywords).toEqual(['20221', '202', '12a4'])
    expect(parseSearchQuery('20221 202 12a4').year).toBeNull()
  })

  it('does not range-check years', () => {
    expect(parseSearchQuery('0000').year).toBe(0)
  })

  // Keywords
  it('preserves keyword case and order', () => {
    expect(parseSearchQuery('Unsafe SPEED taxi').keywords).toEqual(['Unsafe', 'SPEED', 'taxi'])
  })

  it('splits on any whitespace', () => {
    expect(parseSearchQuery('queens\t2021\nspeed')).toEqual({
      borough: 'QUEENS',
      year: 2021,
      keywords: ['speed'],
    })
  })

  it('matches boroughs case-insensitively', () => {
    expect(parseSearchQuery('mAnHaTtAn').borough).toBe('MANHATTAN')
  })
})
