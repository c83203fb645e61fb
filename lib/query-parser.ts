// ── Types ─────────────────────────────────────────────────────────────────────

export type ParsedQuery = {
  borough: string | null
  year: number | null
  keywords: string[]
}

// ── Constants ─────────────────────────────────────────────────────────────────

const BOROUGH_TOKENS = new Set(['MANHATTAN', 'BROOKLYN', 'QUEENS', 'BRONX', 'STATEN', 'STATEN ISLAND'])
const STATEN_ISLAND = 'STATEN ISLAND'
const YEAR_RE = /^[0-9]{4}$/

export function emptyParsedQuery(): ParsedQuery {
  return { borough: null, year: null, keywords: [] }
}

/**
 * Turns free text into a partial filter, e.g.
 * "Brooklyn 2022 pedestrian" → { borough: 'BROOKLYN', year: 2022, keywords: ['pedestrian'] }.
 *
 * Each whitespace token is a borough, a four-digit year, or a keyword, tried in
 * that order. When several tokens qualify as borough (or year) the last one
 * wins. Never throws.
 */
export function parseSearchQuery(query?: string | null): ParsedQuery {
  const result = emptyParsedQuery()
  if (!query) return result

  const tokens = query.trim().split(/\s+/).filter(Boolean)
  let previous: string | null = null

  for (const token of tokens) {
    const upper = token.toUpperCase()
    // "staten island" arrives as two tokens; the first already set the borough.
    const islandSuffix = upper === 'ISLAND' && previous === 'STATEN'
    previous = upper
    if (islandSuffix) continue

    if (BOROUGH_TOKENS.has(upper)) {
      result.borough = upper.startsWith('STATEN') ? STATEN_ISLAND : upper
    } else if (YEAR_RE.test(token)) {
      result.year = parseInt(token, 10)
    } else {
      result.keywords.push(token)
    }
  }

  return result
}
