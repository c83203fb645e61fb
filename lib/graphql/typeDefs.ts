export const typeDefs = `#graphql
  # ── Person-involvement record ──────────────────────────────────────────────

  type Collision {
    collisionId: ID
    borough: String
    crashYear: Int
    crashMonth: Int
    crashHour: Int
    latitude: Float
    longitude: Float
    personInjury: String    # Raw PERSON_INJURY label, e.g. "Injured" | "Killed" | "Unspecified"
    personType: String      # "Pedestrian", "Occupant", "Bicyclist", ...
    vehicleType: String     # VEHICLE_TYPE_CODE_1
    contributingFactor: String  # CONTRIBUTING_FACTOR_VEHICLE_1
  }

  # ── Filters ──────────────────────────────────────────────────────────────────
  # Every field is optional; an omitted or empty list does not narrow the result.
  # Selections are combined with AND. Text comparisons ignore case.

  input CollisionFilter {
    boroughs: [String!]
    years: [Int!]
    months: [Int!]          # 1-12
    hours: [Int!]           # 0-23
    injuries: [String!]
    personTypes: [String!]
    vehicleTypes: [String!]
    factors: [String!]
    search: String          # Substring of factor, vehicle type or borough
    query: String           # Free text, e.g. "brooklyn 2022 pedestrian killed"; selections above win per field
  }

  # ── Query return types ───────────────────────────────────────────────────────

  type CollisionResult {
    items: [Collision!]!
    totalCount: Int!
  }

  type SummaryMetrics {
    totalCrashes: Int!      # Distinct collision ids
    totalPersons: Int!      # Rows
    totalInjuries: Int!
    totalFatalities: Int!
  }

  type CountStat {
    value: String!
    count: Int!
  }

  type TimePoint {
    year: Int!
    month: Int!
    crashes: Int!
  }

  type HourStat {
    hour: Int!
    crashes: Int!
  }

  type LocationPoint {
    latitude: Float!
    longitude: Float!
    injury: String
  }

  type CollisionStats {
    summary: SummaryMetrics!
    byBorough: [CountStat!]!
    byInjury: [CountStat!]!
    byPersonType: [CountStat!]!
    byFactor(limit: Int = 10): [CountStat!]!
    byVehicleType(limit: Int = 10): [CountStat!]!
    byHour: [HourStat!]!
    overTime: [TimePoint!]!
    locations(limit: Int = 5000): [LocationPoint!]!
  }

  type FilterOptions {
    boroughs: [String!]!
    years: [Int!]!
    months: [Int!]!
    hours: [Int!]!
    injuries: [String!]!
    personTypes: [String!]!
    vehicleTypes: [String!]!
    factors: [String!]!
  }

  type ParsedQuery {
    borough: String
    year: Int
    keywords: [String!]!
  }

  # ── Queries ──────────────────────────────────────────────────────────────────

  type Query {
    collisions(filter: CollisionFilter, limit: Int = 1000, offset: Int = 0): CollisionResult!
    collisionStats(filter: CollisionFilter): CollisionStats!
    filterOptions: FilterOptions!
    parseQuery(text: String): ParsedQuery!
    activeFilters(filter: CollisionFilter): [String!]!
    exportCsv(filter: CollisionFilter): String!
  }
`
