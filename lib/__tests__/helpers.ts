import { COLUMNS, createDataset, type CellValue, type ColumnName, type CrashRecord, type Dataset } from '@/lib/schema'

export const ALL_COLUMNS: ColumnName[] = Object.values(COLUMNS)

export function makeRow(overrides: Partial<Record<ColumnName, CellValue>> = {}): CrashRecord {
  return {
    [COLUMNS.collisionId]: '1',
    [COLUMNS.borough]: 'BROOKLYN',
    [COLUMNS.year]: 2022,
    [COLUMNS.month]: 1,
    [COLUMNS.hour]: 12,
    [COLUMNS.latitude]: 40.7,
    [COLUMNS.longitude]: -73.9,
    [COLUMNS.personInjury]: 'Unspecified',
    [COLUMNS.personType]: 'Occupant',
    [COLUMNS.vehicleType]: 'Sedan',
    [COLUMNS.factor]: 'Unspecified',
    ...overrides,
  }
}

export function makeDataset(rows: readonly CrashRecord[], columns: readonly string[] = ALL_COLUMNS): Dataset {
  return createDataset(columns, rows)
}
