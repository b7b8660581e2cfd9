import type { BrandFrequency, CountTable } from '../types/api'

// values[i] is the count for table.groups[i]
export type BarDatum = { category: string; values: number[] }

const palette = [
  '#38bdf8',
  '#f472b6',
  '#a3e635',
  '#facc15',
  '#fb923c',
  '#c084fc',
  '#34d399',
  '#f87171',
  '#60a5fa',
  '#e879f9',
  '#fbbf24',
  '#94a3b8'
]

export const colorAt = (index: number) => palette[index % palette.length]

/**
 * Flattens a count table into one recharts row per category, with a zero for every
 * group the category never saw so grouped bars line up.
 */
export const toBarData = (table: CountTable): BarDatum[] =>
  table.rows.map(({ category, counts }) => ({
    category,
    values: table.groups.map((group) => (Object.hasOwn(counts, group) ? counts[group] : 0))
  }))

export const toPieData = (brands: BrandFrequency[]) =>
  brands.map(({ manufacturer, count }, index) => ({
    name: manufacturer,
    value: count,
    fill: colorAt(index)
  }))
