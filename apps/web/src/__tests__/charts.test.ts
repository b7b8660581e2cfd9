import { describe, expect, it } from 'vitest'
import { colorAt, toBarData, toPieData } from '../lib/charts'

describe('toBarData', () => {
  it('fills groups a category never saw with zero', () => {
    const data = toBarData({
      groups: ['sedan', 'pickup'],
      rows: [
        { category: 'automatic', counts: { sedan: 2, pickup: 1 } },
        { category: 'manual', counts: { sedan: 1 } }
      ]
    })

    expect(data).toEqual([
      { category: 'automatic', values: [2, 1] },
      { category: 'manual', values: [1, 0] }
    ])
  })

  it('keeps groups named category or after object built-ins apart from the label', () => {
    const counts: Record<string, number> = JSON.parse('{"category": 4, "__proto__": 3}')
    const data = toBarData({
      groups: ['category', 'constructor', '__proto__', 'toString'],
      rows: [{ category: 'automatic', counts }]
    })

    expect(data).toEqual([{ category: 'automatic', values: [4, 0, 3, 0] }])
  })

  it('returns no rows for an empty table', () => {
    expect(toBarData({ groups: [], rows: [] })).toEqual([])
  })
})

describe('toPieData', () => {
  it('names each slice after its manufacturer', () => {
    expect(
      toPieData([
        { manufacturer: 'ford', count: 5 },
        { manufacturer: 'honda', count: 3 }
      ])
    ).toEqual([
      { name: 'ford', value: 5, fill: colorAt(0) },
      { name: 'honda', value: 3, fill: colorAt(1) }
    ])
  })

  it('cycles colours past the end of the palette', () => {
    expect(colorAt(12)).toBe(colorAt(0))
    expect(colorAt(1)).not.toBe(colorAt(0))
  })
})
