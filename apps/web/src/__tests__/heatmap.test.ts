import { describe, expect, it } from 'vitest'
import { heatLayerOptions, toHeatLatLngs } from '../lib/heatmap'

describe('toHeatLatLngs', () => {
  it('gives every listing the same weight', () => {
    expect(
      toHeatLatLngs([
        [40.5, -100.25],
        [34, -118]
      ])
    ).toEqual([
      [40.5, -100.25, 1],
      [34, -118, 1]
    ])
  })

  it('returns nothing for no points', () => {
    expect(toHeatLatLngs([])).toEqual([])
  })
})

describe('heatLayerOptions', () => {
  it('uses a 15px radius, a 10px blur and a 0.3 opacity floor', () => {
    expect(heatLayerOptions).toEqual({ radius: 15, blur: 10, minOpacity: 0.3 })
  })
})
