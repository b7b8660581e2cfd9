import type { BrandHeatmap } from '../types/api'

export const heatLayerOptions = {
  radius: 15,
  blur: 10,
  minOpacity: 0.3
}

// leaflet.heat reads the third entry as the point's intensity.
export const toHeatLatLngs = (points: BrandHeatmap['points']): Array<[number, number, number]> =>
  points.map(([lat, long]) => [lat, long, 1])
