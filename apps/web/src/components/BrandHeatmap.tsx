import L from 'leaflet'
import 'leaflet.heat'
import { useEffect } from 'react'
import { MapContainer, TileLayer, useMap } from 'react-leaflet'
import { formatNumber } from '../lib/format'
import { heatLayerOptions, toHeatLatLngs } from '../lib/heatmap'
import type { BrandHeatmap as BrandHeatmapData } from '../types/api'
import 'leaflet/dist/leaflet.css'
import './BrandHeatmap.css'

type Props = {
  heatmap: BrandHeatmapData
}

function HeatLayer({ points }: { points: BrandHeatmapData['points'] }) {
  const map = useMap()

  useEffect(() => {
    const layer = L.heatLayer(toHeatLatLngs(points), heatLayerOptions).addTo(map)
    return () => {
      layer.remove()
    }
  }, [map, points])

  return null
}

export function BrandHeatmap({ heatmap }: Props) {
  return (
    <div className="heatmap">
      <MapContainer
        key={heatmap.manufacturer}
        center={[heatmap.centerLat, heatmap.centerLong]}
        zoom={5}
        className="heatmap__map"
      >
        <TileLayer
          attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
          url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
        />
        <HeatLayer points={heatmap.points} />
      </MapContainer>
      <p className="heatmap__caption">{formatNumber(heatmap.points.length)} listings plotted</p>
    </div>
  )
}
