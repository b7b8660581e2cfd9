import { formatCurrency } from '../lib/format'
import type { ModelSummary } from '../types/api'
import './ModelSummaryList.css'

type Props = {
  models: ModelSummary[]
}

export function ModelSummaryList({ models }: Props) {
  return (
    <ul className="model-list">
      {models.map((summary) => (
        <li key={summary.model} className="model-list__item">
          <p className="model-list__name">
            <strong>Model:</strong> {summary.model}
          </p>
          <ul className="model-list__specs">
            <li>Average Price: {formatCurrency(summary.averagePrice)}</li>
            <li>Year (Median): {summary.medianYear}</li>
            <li>Drive: {summary.drive}</li>
            <li>Type: {summary.type}</li>
            <li>Transmission: {summary.transmission}</li>
            <li>Fuel: {summary.fuel}</li>
            <li>Cylinders: {summary.cylinders}</li>
          </ul>
        </li>
      ))}
    </ul>
  )
}
