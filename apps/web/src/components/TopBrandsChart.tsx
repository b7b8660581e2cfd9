import { Legend, Pie, PieChart, ResponsiveContainer, Tooltip } from 'recharts'
import { toPieData } from '../lib/charts'
import { formatNumber } from '../lib/format'
import type { BrandFrequency } from '../types/api'
import './Chart.css'

type Props = {
  brands: BrandFrequency[]
}

export function TopBrandsChart({ brands }: Props) {
  return (
    <div className="chart">
      <h3 className="chart__title">Top {brands.length} Manufacturers</h3>
      <ResponsiveContainer width="100%" height={420}>
        <PieChart>
          <Pie data={toPieData(brands)} dataKey="value" nameKey="name" outerRadius={150} label />
          <Tooltip formatter={(value) => formatNumber(Number(value))} />
          <Legend />
        </PieChart>
      </ResponsiveContainer>
    </div>
  )
}
