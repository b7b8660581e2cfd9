import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis
} from 'recharts'
import { colorAt, toBarData, type BarDatum } from '../lib/charts'
import { formatNumber } from '../lib/format'
import type { CountTable } from '../types/api'
import './Chart.css'

type Props = {
  title: string
  table: CountTable
  categoryLabel: string
}

export function GroupedBarChart({ title, table, categoryLabel }: Props) {
  if (!table.rows.length) {
    return <div className="chart chart--empty">No listings to chart.</div>
  }

  return (
    <div className="chart">
      <h3 className="chart__title">{title}</h3>
      <ResponsiveContainer width="100%" height={420}>
        <BarChart data={toBarData(table)} margin={{ top: 20, right: 30, left: 0, bottom: 40 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="rgba(148, 163, 184, 0.3)" />
          <XAxis
            dataKey="category"
            stroke="var(--muted-light)"
            angle={-35}
            textAnchor="end"
            interval={0}
            label={{ value: categoryLabel, position: 'insideBottom', offset: -30 }}
          />
          <YAxis tickFormatter={(value) => formatNumber(Number(value))} stroke="var(--muted-light)" />
          <Tooltip />
          <Legend verticalAlign="top" />
          {table.groups.map((group, index) => (
            <Bar
              key={group}
              name={group}
              dataKey={(datum: BarDatum) => datum.values[index]}
              fill={colorAt(index)}
            />
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  )
}
