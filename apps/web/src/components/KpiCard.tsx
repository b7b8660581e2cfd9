import clsx from 'clsx'
import './KpiCard.css'

type Props = {
  title: string
  value: string
  subtitle?: string
  muted?: boolean
}

export function KpiCard({ title, value, subtitle, muted }: Props) {
  return (
    <article className={clsx('kpi-card', muted && 'kpi-card--muted')}>
      <p className="kpi-card__title">{title}</p>
      <p className="kpi-card__value">{value}</p>
      {subtitle && <p className="kpi-card__subtitle">{subtitle}</p>}
    </article>
  )
}
