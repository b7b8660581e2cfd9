import dayjs from 'dayjs'

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
})

const numberFormatter = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0
})

export const formatCurrency = (value?: number | null) => {
  if (value === null || value === undefined) {
    return '—'
  }

  return currencyFormatter.format(value)
}

export const formatNumber = (value?: number | null) => {
  if (value === null || value === undefined) {
    return '—'
  }

  return numberFormatter.format(value)
}

export const formatDate = (value?: string | null) => {
  if (!value) {
    return '—'
  }

  return dayjs(value).format('MMM D, YYYY HH:mm')
}
