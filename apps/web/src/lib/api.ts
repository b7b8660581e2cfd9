import type { Page, SummaryResponse, ViewInputs, ViewModel } from '../types/api'

const API_BASE_URL = import.meta.env.VITE_API_BASE_URL ?? 'http://localhost:4000/api'

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE_URL}${path}`, {
    headers: {
      'Content-Type': 'application/json'
    },
    ...init
  })

  if (!response.ok) {
    const message = await response.text()
    throw new Error(message || `Request to ${path} failed`)
  }

  return (await response.json()) as T
}

export const viewQuery = (inputs: ViewInputs) => {
  const params = new URLSearchParams()
  if (inputs.manufacturer) {
    params.set('manufacturer', inputs.manufacturer)
  }
  if (inputs.search) {
    params.set('search', inputs.search)
  }

  const query = params.toString()
  return query ? `?${query}` : ''
}

export const api = {
  getSummaryMetrics(): Promise<SummaryResponse> {
    return request('/metrics/summary')
  },
  getView(page: Page, inputs: ViewInputs = {}): Promise<ViewModel> {
    return request(`/views/${page}${viewQuery(inputs)}`)
  }
}
