import type { Page } from '../types/api'

export type PageLink = {
  page: Page
  label: string
}

export const pages: PageLink[] = [
  { page: 'home', label: 'Home' },
  { page: 'models-by-company', label: 'Models by Company' },
  { page: 'top-brands', label: 'Most Listed Vehicle Brands' },
  { page: 'transmission-vs-type', label: 'Transmission vs Type' },
  { page: 'manufacturer-vs-drive', label: 'Manufacturer vs Drive' },
  { page: 'brand-heatmap', label: 'Brand-Specific Heatmap' }
]

export const initialPage: Page = 'home'

// Pages whose view depends on the manufacturer picker.
export const usesManufacturer = (page: Page) => page === 'models-by-company' || page === 'brand-heatmap'

export const usesSearch = (page: Page) => page === 'models-by-company'
