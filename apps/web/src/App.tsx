import clsx from 'clsx'
import { useEffect, useState } from 'react'
import { BrandHeatmap } from './components/BrandHeatmap'
import { GroupedBarChart } from './components/GroupedBarChart'
import { KpiCard } from './components/KpiCard'
import { ManufacturerSelector } from './components/ManufacturerSelector'
import { ModelSummaryList } from './components/ModelSummaryList'
import { TopBrandsChart } from './components/TopBrandsChart'
import { api } from './lib/api'
import { formatDate, formatNumber } from './lib/format'
import { initialPage, pages, usesManufacturer, usesSearch } from './lib/pages'
import type { Page, SummaryResponse, ViewFor, ViewModel } from './types/api'
import './App.css'

function App() {
  const [page, setPage] = useState<Page>(initialPage)
  const [manufacturer, setManufacturer] = useState('')
  const [search, setSearch] = useState('')
  const [view, setView] = useState<ViewModel | null>(null)
  const [summary, setSummary] = useState<SummaryResponse | null>(null)
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    const loadSummary = async () => {
      try {
        setSummary(await api.getSummaryMetrics())
      } catch (err) {
        console.error(err)
        setError('Unable to load dataset metrics from the API.')
      }
    }

    void loadSummary()
  }, [])

  useEffect(() => {
    let cancelled = false

    const loadView = async () => {
      setLoading(true)
      setError(null)
      try {
        const result = await api.getView(page, {
          manufacturer: usesManufacturer(page) && manufacturer ? manufacturer : undefined,
          search: usesSearch(page) ? search : undefined
        })
        if (!cancelled) {
          setView(result)
        }
      } catch (err) {
        console.error(err)
        if (!cancelled) {
          setError('Unable to load this page from the API.')
        }
      } finally {
        if (!cancelled) {
          setLoading(false)
        }
      }
    }

    void loadView()
    return () => {
      cancelled = true
    }
  }, [page, manufacturer, search])

  const loadError = view?.loadError ?? summary?.loadError ?? null

  return (
    <div className="layout">
      <nav className="sidebar">
        <p className="sidebar__title">Navigation</p>
        {pages.map((link) => (
          <button
            key={link.page}
            type="button"
            className={clsx('sidebar__link', link.page === page && 'sidebar__link--active')}
            onClick={() => setPage(link.page)}
          >
            {link.label}
          </button>
        ))}
        {summary?.loadedAt && <p className="sidebar__meta">Data loaded {formatDate(summary.loadedAt)}</p>}
      </nav>

      <main className="dashboard">
        {loadError && <div className="banner banner--error">{loadError}</div>}
        {error && <div className="banner banner--error">{error}</div>}

        {view && view.page === page ? (
          <section className={clsx('panel', loading && 'panel--loading')}>
            <h2 className="panel__title">{view.title}</h2>
            <ViewControls
              view={view}
              search={search}
              onManufacturerChange={setManufacturer}
              onSearchChange={setSearch}
              disabled={loading}
            />
            {view.message && <div className="banner banner--warning">{view.message}</div>}
            <ViewBody view={view} />
          </section>
        ) : (
          <section className="panel panel--loading">Loading…</section>
        )}
      </main>
    </div>
  )
}

type ViewControlsProps = {
  view: ViewModel
  search: string
  onManufacturerChange: (manufacturer: string) => void
  onSearchChange: (search: string) => void
  disabled: boolean
}

function ViewControls({ view, search, onManufacturerChange, onSearchChange, disabled }: ViewControlsProps) {
  if (view.page !== 'models-by-company' && view.page !== 'brand-heatmap') {
    return null
  }

  if (!view.manufacturers.length) {
    return null
  }

  const selected = view.data?.manufacturer ?? view.manufacturers[0]

  return (
    <div className="panel__controls">
      <ManufacturerSelector
        label={view.page === 'models-by-company' ? 'Choose a Company:' : 'Select a Manufacturer:'}
        manufacturers={view.manufacturers}
        value={selected}
        onChange={onManufacturerChange}
        disabled={disabled}
      />
      {view.page === 'models-by-company' && (
        <label className="search">
          <span className="search__label">Search for a specific model (optional):</span>
          <input
            className="search__input"
            type="search"
            value={search}
            onChange={(event) => onSearchChange(event.target.value)}
          />
        </label>
      )}
    </div>
  )
}

function ViewBody({ view }: { view: ViewModel }) {
  switch (view.page) {
    case 'home':
      return <HomeBody metrics={view.data} />
    case 'models-by-company':
      return view.data?.models.length ? <ModelSummaryList models={view.data.models} /> : null
    case 'top-brands':
      return view.data?.length ? <TopBrandsChart brands={view.data} /> : null
    case 'transmission-vs-type':
      return view.data ? (
        <GroupedBarChart title="Transmission vs Type" table={view.data} categoryLabel="transmission" />
      ) : null
    case 'manufacturer-vs-drive':
      return view.data ? (
        <GroupedBarChart title="Manufacturer vs Drive" table={view.data} categoryLabel="manufacturer" />
      ) : null
    case 'brand-heatmap':
      return view.data ? <BrandHeatmap heatmap={view.data} /> : null
  }
}

function HomeBody({ metrics }: { metrics: ViewFor<'home'>['data'] }) {
  return (
    <>
      <div className="welcome">
        <h3>Welcome!</h3>
        <p>
          Dive into insights from the used vehicle market across the US. This dashboard lets you{' '}
          <strong>explore car listings</strong> with interactive maps, charts, and filters.
        </p>
        <p>
          <strong>Here's what you can do:</strong>
        </p>
        <ul>
          <li>Browse car models by manufacturer</li>
          <li>See top-listed brands &amp; transmission types</li>
          <li>Explore regional trends with heatmaps</li>
          <li>Discover car specs like fuel type, drive, and price range</li>
        </ul>
      </div>

      <h3>Dataset Preview</h3>
      <section className="kpi-grid">
        <KpiCard
          title="Total Listings"
          value={formatNumber(metrics?.totalListings)}
          subtitle="Complete rows only"
          muted={!metrics?.totalListings}
        />
        <KpiCard title="Unique Brands" value={formatNumber(metrics?.uniqueManufacturers)} />
        <KpiCard title="Unique Models" value={formatNumber(metrics?.uniqueModels)} />
      </section>
    </>
  )
}

export default App
