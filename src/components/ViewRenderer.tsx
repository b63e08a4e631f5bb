import { useEffect, useMemo } from 'react'
import { getLogger } from '@logtape/logtape'
import type { Dataset, Selection, ViewMode } from '../utils/emissions'
import { EmptySelectionError } from '../utils/errors'
import { deriveView, type ViewModel } from '../utils/viewModel'
import ComparisonBarChart from './ComparisonBarChart'
import EmissionsMap from './EmissionsMap'
import TrendLineChart from './TrendLineChart'

const logger = getLogger(['dashboard', 'view'])

interface ViewRendererProps {
  dataset: Dataset
  selection: Selection
  atlasUrl: string | null
}

type DerivedView = { view: ViewModel; empty: null } | { view: null; empty: EmptySelectionError }

const HEADINGS: Record<ViewMode, (year: number) => string> = {
  map: year => `CO₂ Emissions per Capita — ${year}`,
  line: () => 'Historical CO₂ Emissions Trends',
  bar: year => `CO₂ Emission Comparison — ${year}`
}

const HINTS: Record<ViewMode, string> = {
  map: 'Use the slider on the sidebar to simulate a time-lapse effect year by year.',
  line: 'Move the slider to change the focus year and animate trends over time.',
  bar: 'Adjust the slider to see emissions ranking by year.'
}

const deriveSafely = (dataset: Dataset, selection: Selection): DerivedView => {
  try {
    return { view: deriveView(dataset, selection), empty: null }
  } catch (deriveError) {
    if (deriveError instanceof EmptySelectionError) {
      return { view: null, empty: deriveError }
    }
    throw deriveError
  }
}

function ViewRenderer({ dataset, selection, atlasUrl }: ViewRendererProps) {
  const { year, viewMode } = selection
  const derived = useMemo(() => deriveSafely(dataset, { year, viewMode }), [dataset, year, viewMode])

  useEffect(() => {
    if (derived.empty) {
      logger.info('No records for {year} in {mode} view', { year, mode: viewMode })
      return
    }
    logger.debug('Rendering {mode} view for {year}', { year, mode: viewMode })
  }, [derived, year, viewMode])

  const renderView = (view: ViewModel) => {
    switch (view.mode) {
      case 'map':
        return <EmissionsMap records={view.records} year={view.year} atlasUrl={atlasUrl} />
      case 'line':
        return (
          <TrendLineChart
            series={view.series}
            countries={view.countries}
            year={view.year}
            yearRange={view.yearRange}
          />
        )
      case 'bar':
        return <ComparisonBarChart records={view.records} countries={view.countries} year={view.year} />
    }
  }

  return (
    <section className="view-panel">
      <h2>{HEADINGS[viewMode](year)}</h2>
      {derived.view !== null ? (
        renderView(derived.view)
      ) : (
        <div className="empty-state" role="status">
          {derived.empty.message}
        </div>
      )}
      <p className="view-hint">▶️ {HINTS[viewMode]}</p>
    </section>
  )
}

export default ViewRenderer
