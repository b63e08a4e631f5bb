import type { DashboardConfig } from './config/dashboard'
import Dashboard from './components/Dashboard'
import { ErrorBoundary } from './components/ErrorBoundary'
import { useEmissionsData } from './components/emissions/useEmissionsData'
import type { CsvFetcher } from './utils/emissions'
import './App.css'

interface AppProps {
  config: DashboardConfig
  fetcher?: CsvFetcher
}

function App({ config, fetcher }: AppProps) {
  const { loading, error, dataset, retry } = useEmissionsData(config.emissionsCsvUrl, fetcher)

  const renderBody = () => {
    if (loading) return <div className="loading">Loading emissions data...</div>
    if (error || !dataset) {
      return (
        <div className="error" role="alert">
          <p>Error: {error ?? 'No data loaded'}</p>
          <button type="button" onClick={retry}>
            Retry
          </button>
        </div>
      )
    }
    return (
      <ErrorBoundary name="Dashboard">
        <Dashboard dataset={dataset} config={config} />
      </ErrorBoundary>
    )
  }

  return (
    <div className="app">
      <header className="app-header">
        <h1>🌏 ASEAN CO₂ emission per capita</h1>
        <p className="subtitle">
          Carbon dioxide (CO₂) emissions from burning fossil fuels and industrial processes. This includes
          emissions from transport, electricity generation, and heating, but not land-use change.
        </p>
        <p className="source-note">{config.dataSourceNote}</p>
      </header>
      {renderBody()}
    </div>
  )
}

export default App
