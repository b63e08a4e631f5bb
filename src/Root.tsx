import App from './App'
import type { ConfigResult } from './config/dashboard'
import type { CsvFetcher } from './utils/emissions'
import './App.css'

interface RootProps {
  configResult: ConfigResult
  fetcher?: CsvFetcher
}

function Root({ configResult, fetcher }: RootProps) {
  if (!configResult.ok) {
    return (
      <div className="app">
        <div className="error" role="alert">
          <h2>Configuration error</h2>
          <p>{configResult.message}</p>
          <p>Check the VITE_* values in your .env file and rebuild.</p>
        </div>
      </div>
    )
  }

  return <App config={configResult.config} fetcher={fetcher} />
}

export default Root
