import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { getLogger } from '@logtape/logtape'
import Root from './Root'
import { ErrorBoundary } from './components/ErrorBoundary'
import { readDashboardConfig } from './config/dashboard'
import { initLogging } from './core/logging'

const container = document.getElementById('root')
if (!container) {
  throw new Error('Missing #root element')
}

const configResult = readDashboardConfig(import.meta.env)

const mount = () => {
  if (!configResult.ok) {
    getLogger(['dashboard', 'config']).error('{message}', { message: configResult.message })
  }

  createRoot(container).render(
    <StrictMode>
      <ErrorBoundary name="App">
        <Root configResult={configResult} />
      </ErrorBoundary>
    </StrictMode>
  )
}

void initLogging(configResult.ok ? configResult.config.logLevel : 'info')
  .catch((loggingError: unknown) => {
    console.error('Failed to configure logging:', loggingError)
  })
  .finally(mount)
