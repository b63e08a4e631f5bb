/**
 * Error Boundary Component
 *
 * Catches render errors so a failing view shows an inline message instead
 * of blanking the page.
 */

import { Component, type ErrorInfo, type ReactNode } from 'react'
import { getLogger } from '@logtape/logtape'

const logger = getLogger(['dashboard', 'ui'])

interface ErrorBoundaryProps {
  name?: string
  children: ReactNode
  fallback?: (error: Error, reset: () => void) => ReactNode
}

interface ErrorBoundaryState {
  error: Error | null
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error }
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    const { name = 'Unknown' } = this.props
    logger.error('Render failure in {name}: {message}', {
      name,
      message: error.message,
      componentStack: errorInfo.componentStack ?? ''
    })
  }

  reset = () => {
    this.setState({ error: null })
  }

  render() {
    const { error } = this.state
    const { children, fallback, name = 'Component' } = this.props

    if (error) {
      if (fallback) {
        return fallback(error, this.reset)
      }

      return (
        <div className="error-boundary" role="alert">
          <h3>⚠️ {name} Error</h3>
          <p className="error-message">{error.message}</p>
          <button type="button" onClick={this.reset}>
            Try Again
          </button>
          {import.meta.env.DEV && (
            <details className="error-details">
              <summary>Error Details (dev only)</summary>
              <pre>{error.stack}</pre>
            </details>
          )}
        </div>
      )
    }

    return children
  }
}
