import type { ChangeEvent } from 'react'
import { VIEW_MODES, type ViewMode } from '../utils/emissions'
import './Sidebar.css'

interface SidebarProps {
  viewMode: ViewMode
  year: number
  yearRange: readonly [number, number]
  playing: boolean
  onViewModeChange: (mode: ViewMode) => void
  onYearChange: (year: number) => void
  onTogglePlay: () => void
}

const VIEW_MODE_OPTIONS: Record<ViewMode, { icon: string; label: string }> = {
  map: { icon: '🗺️', label: 'Map' },
  line: { icon: '📈', label: 'Line Chart' },
  bar: { icon: '📊', label: 'Bar Chart' }
}

function Sidebar({
  viewMode,
  year,
  yearRange,
  playing,
  onViewModeChange,
  onYearChange,
  onTogglePlay
}: SidebarProps) {
  const [minYear, maxYear] = yearRange

  const handleYearChange = (event: ChangeEvent<HTMLInputElement>) => {
    const next = Number.parseInt(event.target.value, 10)
    if (Number.isFinite(next)) onYearChange(next)
  }

  return (
    <aside className="sidebar">
      <fieldset className="sidebar-group">
        <legend>Select Visualization Type</legend>
        {VIEW_MODES.map(mode => (
          <label key={mode} className={`view-mode-option ${viewMode === mode ? 'active' : ''}`}>
            <input
              type="radio"
              name="view-mode"
              value={mode}
              checked={viewMode === mode}
              onChange={() => onViewModeChange(mode)}
            />
            <span aria-hidden="true">{VIEW_MODE_OPTIONS[mode].icon}</span>
            <span>{VIEW_MODE_OPTIONS[mode].label}</span>
          </label>
        ))}
      </fieldset>

      <div className="sidebar-group">
        <label htmlFor="year-slider">Select Year (for time-lapse)</label>
        <div className="year-readout" aria-live="polite">
          {year}
        </div>
        <input
          id="year-slider"
          type="range"
          min={minYear}
          max={maxYear}
          step={1}
          value={year}
          onChange={handleYearChange}
        />
        <div className="year-bounds">
          <span>{minYear}</span>
          <span>{maxYear}</span>
        </div>
        <button type="button" className="play-btn" onClick={onTogglePlay} aria-pressed={playing}>
          {playing ? 'Pause' : 'Play'}
        </button>
      </div>
    </aside>
  )
}

export default Sidebar
