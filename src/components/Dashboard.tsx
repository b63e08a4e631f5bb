import { useState } from 'react'
import type { DashboardConfig } from '../config/dashboard'
import { clampYear, defaultYear, type Dataset, type ViewMode } from '../utils/emissions'
import { useTimelapse } from './emissions/useTimelapse'
import Sidebar from './Sidebar'
import ViewRenderer from './ViewRenderer'

interface DashboardProps {
  dataset: Dataset
  config: Pick<DashboardConfig, 'defaultYear' | 'atlasUrl' | 'timelapseIntervalMs'>
}

function Dashboard({ dataset, config }: DashboardProps) {
  const [viewMode, setViewMode] = useState<ViewMode>('map')
  const [year, setYear] = useState(() => defaultYear(dataset, config.defaultYear))

  const timelapse = useTimelapse({
    year,
    yearRange: dataset.yearRange,
    setYear,
    intervalMs: config.timelapseIntervalMs
  })

  const handleYearChange = (next: number) => {
    timelapse.stop()
    setYear(clampYear(dataset, next))
  }

  return (
    <div className="dashboard">
      <Sidebar
        viewMode={viewMode}
        year={year}
        yearRange={dataset.yearRange}
        playing={timelapse.playing}
        onViewModeChange={setViewMode}
        onYearChange={handleYearChange}
        onTogglePlay={timelapse.toggle}
      />
      <main className="dashboard-main">
        <ViewRenderer dataset={dataset} selection={{ year, viewMode }} atlasUrl={config.atlasUrl} />
      </main>
    </div>
  )
}

export default Dashboard
