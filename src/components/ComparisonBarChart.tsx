import { useMemo, useState } from 'react'
import * as d3 from 'd3'
import type { EmissionRecord } from '../utils/emissions'
import { createCountryColorScale, formatEmissions } from '../utils/colors'
import './charts.css'

interface ComparisonBarChartProps {
  records: EmissionRecord[]
  countries: readonly string[]
  year: number
}

interface TooltipData {
  x: number
  y: number
  country: string
  value: number
}

const SVG_WIDTH = 960
const SVG_HEIGHT = 600
const MARGIN = { top: 60, right: 30, bottom: 90, left: 70 }

function ComparisonBarChart({ records, countries, year }: ComparisonBarChartProps) {
  const [tooltip, setTooltip] = useState<TooltipData | null>(null)

  const plotWidth = SVG_WIDTH - MARGIN.left - MARGIN.right
  const plotHeight = SVG_HEIGHT - MARGIN.top - MARGIN.bottom

  const colorScale = useMemo(() => createCountryColorScale(countries), [countries])

  // Records arrive ranked; the band order follows them
  const xScale = useMemo(() => {
    return d3
      .scaleBand()
      .domain(records.map(record => record.country))
      .range([0, plotWidth])
      .padding(0.3)
  }, [records, plotWidth])

  const yScale = useMemo(() => {
    const maxValue = d3.max(records, record => record.co2PerCapita) ?? 0
    return d3
      .scaleLinear()
      .domain([0, maxValue > 0 ? maxValue * 1.1 : 1])
      .range([plotHeight, 0])
      .nice()
  }, [records, plotHeight])

  const yTicks = useMemo(() => yScale.ticks(6), [yScale])

  return (
    <div className="chart-wrapper" onMouseLeave={() => setTooltip(null)}>
      <svg
        className="chart-svg comparison-bar-chart"
        viewBox={`0 0 ${SVG_WIDTH} ${SVG_HEIGHT}`}
        role="img"
        aria-label={`CO₂ Emission per Capita (${year})`}
      >
        <text className="chart-title" x={SVG_WIDTH / 2} y={28} textAnchor="middle">
          {`CO₂ Emission per Capita (${year})`}
        </text>

        <g transform={`translate(${MARGIN.left},${MARGIN.top})`}>
          <g className="grid">
            {yTicks.map(tick => (
              <line key={`grid-${tick}`} x1={0} x2={plotWidth} y1={yScale(tick)} y2={yScale(tick)} />
            ))}
          </g>

          <g className="axis axis-y">
            {yTicks.map(tick => (
              <text key={`y-${tick}`} x={-10} y={yScale(tick)} dy="0.32em" textAnchor="end">
                {tick}
              </text>
            ))}
            <text
              className="axis-label"
              transform="rotate(-90)"
              x={-plotHeight / 2}
              y={-50}
              textAnchor="middle"
            >
              CO₂ (tons per capita)
            </text>
          </g>

          <g className="bars">
            {records.map(record => {
              const x = xScale(record.country) ?? 0
              const y = yScale(record.co2PerCapita)
              const barWidth = xScale.bandwidth()
              return (
                <g key={record.country} className="bar" data-country={record.country}>
                  <rect
                    x={x}
                    y={y}
                    width={barWidth}
                    height={plotHeight - y}
                    fill={colorScale(record.country)}
                    fillOpacity={tooltip?.country === record.country ? 1 : 0.85}
                    onMouseEnter={() =>
                      setTooltip({
                        x: MARGIN.left + x + barWidth / 2,
                        y: MARGIN.top + y,
                        country: record.country,
                        value: record.co2PerCapita
                      })
                    }
                    onMouseLeave={() => setTooltip(null)}
                  />
                  <text className="bar-value" x={x + barWidth / 2} y={y - 6} textAnchor="middle">
                    {formatEmissions(record.co2PerCapita)}
                  </text>
                </g>
              )
            })}
          </g>

          <g className="axis axis-x" transform={`translate(0,${plotHeight})`}>
            <line x1={0} x2={plotWidth} y1={0} y2={0} />
            {records.map(record => (
              <text
                key={`x-${record.country}`}
                className="axis-category"
                x={(xScale(record.country) ?? 0) + xScale.bandwidth() / 2}
                y={20}
                textAnchor="middle"
              >
                {record.country}
              </text>
            ))}
            <text className="axis-label" x={plotWidth / 2} y={60} textAnchor="middle">
              Country
            </text>
          </g>
        </g>
      </svg>

      {tooltip && (
        <div
          className="tooltip"
          style={{
            left: `${(tooltip.x / SVG_WIDTH) * 100}%`,
            top: `${(tooltip.y / SVG_HEIGHT) * 100}%`
          }}
        >
          <div className="tooltip-title">{tooltip.country}</div>
          <div>
            <strong>{formatEmissions(tooltip.value)}</strong> t per capita
          </div>
        </div>
      )}
    </div>
  )
}

export default ComparisonBarChart
