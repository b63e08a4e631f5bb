import { useMemo, useState } from 'react'
import * as d3 from 'd3'
import type { CountrySeries, EmissionPoint } from '../utils/emissions'
import { createCountryColorScale, formatEmissions } from '../utils/colors'
import './charts.css'

interface TrendLineChartProps {
  series: CountrySeries[]
  countries: readonly string[]
  year: number
  yearRange: readonly [number, number]
}

const SVG_WIDTH = 960
const SVG_HEIGHT = 600
const MARGIN = { top: 60, right: 170, bottom: 60, left: 70 }
const FOCUS_DOT_RADIUS = 4

function TrendLineChart({ series, countries, year, yearRange }: TrendLineChartProps) {
  const [hoveredCountry, setHoveredCountry] = useState<string | null>(null)

  const plotWidth = SVG_WIDTH - MARGIN.left - MARGIN.right
  const plotHeight = SVG_HEIGHT - MARGIN.top - MARGIN.bottom

  const colorScale = useMemo(() => createCountryColorScale(countries), [countries])

  const xScale = useMemo(() => {
    const [minYear, maxYear] = yearRange
    const domain: [number, number] = minYear === maxYear ? [minYear - 1, maxYear + 1] : [minYear, maxYear]
    return d3.scaleLinear().domain(domain).range([0, plotWidth])
  }, [yearRange, plotWidth])

  const yScale = useMemo(() => {
    const maxValue = d3.max(series, entry => d3.max(entry.points, point => point.value)) ?? 0
    return d3
      .scaleLinear()
      .domain([0, maxValue > 0 ? maxValue * 1.1 : 1])
      .range([plotHeight, 0])
      .nice()
  }, [series, plotHeight])

  const lineGenerator = useMemo(() => {
    return d3
      .line<EmissionPoint>()
      .x(point => xScale(point.year))
      .y(point => yScale(point.value))
  }, [xScale, yScale])

  const xTicks = useMemo(() => xScale.ticks(10).filter(tick => Number.isInteger(tick)), [xScale])
  const yTicks = useMemo(() => yScale.ticks(6), [yScale])

  const focusX = xScale(year)

  return (
    <div className="chart-wrapper">
      <svg
        className="chart-svg trend-line-chart"
        viewBox={`0 0 ${SVG_WIDTH} ${SVG_HEIGHT}`}
        role="img"
        aria-label="CO₂ Emission per Capita Over Time (ASEAN)"
      >
        <text className="chart-title" x={SVG_WIDTH / 2} y={28} textAnchor="middle">
          CO₂ Emission per Capita Over Time (ASEAN)
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

          <g className="axis axis-x" transform={`translate(0,${plotHeight})`}>
            <line x1={0} x2={plotWidth} y1={0} y2={0} />
            {xTicks.map(tick => (
              <text key={`x-${tick}`} x={xScale(tick)} y={22} textAnchor="middle">
                {tick}
              </text>
            ))}
            <text className="axis-label" x={plotWidth / 2} y={48} textAnchor="middle">
              Year
            </text>
          </g>

          <g className="series">
            {series.map(entry => {
              const path = lineGenerator(entry.points)
              if (!path) return null
              const dimmed = hoveredCountry !== null && hoveredCountry !== entry.country
              return (
                <path
                  key={entry.country}
                  className="series-line"
                  data-country={entry.country}
                  d={path}
                  fill="none"
                  stroke={colorScale(entry.country)}
                  strokeWidth={hoveredCountry === entry.country ? 3.5 : 2}
                  opacity={dimmed ? 0.25 : 1}
                  onMouseEnter={() => setHoveredCountry(entry.country)}
                  onMouseLeave={() => setHoveredCountry(null)}
                >
                  <title>{entry.country}</title>
                </path>
              )
            })}
          </g>

          <line
            className="focus-year-line"
            x1={focusX}
            x2={focusX}
            y1={0}
            y2={plotHeight}
            stroke="red"
            strokeDasharray="6 4"
          />

          <g className="focus-dots">
            {series.map(entry => {
              const value = entry.valueByYear.get(year)
              if (value === undefined) return null
              return (
                <circle
                  key={`focus-${entry.country}`}
                  cx={focusX}
                  cy={yScale(value)}
                  r={FOCUS_DOT_RADIUS}
                  fill={colorScale(entry.country)}
                >
                  <title>{`${entry.country} (${year}): ${formatEmissions(value)} t per capita`}</title>
                </circle>
              )
            })}
          </g>

          <g className="legend" transform={`translate(${plotWidth + 24},0)`}>
            {series.map((entry, index) => (
              <g
                key={`legend-${entry.country}`}
                className="legend-item"
                transform={`translate(0,${index * 22})`}
                onMouseEnter={() => setHoveredCountry(entry.country)}
                onMouseLeave={() => setHoveredCountry(null)}
              >
                <rect width={12} height={12} fill={colorScale(entry.country)} />
                <text x={18} y={10}>
                  {entry.country}
                </text>
              </g>
            ))}
          </g>
        </g>
      </svg>
    </div>
  )
}

export default TrendLineChart
