import { useMemo, useState } from 'react'
import * as d3 from 'd3'
import type { MultiPoint } from 'geojson'
import { ASEAN_BOUNDS } from '../constants/asean'
import type { EmissionRecord } from '../utils/emissions'
import { formatEmissions } from '../utils/colors'
import { useWorldAtlas } from './emissions/useWorldAtlas'
import './charts.css'

interface EmissionsMapProps {
  records: EmissionRecord[]
  year: number
  atlasUrl: string | null
}

interface Bubble {
  record: EmissionRecord
  x: number
  y: number
  radius: number
  color: string
}

const SVG_WIDTH = 960
const SVG_HEIGHT = 600
const MAP_PADDING = 30
const MAX_BUBBLE_RADIUS = 20
const LEGEND_WIDTH = 180
const LEGEND_STOPS = [0, 0.25, 0.5, 0.75, 1]

const insideViewBox = ([x, y]: [number, number]): boolean => x >= 0 && x <= SVG_WIDTH && y >= 0 && y <= SVG_HEIGHT

const [WEST, SOUTH, EAST, NORTH] = ASEAN_BOUNDS
const REGION_EXTENT: MultiPoint = {
  type: 'MultiPoint',
  coordinates: [
    [WEST, SOUTH],
    [EAST, SOUTH],
    [WEST, NORTH],
    [EAST, NORTH]
  ]
}

function EmissionsMap({ records, year, atlasUrl }: EmissionsMapProps) {
  const [hovered, setHovered] = useState<EmissionRecord | null>(null)
  const outlines = useWorldAtlas(atlasUrl)

  const projection = useMemo(() => {
    return d3.geoMercator().fitExtent(
      [
        [MAP_PADDING, MAP_PADDING],
        [SVG_WIDTH - MAP_PADDING, SVG_HEIGHT - MAP_PADDING]
      ],
      REGION_EXTENT
    )
  }, [])

  const path = useMemo(() => d3.geoPath(projection), [projection])

  const maxValue = useMemo(() => d3.max(records, record => record.co2PerCapita) ?? 0, [records])

  const colorScale = useMemo(
    () => d3.scaleSequential(d3.interpolateReds).domain([0, maxValue > 0 ? maxValue : 1]),
    [maxValue]
  )

  const { bubbles, unplaced } = useMemo(() => {
    const radiusScale = d3
      .scaleSqrt()
      .domain([0, maxValue > 0 ? maxValue : 1])
      .range([0, MAX_BUBBLE_RADIUS])

    const placed: Bubble[] = []
    const offMap: string[] = []
    // Larger bubbles first so smaller ones stay hoverable on top
    for (const record of [...records].sort((a, b) => b.co2PerCapita - a.co2PerCapita)) {
      const projected = projection([record.longitude, record.latitude])
      if (!projected || !insideViewBox(projected)) {
        offMap.push(record.country)
        continue
      }
      const [x, y] = projected
      placed.push({ record, x, y, radius: radiusScale(record.co2PerCapita), color: colorScale(record.co2PerCapita) })
    }
    return { bubbles: placed, unplaced: offMap.sort((a, b) => a.localeCompare(b)) }
  }, [records, projection, maxValue, colorScale])

  const countryPaths = useMemo(() => {
    if (!outlines) return []
    return outlines.features.flatMap((country, index) => {
      const d = path(country)
      return d ? [{ key: `${country.id ?? index}`, d }] : []
    })
  }, [outlines, path])

  return (
    <div className="chart-wrapper map-wrapper">
      <svg
        className="chart-svg emissions-map"
        viewBox={`0 0 ${SVG_WIDTH} ${SVG_HEIGHT}`}
        role="img"
        aria-label={`CO₂ emissions per capita by country, ${year}`}
      >
        <defs>
          <clipPath id="map-clip">
            <rect width={SVG_WIDTH} height={SVG_HEIGHT} />
          </clipPath>
          <linearGradient id="map-legend-gradient">
            {LEGEND_STOPS.map(stop => (
              <stop key={stop} offset={`${stop * 100}%`} stopColor={d3.interpolateReds(stop)} />
            ))}
          </linearGradient>
        </defs>

        <rect className="map-water" width={SVG_WIDTH} height={SVG_HEIGHT} />

        <g className="country-outlines" clipPath="url(#map-clip)">
          {countryPaths.map(country => (
            <path key={country.key} className="country-outline" d={country.d} />
          ))}
        </g>

        <g className="bubbles">
          {bubbles.map(bubble => (
            <circle
              key={bubble.record.country}
              className="emission-bubble"
              data-country={bubble.record.country}
              cx={bubble.x}
              cy={bubble.y}
              r={bubble.radius}
              fill={bubble.color}
              stroke={hovered?.country === bubble.record.country ? '#222' : '#fff'}
              strokeWidth={1}
              fillOpacity={0.85}
              onMouseEnter={() => setHovered(bubble.record)}
              onMouseLeave={() => setHovered(null)}
            >
              <title>{`${bubble.record.country}: ${formatEmissions(bubble.record.co2PerCapita)} t per capita`}</title>
            </circle>
          ))}
        </g>

        <g className="map-legend" transform={`translate(${SVG_WIDTH - LEGEND_WIDTH - MAP_PADDING},${SVG_HEIGHT - 50})`}>
          <text y={-6}>CO₂ (tons per capita)</text>
          <rect width={LEGEND_WIDTH} height={10} fill="url(#map-legend-gradient)" />
          <text y={24}>0</text>
          <text x={LEGEND_WIDTH} y={24} textAnchor="end">
            {formatEmissions(maxValue)}
          </text>
        </g>
      </svg>

      <div className="map-hover-status">
        {hovered ? (
          <div>
            <strong>{hovered.country}</strong>: {formatEmissions(hovered.co2PerCapita)} t per capita
          </div>
        ) : (
          <div className="map-hover-placeholder">Hover over a bubble to see details.</div>
        )}
        {unplaced.length > 0 && (
          <div className="map-unplaced">Not on the map (no location in the region): {unplaced.join(', ')}</div>
        )}
      </div>
    </div>
  )
}

export default EmissionsMap
