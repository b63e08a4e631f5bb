import type { CsvResponse } from '../utils/emissions'

export const SAMPLE_CSV = [
  'country,year,co2_per_capita',
  'Indonesia,2020,1.8',
  'Vietnam,2020,2.1',
  'Indonesia,2019,2.0'
].join('\n')

export const csvResponse = (text: string, status = 200): CsvResponse => ({
  ok: status >= 200 && status < 300,
  status,
  text: async () => text
})

// Single Polygon country, outer ring wound clockwise
export const TINY_TOPOLOGY = {
  type: 'Topology',
  objects: {
    countries: {
      type: 'GeometryCollection',
      geometries: [{ type: 'Polygon', arcs: [[0]], id: '360', properties: { name: 'Indonesia' } }]
    }
  },
  arcs: [
    [
      [100, 0],
      [100, 5],
      [110, 5],
      [110, 0],
      [100, 0]
    ]
  ]
}
