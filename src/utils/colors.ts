import * as d3 from 'd3'

// Keyed on the full country list so a country keeps its colour across views
export const createCountryColorScale = (countries: readonly string[]): d3.ScaleOrdinal<string, string> =>
  d3.scaleOrdinal<string, string>().domain(countries).range(d3.schemeTableau10)

export const formatEmissions = d3.format('.2f')
