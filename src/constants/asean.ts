// [latitude, longitude] in degrees
export type Coordinates = readonly [number, number]

// Approximate geographic centroids, used when the CSV carries no coordinates
export const ASEAN_CENTROIDS: ReadonlyMap<string, Coordinates> = new Map<string, Coordinates>([
  ['Indonesia', [-0.7893, 113.9213]],
  ['Malaysia', [4.2105, 101.9758]],
  ['Thailand', [15.87, 100.9925]],
  ['Vietnam', [14.0583, 108.2772]],
  ['Philippines', [12.8797, 121.774]],
  ['Singapore', [1.3521, 103.8198]],
  ['Myanmar', [21.9162, 95.956]],
  ['Cambodia', [12.5657, 104.991]],
  ['Laos', [19.8563, 102.4955]],
  ['Brunei', [4.5353, 114.7277]]
])

export const UNKNOWN_COORDINATES: Coordinates = [0, 0]

// [west, south, east, north] in degrees
export const ASEAN_BOUNDS: readonly [number, number, number, number] = [92, -11, 141, 28.5]
