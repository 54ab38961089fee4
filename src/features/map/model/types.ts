export type GeoPoint = {
  lat: number;
  lon: number;
};

/** `[minX, minY, maxX, maxY]` in lon/lat order, as the spatial reader reports it. */
export type Extent = readonly [number, number, number, number];

export type MapView = {
  center: GeoPoint;
  zoom: number;
};
