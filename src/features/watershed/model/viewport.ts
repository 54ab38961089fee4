import type { FeatureCollection, Geometry, Position } from 'geojson';
import type { Extent } from '@/features/map/model/types';
import type { SpatialLayer } from '@/platform/contracts';
import type { Viewport } from './types';

export const EMPTY_EXTENT: Extent = [Number.NaN, Number.NaN, Number.NaN, Number.NaN];

type Bounds = { minX: number; minY: number; maxX: number; maxY: number; count: number };

const extendBounds = (bounds: Bounds, positions: Position[]) => {
  for (const [x, y] of positions) {
    bounds.minX = Math.min(bounds.minX, x);
    bounds.minY = Math.min(bounds.minY, y);
    bounds.maxX = Math.max(bounds.maxX, x);
    bounds.maxY = Math.max(bounds.maxY, y);
  }
  bounds.count += positions.length;
};

const extendWithGeometry = (bounds: Bounds, geometry: Geometry | null) => {
  if (!geometry) return;
  switch (geometry.type) {
    case 'Point':
      extendBounds(bounds, [geometry.coordinates]);
      return;
    case 'MultiPoint':
    case 'LineString':
      extendBounds(bounds, geometry.coordinates);
      return;
    case 'MultiLineString':
    case 'Polygon':
      geometry.coordinates.forEach((line) => extendBounds(bounds, line));
      return;
    case 'MultiPolygon':
      geometry.coordinates.forEach((polygon) => polygon.forEach((ring) => extendBounds(bounds, ring)));
      return;
    case 'GeometryCollection':
      geometry.geometries.forEach((child) => extendWithGeometry(bounds, child));
      return;
  }
};

/**
 * Combined `[minX, minY, maxX, maxY]` of every feature. A 2D `bbox` on the
 * collection wins when present; an empty collection yields an all-NaN extent.
 */
export const computeExtent = (collection: FeatureCollection<Geometry | null>): Extent => {
  const bbox = collection.bbox;
  if (bbox && bbox.length === 4) {
    return [bbox[0], bbox[1], bbox[2], bbox[3]];
  }

  const bounds: Bounds = { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity, count: 0 };
  collection.features.forEach((feature) => extendWithGeometry(bounds, feature.geometry));
  if (bounds.count === 0) return EMPTY_EXTENT;
  return [bounds.minX, bounds.minY, bounds.maxX, bounds.maxY];
};

export const toSpatialLayer = (collection: FeatureCollection): SpatialLayer => ({
  collection,
  extent: computeExtent(collection),
});

export const isFiniteExtent = (extent: Extent): boolean => extent.every((value) => Number.isFinite(value));

export type ViewportComputation = {
  viewport: Viewport | null;
  warning: string | null;
};

export const computeViewport = (layer: Pick<SpatialLayer, 'extent'>): ViewportComputation => {
  const { extent } = layer;
  if (!isFiniteExtent(extent)) {
    return {
      viewport: null,
      warning: `Watershed has invalid bounds: [${extent.join(', ')}]`,
    };
  }

  const [minX, minY, maxX, maxY] = extent;
  return {
    viewport: {
      center: { lat: (minY + maxY) / 2, lon: (minX + maxX) / 2 },
      southWest: { lat: minY, lon: minX },
      northEast: { lat: maxY, lon: maxX },
    },
    warning: null,
  };
};
