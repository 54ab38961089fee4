import type { GeoPoint } from '@/features/map/model/types';

export type MapProviderId = 'osm' | 'opentopomap';

export type MapConfig = {
  provider: MapProviderId;
  tileLayerUrl: string;
  tileLayerAttribution: string;
  tileSubdomains?: string | string[];
  maxNativeZoom: number;
  maxZoom: number;
  defaultCenter: GeoPoint;
  defaultZoom: number;
};

type EnvSource = Record<string, string | undefined>;

const DEFAULT_CENTER: GeoPoint = { lat: 4.6, lon: -74.1 };
const DEFAULT_ZOOM = 9;

const OSM_CONFIG: MapConfig = {
  provider: 'osm',
  tileLayerUrl: 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png',
  tileLayerAttribution: '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a>',
  tileSubdomains: 'abc',
  maxNativeZoom: 19,
  maxZoom: 19,
  defaultCenter: DEFAULT_CENTER,
  defaultZoom: DEFAULT_ZOOM,
};

const OPENTOPOMAP_CONFIG: MapConfig = {
  ...OSM_CONFIG,
  provider: 'opentopomap',
  tileLayerUrl: 'https://{s}.tile.opentopomap.org/{z}/{x}/{y}.png',
  tileLayerAttribution:
    'Map data: &copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors, ' +
    'SRTM | Map style: &copy; <a href="https://opentopomap.org">OpenTopoMap</a> (CC-BY-SA)',
  maxNativeZoom: 17,
  maxZoom: 17,
};

const normalizeProvider = (value: string | undefined): MapProviderId => {
  if (value?.trim().toLowerCase() === 'opentopomap') return 'opentopomap';
  return 'osm';
};

export const parseFiniteNumber = (
  value: string | undefined,
  fallback: number,
  constraints?: { min?: number; max?: number },
): number => {
  if (typeof value !== 'string') return fallback;
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  const numeric = Number(trimmed);
  if (!Number.isFinite(numeric)) return fallback;

  const min = constraints?.min;
  const max = constraints?.max;
  if (typeof min === 'number' && numeric < min) return fallback;
  if (typeof max === 'number' && numeric > max) return fallback;
  return numeric;
};

export const resolveMapConfig = (env: EnvSource): MapConfig => {
  const base = normalizeProvider(env.VITE_MAP_PROVIDER) === 'opentopomap' ? OPENTOPOMAP_CONFIG : OSM_CONFIG;
  const defaultCenter: GeoPoint = {
    lat: parseFiniteNumber(env.VITE_MAP_DEFAULT_LAT, DEFAULT_CENTER.lat, { min: -90, max: 90 }),
    lon: parseFiniteNumber(env.VITE_MAP_DEFAULT_LON, DEFAULT_CENTER.lon, { min: -180, max: 180 }),
  };
  const defaultZoom = Math.trunc(
    parseFiniteNumber(env.VITE_MAP_DEFAULT_ZOOM, DEFAULT_ZOOM, { min: 1, max: base.maxZoom }),
  );

  return {
    ...base,
    defaultCenter,
    defaultZoom,
  };
};
