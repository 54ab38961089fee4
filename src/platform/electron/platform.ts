import type { FeatureCollection } from 'geojson';
import type { Platform } from '@/platform/contracts';
import { resolveMapConfig } from '@/platform/mapConfig';
import { toSpatialLayer } from '@/features/watershed/model/viewport';

type ElectronWatershedApi = NonNullable<Window['electronAPI']>['watershed'];

const getApi = (): ElectronWatershedApi | null => window.electronAPI?.watershed ?? null;

const requireApi = (): ElectronWatershedApi => {
  const api = getApi();
  if (!api) {
    throw new Error('Watershed bridge is not available in this window');
  }
  return api;
};

const normalizeArtifactPath = (value: string): string => value.replace(/\\/g, '/').trim();
const mapConfig = resolveMapConfig(import.meta.env as Record<string, string | undefined>);

const toCollection = (value: FeatureCollection | null, layerName: string | null): FeatureCollection => {
  if (!value) {
    throw new Error(`Layer ${layerName ?? '(default)'} not found`);
  }
  return value;
};

export const electronPlatform: Platform = {
  runtime: {
    isElectron: true,
  },
  map: {
    tileLayerUrl: () => mapConfig.tileLayerUrl,
    tileLayerAttribution: () => mapConfig.tileLayerAttribution,
    tileSubdomains: () => mapConfig.tileSubdomains,
    maxNativeZoom: () => mapConfig.maxNativeZoom,
    maxZoom: () => mapConfig.maxZoom,
    defaultCenter: () => mapConfig.defaultCenter,
    defaultZoom: () => mapConfig.defaultZoom,
  },
  delineator: {
    delineatePoint: async (request) => {
      const path = await requireApi().delineatePoint(request);
      return normalizeArtifactPath(path);
    },
  },
  spatial: {
    listLayers: async (path) => requireApi().listLayers(normalizeArtifactPath(path)),
    readLayer: async (path, layerName) => {
      const collection = await requireApi().readLayer(normalizeArtifactPath(path), layerName);
      return toSpatialLayer(toCollection(collection, layerName));
    },
  },
  artifacts: {
    exists: async (path) => {
      const api = getApi();
      if (!api) return false;
      return api.exists(normalizeArtifactPath(path));
    },
    readBytes: async (path) => {
      const api = getApi();
      if (!api) return null;
      return api.readBytes(normalizeArtifactPath(path));
    },
  },
};
