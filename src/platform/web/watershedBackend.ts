import type { FeatureCollection } from 'geojson';
import type { ArtifactStoreBridge, DelineatorBridge, SpatialReaderBridge } from '@/platform/contracts';
import type { DelineatorConfig } from '@/platform/delineatorConfig';
import { toSpatialLayer } from '@/features/watershed/model/viewport';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type WatershedBackend = {
  delineator: DelineatorBridge;
  spatial: SpatialReaderBridge;
  artifacts: ArtifactStoreBridge;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFeatureCollection = (value: unknown): value is FeatureCollection =>
  isRecord(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);

const withQuery = (url: string, params: Record<string, string>): string => {
  const query = new URLSearchParams(params).toString();
  return `${url}?${query}`;
};

const describeFailure = async (response: Response): Promise<string> => {
  let body = '';
  try {
    body = (await response.text()).trim();
  } catch {
    body = '';
  }
  const status = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
  return body ? `${status}: ${body}` : status;
};

export const createHttpWatershedBackend = (
  config: DelineatorConfig,
  fetchImpl: FetchLike = (input, init) => fetch(input, init),
): WatershedBackend => {
  const request = async (url: string, init?: RequestInit): Promise<Response> => {
    const response = await fetchImpl(url, {
      ...init,
      signal: AbortSignal.timeout(config.requestTimeoutMs),
    });
    if (!response.ok) {
      throw new Error(await describeFailure(response));
    }
    return response;
  };

  const requestJson = async (url: string, init?: RequestInit): Promise<unknown> => {
    const response = await request(url, init);
    return response.json();
  };

  const artifactUrl = (endpoint: string, params: Record<string, string>) =>
    withQuery(`${config.baseUrl}/artifacts/${endpoint}`, params);

  return {
    delineator: {
      delineatePoint: async ({ lat, lon, watershedId, knownAreaKm2 }) => {
        const payload = await requestJson(`${config.baseUrl}/delineate`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ lat, lon, watershed_id: watershedId, area_km2: knownAreaKm2 }),
        });
        if (!isRecord(payload) || typeof payload.path !== 'string' || !payload.path.trim()) {
          throw new Error('Delineator response did not include an output path');
        }
        return payload.path;
      },
    },
    spatial: {
      listLayers: async (path) => {
        const payload = await requestJson(artifactUrl('layers', { path }));
        if (!isRecord(payload) || !Array.isArray(payload.layers)) {
          throw new Error('Layer listing response is malformed');
        }
        return payload.layers.filter((name): name is string => typeof name === 'string');
      },
      readLayer: async (path, layerName) => {
        const params: Record<string, string> = { path };
        if (layerName !== null) params.layer = layerName;
        const payload = await requestJson(artifactUrl('layer', params));
        if (!isFeatureCollection(payload)) {
          throw new Error(`Layer ${layerName ?? '(default)'} is not a GeoJSON FeatureCollection`);
        }
        return toSpatialLayer(payload);
      },
    },
    artifacts: {
      exists: async (path) => {
        const payload = await requestJson(artifactUrl('exists', { path }));
        return isRecord(payload) && payload.exists === true;
      },
      readBytes: async (path) => {
        const response = await request(artifactUrl('raw', { path }));
        return new Uint8Array(await response.arrayBuffer());
      },
    },
  };
};
