import type { FeatureCollection } from 'geojson';
import type { Extent } from '@/features/map/model/types';
import type { SpatialLayer, SpatialReaderBridge } from '@/platform/contracts';
import type { DelineationError, LayerError, OverlayKind, Result } from './types';

export const OVERLAY_KINDS: readonly OverlayKind[] = ['streams', 'snapPoint', 'requestedPoint'];

export const OVERLAY_LAYER_NAMES: Record<OverlayKind, string> = {
  streams: 'streams',
  snapPoint: 'snap_point',
  requestedPoint: 'pour_point',
};

export const OVERLAY_LABELS: Record<OverlayKind, string> = {
  streams: 'Streams',
  snapPoint: 'Snap point',
  requestedPoint: 'Requested point',
};

export type LoadedLayers = {
  primaryLayer: FeatureCollection;
  primaryExtent: Extent;
  overlays: Record<OverlayKind, FeatureCollection | null>;
  layerErrors: LayerError[];
  warnings: string[];
  availableLayers: string[];
};

export type LayerLoadOutcome = Result<LoadedLayers, Extract<DelineationError, { kind: 'PrimaryLayerUnreadable' }>>;

export type LayerLoader = {
  load: (artifactPath: string) => Promise<LayerLoadOutcome>;
};

type LayerRead = Result<SpatialLayer, string>;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createLayerLoader = (reader: SpatialReaderBridge): LayerLoader => {
  const readLayer = async (path: string, layerName: string | null): Promise<LayerRead> => {
    try {
      return { ok: true, value: await reader.readLayer(path, layerName) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  };

  const listLayers = async (path: string): Promise<Result<string[], string>> => {
    try {
      return { ok: true, value: await reader.listLayers(path) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  };

  return {
    load: async (artifactPath) => {
      const primary = await readLayer(artifactPath, null);
      if (!primary.ok) {
        return {
          ok: false,
          error: { kind: 'PrimaryLayerUnreadable', path: artifactPath, message: primary.error },
        };
      }

      const [listed, overlayReads] = await Promise.all([
        listLayers(artifactPath),
        Promise.all(OVERLAY_KINDS.map((kind) => readLayer(artifactPath, OVERLAY_LAYER_NAMES[kind]))),
      ]);

      const overlays: Record<OverlayKind, FeatureCollection | null> = {
        streams: null,
        snapPoint: null,
        requestedPoint: null,
      };
      const layerErrors: LayerError[] = [];
      OVERLAY_KINDS.forEach((kind, index) => {
        const read = overlayReads[index];
        if (read.ok) {
          overlays[kind] = read.value.collection;
          return;
        }
        layerErrors.push({
          layer: kind,
          message: `${OVERLAY_LABELS[kind]} layer not found (${OVERLAY_LAYER_NAMES[kind]}): ${read.error}`,
        });
      });

      const warnings: string[] = [];
      if (!listed.ok) {
        warnings.push(`Could not list layers in ${artifactPath}: ${listed.error}`);
      }

      return {
        ok: true,
        value: {
          primaryLayer: primary.value.collection,
          primaryExtent: primary.value.extent,
          overlays,
          layerErrors,
          warnings,
          availableLayers: listed.ok ? listed.value : [],
        },
      };
    },
  };
};
