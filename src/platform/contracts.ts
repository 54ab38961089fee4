import type { FeatureCollection } from "geojson";
import type { Extent, GeoPoint } from "@/features/map/model/types";

export type DelineationRequest = {
  lat: number;
  lon: number;
  watershedId: string;
  knownAreaKm2: number | null;
};

export type SpatialLayer = {
  collection: FeatureCollection;
  extent: Extent;
};

export type DelineatorBridge = {
  /** Resolves with the path of the spatial container written by the delineator. */
  delineatePoint: (request: DelineationRequest) => Promise<string>;
};

export type SpatialReaderBridge = {
  listLayers: (path: string) => Promise<string[]>;
  /** `layerName: null` reads the container's default layer. */
  readLayer: (path: string, layerName: string | null) => Promise<SpatialLayer>;
};

export type ArtifactStoreBridge = {
  exists: (path: string) => Promise<boolean>;
  readBytes: (path: string) => Promise<Uint8Array | null>;
};

export type PlatformRuntime = {
  isElectron: boolean;
};

export type Platform = {
  runtime: PlatformRuntime;
  map: {
    tileLayerUrl: () => string;
    tileLayerAttribution: () => string;
    tileSubdomains: () => string | string[] | undefined;
    maxNativeZoom: () => number;
    maxZoom: () => number;
    defaultCenter: () => GeoPoint;
    defaultZoom: () => number;
  };
  delineator: DelineatorBridge;
  spatial: SpatialReaderBridge;
  artifacts: ArtifactStoreBridge;
};
