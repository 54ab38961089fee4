import type { FeatureCollection } from 'geojson';
import type { GeoPoint } from '@/features/map/model/types';
import { getRunStatus } from './sessionStore';
import type { RunStatus, SessionState } from './types';

export type BaseTileLayer = {
  url: string;
  attribution: string;
  subdomains?: string | string[];
  maxNativeZoom: number;
  maxZoom: number;
};

export type PathStyle = {
  color: string;
  weight: number;
  fillColor?: string;
  fillOpacity?: number;
};

export type PointMarkerStyle = {
  radius: number;
  color: string;
  fill: boolean;
  fillOpacity: number;
};

export type SceneGeoJsonLayer = {
  /** Changes whenever the underlying run changes, so map layers can be keyed on it. */
  key: string;
  name: string;
  tooltip: string;
  data: FeatureCollection;
  style: PathStyle;
};

export type ScenePointLayer = {
  key: string;
  name: string;
  tooltip: string;
  data: FeatureCollection;
  marker: PointMarkerStyle;
};

export type SceneFitBounds = {
  key: string;
  southWest: GeoPoint;
  northEast: GeoPoint;
};

export type MapScene = {
  status: RunStatus;
  busy: boolean;
  base: BaseTileLayer;
  clickCapture: true;
  selectedPoint: GeoPoint | null;
  watershed: SceneGeoJsonLayer | null;
  streams: SceneGeoJsonLayer | null;
  requestedPoint: ScenePointLayer | null;
  snapPoint: ScenePointLayer | null;
  fitBounds: SceneFitBounds | null;
};

export const WATERSHED_STYLE: PathStyle = {
  fillColor: '#fdd',
  color: 'red',
  weight: 3,
  fillOpacity: 0.4,
};

export const STREAMS_STYLE: PathStyle = {
  color: 'blue',
  weight: 2,
};

export const REQUESTED_POINT_MARKER: PointMarkerStyle = { radius: 6, color: 'cyan', fill: true, fillOpacity: 1 };
export const SNAP_POINT_MARKER: PointMarkerStyle = { radius: 6, color: 'magenta', fill: true, fillOpacity: 1 };

/**
 * Pure projection of the session onto map layers. While a run is pending no
 * run layers are emitted, so the previous result is never shown mid-run.
 */
export const composeMapScene = (state: SessionState, base: BaseTileLayer): MapScene => {
  const status = getRunStatus(state);
  const busy = status === 'running';
  const run = busy ? null : state.run;

  const scene: MapScene = {
    status,
    busy,
    base,
    clickCapture: true,
    selectedPoint: state.lastClick,
    watershed: null,
    streams: null,
    requestedPoint: null,
    snapPoint: null,
    fitBounds: null,
  };
  if (!run) return scene;

  scene.watershed = {
    key: `${run.id}:watershed`,
    name: 'Watershed',
    tooltip: 'Watershed',
    data: run.primaryLayer,
    style: WATERSHED_STYLE,
  };

  const streams = run.overlays.streams;
  if (streams) {
    scene.streams = {
      key: `${run.id}:streams`,
      name: 'Rivers',
      tooltip: 'Rivers',
      data: streams,
      style: STREAMS_STYLE,
    };
  }

  const requested = run.overlays.requestedPoint;
  if (requested) {
    scene.requestedPoint = {
      key: `${run.id}:requested`,
      name: 'Requested',
      tooltip: 'Requested outlet',
      data: requested,
      marker: REQUESTED_POINT_MARKER,
    };
  }

  const snapped = run.overlays.snapPoint;
  if (snapped) {
    scene.snapPoint = {
      key: `${run.id}:snapped`,
      name: 'Snapped to river centerline',
      tooltip: 'Snapped outlet',
      data: snapped,
      marker: SNAP_POINT_MARKER,
    };
  }

  if (run.viewport) {
    scene.fitBounds = {
      key: run.id,
      southWest: run.viewport.southWest,
      northEast: run.viewport.northEast,
    };
  }

  return scene;
};
