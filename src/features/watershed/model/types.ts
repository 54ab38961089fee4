import type { FeatureCollection } from 'geojson';
import type { Extent, GeoPoint } from '@/features/map/model/types';

export const DEFAULT_WATERSHED_ID = 'custom';

export type OverlayKind = 'streams' | 'snapPoint' | 'requestedPoint';

export type RunParameters = {
  watershedId: string;
  knownAreaKm2: number | null;
};

export type LayerError = {
  layer: OverlayKind | 'primary';
  message: string;
};

export type Viewport = {
  center: GeoPoint;
  southWest: GeoPoint;
  northEast: GeoPoint;
};

export type RunResult = Readonly<{
  id: string;
  artifactPath: string;
  point: GeoPoint;
  parameters: RunParameters;
  primaryLayer: FeatureCollection;
  primaryExtent: Extent;
  overlays: Readonly<Record<OverlayKind, FeatureCollection | null>>;
  viewport: Viewport | null;
  layerErrors: readonly LayerError[];
  warnings: readonly string[];
  availableLayers: readonly string[];
  completedAt: string;
}>;

export type PendingRun = {
  point: GeoPoint;
  parameters: RunParameters;
  startedAt: string;
};

export type DelineationError =
  | { kind: 'AlreadyRunning' }
  | { kind: 'MissingPoint' }
  | { kind: 'DelineationFailed'; message: string }
  | { kind: 'MissingArtifact'; path: string }
  | { kind: 'PrimaryLayerUnreadable'; path: string; message: string }
  | { kind: 'SessionReset' };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type DelineationOutcome = Result<RunResult, DelineationError>;

export type SessionState = {
  /** Most recent valid map click. Survives successful runs so a point can be re-run. */
  lastClick: GeoPoint | null;
  parameters: RunParameters;
  run: RunResult | null;
  pending: PendingRun | null;
  lastFailure: DelineationError | null;
};

export type SessionEvent =
  | { type: 'clickCaptured'; point: GeoPoint }
  | { type: 'parametersChanged'; parameters: Partial<RunParameters> }
  | { type: 'runStarted'; pending: PendingRun }
  | { type: 'runSucceeded'; run: RunResult }
  | { type: 'runFailed'; error: DelineationError };

export type RunStatus = 'idle' | 'running' | 'loaded';
