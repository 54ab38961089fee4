export {
  createInitialSessionState,
  createSessionStore,
  getRunStatus,
  sessionReduce,
} from './model/sessionStore';
export type { SessionListener, SessionStore } from './model/sessionStore';
export { createPointSelector, fromLatLng } from './model/pointSelector';
export type { PointSelector } from './model/pointSelector';
export { createDelineationInvoker, describeDelineationError } from './model/delineationInvoker';
export type { DelineationInvoker, DelineationInvokerDeps } from './model/delineationInvoker';
export { createLayerLoader, OVERLAY_KINDS, OVERLAY_LABELS, OVERLAY_LAYER_NAMES } from './model/layerLoader';
export type { LayerLoader, LayerLoadOutcome, LoadedLayers } from './model/layerLoader';
export { computeExtent, computeViewport, isFiniteExtent, toSpatialLayer } from './model/viewport';
export type { ViewportComputation } from './model/viewport';
export { composeMapScene, REQUESTED_POINT_MARKER, SNAP_POINT_MARKER, STREAMS_STYLE, WATERSHED_STYLE } from './model/scene';
export type { BaseTileLayer, MapScene, SceneFitBounds, SceneGeoJsonLayer, ScenePointLayer } from './model/scene';
export {
  artifactExtension,
  createArtifactExporter,
  GEOJSON_MIME_TYPE,
  GEOPACKAGE_MIME_TYPE,
  safeFilename,
} from './model/exporter';
export type { ArtifactExporter, ExportedFile } from './model/exporter';
export {
  isValidGeoPoint,
  normalizeKnownArea,
  normalizeRunParameters,
  normalizeWatershedId,
  parseKnownAreaInput,
} from './model/parameters';
export {
  DEFAULT_WATERSHED_ID,
  type DelineationError,
  type DelineationOutcome,
  type LayerError,
  type OverlayKind,
  type PendingRun,
  type Result,
  type RunParameters,
  type RunResult,
  type RunStatus,
  type SessionEvent,
  type SessionState,
  type Viewport,
} from './model/types';
