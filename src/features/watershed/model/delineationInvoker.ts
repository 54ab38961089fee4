import type { GeoPoint } from '@/features/map/model/types';
import type { ArtifactStoreBridge, DelineatorBridge } from '@/platform/contracts';
import type { LayerLoader } from './layerLoader';
import { isValidGeoPoint, normalizeRunParameters } from './parameters';
import type { SessionStore } from './sessionStore';
import type { DelineationError, DelineationOutcome, RunParameters, RunResult } from './types';
import { computeViewport } from './viewport';

export type DelineationInvokerDeps = {
  store: SessionStore;
  delineator: DelineatorBridge;
  artifacts: Pick<ArtifactStoreBridge, 'exists'>;
  loader: LayerLoader;
  now?: () => string;
  createRunId?: () => string;
};

export type DelineationInvoker = {
  run: (point: GeoPoint | null, parameters: Partial<RunParameters>) => Promise<DelineationOutcome>;
};

const nowIso = (): string => new Date().toISOString();

const createRunId = (): string => {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const describeDelineationError = (error: DelineationError): string => {
  switch (error.kind) {
    case 'AlreadyRunning':
      return 'A delineation is already running for this session.';
    case 'MissingPoint':
      return 'Click on the map to choose an outlet point first.';
    case 'DelineationFailed':
      return `Delineation failed: ${error.message}`;
    case 'MissingArtifact':
      return `Output file was not created: ${error.path}`;
    case 'PrimaryLayerUnreadable':
      return `Failed to load the watershed layer from ${error.path}: ${error.message}`;
    case 'SessionReset':
      return 'The session was reset before the delineation finished.';
  }
};

export const createDelineationInvoker = (deps: DelineationInvokerDeps): DelineationInvoker => {
  const { store, delineator, artifacts, loader } = deps;
  const now = deps.now ?? nowIso;
  const nextRunId = deps.createRunId ?? createRunId;

  return {
    run: async (point, rawParameters) => {
      // Checked before the first await so a concurrent call is rejected synchronously.
      if (store.get().pending) {
        return { ok: false, error: { kind: 'AlreadyRunning' } };
      }
      if (!isValidGeoPoint(point)) {
        return { ok: false, error: { kind: 'MissingPoint' } };
      }

      const requestPoint: GeoPoint = { lat: point.lat, lon: point.lon };
      const parameters = normalizeRunParameters(rawParameters);
      const generation = store.generation();
      store.apply({ type: 'runStarted', pending: { point: requestPoint, parameters, startedAt: now() } });

      const isCurrent = () => store.generation() === generation;
      const fail = (error: DelineationError): DelineationOutcome => {
        if (!isCurrent()) return { ok: false, error: { kind: 'SessionReset' } };
        store.apply({ type: 'runFailed', error });
        return { ok: false, error };
      };

      let artifactPath: string;
      try {
        artifactPath = await delineator.delineatePoint({
          lat: requestPoint.lat,
          lon: requestPoint.lon,
          watershedId: parameters.watershedId,
          knownAreaKm2: parameters.knownAreaKm2,
        });
      } catch (error) {
        return fail({ kind: 'DelineationFailed', message: errorMessage(error) });
      }

      let exists: boolean;
      try {
        exists = await artifacts.exists(artifactPath);
      } catch (error) {
        return fail({ kind: 'DelineationFailed', message: errorMessage(error) });
      }
      if (!exists) {
        return fail({ kind: 'MissingArtifact', path: artifactPath });
      }

      const loaded = await loader.load(artifactPath);
      if (!loaded.ok) {
        return fail(loaded.error);
      }

      const { viewport, warning } = computeViewport({ extent: loaded.value.primaryExtent });
      const run: RunResult = Object.freeze({
        id: nextRunId(),
        artifactPath,
        point: requestPoint,
        parameters,
        primaryLayer: loaded.value.primaryLayer,
        primaryExtent: loaded.value.primaryExtent,
        overlays: Object.freeze({ ...loaded.value.overlays }),
        viewport,
        layerErrors: Object.freeze([...loaded.value.layerErrors]),
        warnings: Object.freeze(warning ? [...loaded.value.warnings, warning] : [...loaded.value.warnings]),
        availableLayers: Object.freeze([...loaded.value.availableLayers]),
        completedAt: now(),
      });

      if (!isCurrent()) {
        return { ok: false, error: { kind: 'SessionReset' } };
      }
      store.apply({ type: 'runSucceeded', run });
      return { ok: true, value: run };
    },
  };
};
