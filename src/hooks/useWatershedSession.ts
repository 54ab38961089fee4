import { useCallback, useMemo, useState, useSyncExternalStore } from 'react';
import { toast } from 'sonner';
import type { GeoPoint } from '@/features/map/model/types';
import {
  composeMapScene,
  createArtifactExporter,
  createDelineationInvoker,
  createLayerLoader,
  createPointSelector,
  createSessionStore,
  describeDelineationError,
  OVERLAY_LABELS,
  type BaseTileLayer,
  type DelineationOutcome,
  type ExportedFile,
  type RunParameters,
} from '@/features/watershed';
import type { Platform } from '@/platform';

type UseWatershedSessionOptions = {
  platform: Platform;
  saveFile: (file: ExportedFile<Uint8Array | string>) => void;
};

const announceOutcome = (outcome: DelineationOutcome) => {
  if (!outcome.ok) {
    if (outcome.error.kind === 'AlreadyRunning') {
      toast.info(describeDelineationError(outcome.error));
      return;
    }
    if (outcome.error.kind === 'SessionReset') return;
    toast.error('Delineation failed', { description: describeDelineationError(outcome.error) });
    return;
  }

  const run = outcome.value;
  toast.success('Delineation complete', { description: run.artifactPath });
  run.layerErrors.forEach((entry) => {
    const title = entry.layer === 'primary' ? 'Watershed layer' : OVERLAY_LABELS[entry.layer];
    toast.warning(`${title} layer not found`, { description: entry.message });
  });
  run.warnings.forEach((warning) => {
    toast.warning(warning);
  });
};

export const useWatershedSession = ({ platform, saveFile }: UseWatershedSessionOptions) => {
  const [session] = useState(() => {
    const store = createSessionStore();
    return {
      store,
      selector: createPointSelector(store),
      invoker: createDelineationInvoker({
        store,
        delineator: platform.delineator,
        artifacts: platform.artifacts,
        loader: createLayerLoader(platform.spatial),
      }),
      exporter: createArtifactExporter({ store, artifacts: platform.artifacts }),
    };
  });
  const { store, selector, invoker, exporter } = session;

  const state = useSyncExternalStore(store.subscribe, store.get, store.get);

  const base = useMemo<BaseTileLayer>(
    () => ({
      url: platform.map.tileLayerUrl(),
      attribution: platform.map.tileLayerAttribution(),
      subdomains: platform.map.tileSubdomains(),
      maxNativeZoom: platform.map.maxNativeZoom(),
      maxZoom: platform.map.maxZoom(),
    }),
    [platform.map],
  );
  const scene = useMemo(() => composeMapScene(state, base), [state, base]);

  const selectPoint = useCallback((point: GeoPoint) => selector.select(point), [selector]);

  const updateParameters = useCallback(
    (parameters: Partial<RunParameters>) => {
      store.apply({ type: 'parametersChanged', parameters });
    },
    [store],
  );

  const delineate = useCallback(async (): Promise<DelineationOutcome> => {
    const current = store.get();
    const outcome = await invoker.run(current.lastClick, current.parameters);
    announceOutcome(outcome);
    return outcome;
  }, [invoker, store]);

  const reset = useCallback(() => store.reset(), [store]);

  const downloadRaw = useCallback(async () => {
    const file = await exporter.exportRaw();
    if (!file) {
      toast.error('Spatial container is not available for download');
      return;
    }
    saveFile(file);
  }, [exporter, saveFile]);

  const downloadGeoJson = useCallback(() => {
    const file = exporter.exportPrimaryAsGeoJSON();
    if (!file) return;
    saveFile(file);
  }, [exporter, saveFile]);

  return {
    state,
    scene,
    selectPoint,
    updateParameters,
    delineate,
    reset,
    downloadRaw,
    downloadGeoJson,
  };
};
