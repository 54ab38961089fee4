import { describe, expect, it, vi } from 'vitest';
import {
  createDelineationInvoker,
  createLayerLoader,
  createSessionStore,
  describeDelineationError,
  toSpatialLayer,
  type SessionStore,
} from '@/features/watershed';
import type { DelineationRequest } from '@/platform/contracts';
import {
  ARTIFACT_PATH,
  createFakeReader,
  createFullContainer,
  denseRingCollection,
  withoutLayers,
  type FakeContainer,
} from './helpers/watershedFixtures';

const deferred = <T,>() => {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

const setup = (options?: {
  containers?: Record<string, FakeContainer>;
  delineatePoint?: (request: DelineationRequest) => Promise<string>;
  store?: SessionStore;
}) => {
  const store = options?.store ?? createSessionStore();
  const containers = options?.containers ?? { [ARTIFACT_PATH]: createFullContainer() };
  const impl: (request: DelineationRequest) => Promise<string> =
    options?.delineatePoint ?? (async () => ARTIFACT_PATH);
  const delineatePoint = vi.fn(impl);
  const exists = vi.fn(async (path: string) => path in containers);
  let runCounter = 0;
  const invoker = createDelineationInvoker({
    store,
    delineator: { delineatePoint },
    artifacts: { exists },
    loader: createLayerLoader(createFakeReader(containers)),
    now: () => '2026-03-01T12:00:00.000Z',
    createRunId: () => {
      runCounter += 1;
      return `run-${runCounter}`;
    },
  });
  return { store, invoker, delineatePoint, exists };
};

const CLICK = { lat: 4.65, lon: -74.05 };

describe('delineation invoker', () => {
  it('installs a complete run when every layer is readable', async () => {
    const { store, invoker, delineatePoint } = setup();
    store.apply({ type: 'clickCaptured', point: CLICK });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(delineatePoint).toHaveBeenCalledWith({ lat: 4.65, lon: -74.05, watershedId: 'river1', knownAreaKm2: null });
    expect(outcome.ok).toBe(true);
    const run = store.get().run;
    expect(run?.id).toBe('run-1');
    expect(run?.artifactPath).toBe(ARTIFACT_PATH);
    expect(run?.layerErrors).toEqual([]);
    expect(run?.warnings).toEqual([]);
    expect(run?.viewport?.center.lat).toBeCloseTo(4.65, 10);
    expect(run?.viewport?.center.lon).toBeCloseTo(-74.05, 10);
    expect(store.get().pending).toBeNull();
    expect(store.get().lastClick).toEqual(CLICK);
  });

  it('defaults a blank watershed id and drops an unusable area', async () => {
    const { invoker, delineatePoint } = setup();
    await invoker.run(CLICK, { watershedId: '   ', knownAreaKm2: -5 });
    expect(delineatePoint).toHaveBeenCalledWith({ lat: 4.65, lon: -74.05, watershedId: 'custom', knownAreaKm2: null });
  });

  it('passes a positive known area through', async () => {
    const { invoker, delineatePoint } = setup();
    await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: 352.5 });
    expect(delineatePoint).toHaveBeenCalledWith({ lat: 4.65, lon: -74.05, watershedId: 'river1', knownAreaKm2: 352.5 });
  });

  it('succeeds without the snapped point layer and records one layer error', async () => {
    const { store, invoker } = setup({
      containers: { [ARTIFACT_PATH]: withoutLayers(createFullContainer(), ['snap_point']) },
    });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome.ok).toBe(true);
    const run = store.get().run;
    expect(run?.layerErrors.map((entry) => entry.layer)).toEqual(['snapPoint']);
    expect(run?.overlays.snapPoint).toBeNull();
    expect(run?.overlays.requestedPoint).not.toBeNull();
    expect(run?.overlays.streams).not.toBeNull();
  });

  it('fails with MissingArtifact and keeps the previous run', async () => {
    const { store, invoker } = setup();
    await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });
    const previousRun = store.get().run;

    const missing = setup({ store, delineatePoint: async () => '/tmp/out.gpkg' });
    const outcome = await missing.invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome).toEqual({ ok: false, error: { kind: 'MissingArtifact', path: '/tmp/out.gpkg' } });
    expect(store.get().run).toBe(previousRun);
    expect(store.get().pending).toBeNull();
    expect(store.get().lastFailure).toEqual({ kind: 'MissingArtifact', path: '/tmp/out.gpkg' });
  });

  it('surfaces a delineator failure with its message', async () => {
    const { store, invoker } = setup({
      delineatePoint: async () => {
        throw new Error('point outside supported domain');
      },
    });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'DelineationFailed', message: 'point outside supported domain' },
    });
    expect(store.get().run).toBeNull();
  });

  it('fails with PrimaryLayerUnreadable when the watershed layer is missing', async () => {
    const { store, invoker } = setup({
      containers: { [ARTIFACT_PATH]: withoutLayers(createFullContainer(), ['']) },
    });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.kind).toBe('PrimaryLayerUnreadable');
    expect(store.get().run).toBeNull();
  });

  it('keeps the run but leaves the viewport absent when bounds are invalid', async () => {
    const { store, invoker } = setup({
      containers: { [ARTIFACT_PATH]: createFullContainer([Number.NaN, 1.0, 2.0, 3.0]) },
    });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome.ok).toBe(true);
    expect(store.get().run?.viewport).toBeNull();
    expect(store.get().run?.warnings).toEqual(['Watershed has invalid bounds: [NaN, 1, 2, 3]']);
  });

  it('loads dense watershed and stream layers without a layer error', async () => {
    const dense = toSpatialLayer(denseRingCollection(300_001));
    const { store, invoker } = setup({
      containers: { [ARTIFACT_PATH]: { ...createFullContainer(), '': dense, streams: dense } },
    });

    const outcome = await invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });

    expect(outcome.ok).toBe(true);
    const run = store.get().run;
    expect(run?.primaryExtent).toEqual([-180, -45, 179, 29]);
    expect(run?.viewport?.center).toEqual({ lat: -8, lon: -0.5 });
    expect(run?.layerErrors).toEqual([]);
  });

  it('rejects a second run while the first is in flight and still installs the first', async () => {
    const pending = deferred<string>();
    const { store, invoker, delineatePoint } = setup({ delineatePoint: () => pending.promise });

    const first = invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });
    expect(store.get().pending?.point).toEqual(CLICK);
    const duringRun = store.get();

    const second = await invoker.run({ lat: 5, lon: -75 }, { watershedId: 'other', knownAreaKm2: null });
    expect(second).toEqual({ ok: false, error: { kind: 'AlreadyRunning' } });
    expect(store.get()).toBe(duringRun);
    expect(delineatePoint).toHaveBeenCalledTimes(1);

    pending.resolve(ARTIFACT_PATH);
    const outcome = await first;
    expect(outcome.ok).toBe(true);
    expect(store.get().run?.parameters.watershedId).toBe('river1');
  });

  it('keeps a click made during a run for the next invocation', async () => {
    const pending = deferred<string>();
    const { store, invoker } = setup({ delineatePoint: () => pending.promise });

    const first = invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });
    store.apply({ type: 'clickCaptured', point: { lat: 5.1, lon: -73.2 } });
    pending.resolve(ARTIFACT_PATH);
    await first;

    expect(store.get().run?.point).toEqual(CLICK);
    expect(store.get().lastClick).toEqual({ lat: 5.1, lon: -73.2 });
  });

  it('drops the result of a run that finishes after a reset', async () => {
    const pending = deferred<string>();
    const { store, invoker } = setup({ delineatePoint: () => pending.promise });

    const first = invoker.run(CLICK, { watershedId: 'river1', knownAreaKm2: null });
    store.reset();
    pending.resolve(ARTIFACT_PATH);

    await expect(first).resolves.toEqual({ ok: false, error: { kind: 'SessionReset' } });
    expect(store.get().run).toBeNull();
    expect(store.get().pending).toBeNull();
  });

  it('rejects a run without a point and leaves state unchanged', async () => {
    const { store, invoker, delineatePoint } = setup();
    const before = store.get();

    await expect(invoker.run(null, { watershedId: 'river1', knownAreaKm2: null })).resolves.toEqual({
      ok: false,
      error: { kind: 'MissingPoint' },
    });
    expect(store.get()).toBe(before);
    expect(delineatePoint).not.toHaveBeenCalled();
  });
});

describe('describeDelineationError', () => {
  it('includes the path or underlying message', () => {
    expect(describeDelineationError({ kind: 'MissingArtifact', path: '/tmp/out.gpkg' })).toBe(
      'Output file was not created: /tmp/out.gpkg',
    );
    expect(
      describeDelineationError({ kind: 'PrimaryLayerUnreadable', path: '/tmp/a.gpkg', message: 'corrupt header' }),
    ).toBe('Failed to load the watershed layer from /tmp/a.gpkg: corrupt header');
  });
});
