import { describe, expect, it, vi } from 'vitest';
import {
  createInitialSessionState,
  createSessionStore,
  getRunStatus,
  sessionReduce,
  type RunResult,
} from '@/features/watershed';
import { watershedCollection, WATERSHED_EXTENT } from './helpers/watershedFixtures';

const makeRun = (id: string): RunResult => ({
  id,
  artifactPath: `/out/${id}.gpkg`,
  point: { lat: 4.65, lon: -74.05 },
  parameters: { watershedId: id, knownAreaKm2: null },
  primaryLayer: watershedCollection,
  primaryExtent: WATERSHED_EXTENT,
  overlays: { streams: null, snapPoint: null, requestedPoint: null },
  viewport: null,
  layerErrors: [],
  warnings: [],
  availableLayers: [],
  completedAt: '2026-01-01T00:00:00.000Z',
});

describe('session reducer', () => {
  it('starts with every optional field absent and the default watershed id', () => {
    expect(createInitialSessionState()).toEqual({
      lastClick: null,
      parameters: { watershedId: 'custom', knownAreaKm2: null },
      run: null,
      pending: null,
      lastFailure: null,
    });
  });

  it('replaces the previous click instead of merging it', () => {
    const first = sessionReduce(createInitialSessionState(), { type: 'clickCaptured', point: { lat: 1, lon: 2 } });
    const second = sessionReduce(first, { type: 'clickCaptured', point: { lat: 3, lon: 4 } });
    expect(second.lastClick).toEqual({ lat: 3, lon: 4 });
  });

  it('ignores a second runStarted while one is pending', () => {
    const pending = { point: { lat: 1, lon: 2 }, parameters: { watershedId: 'a', knownAreaKm2: null }, startedAt: 't0' };
    const started = sessionReduce(createInitialSessionState(), { type: 'runStarted', pending });
    const again = sessionReduce(started, {
      type: 'runStarted',
      pending: { ...pending, startedAt: 't1' },
    });
    expect(again).toBe(started);
  });

  it('keeps the previous run and the click when a run fails', () => {
    const run = makeRun('old');
    const state = {
      ...createInitialSessionState(),
      lastClick: { lat: 4.65, lon: -74.05 },
      run,
      pending: { point: { lat: 4.65, lon: -74.05 }, parameters: run.parameters, startedAt: 't0' },
    };
    const failed = sessionReduce(state, { type: 'runFailed', error: { kind: 'MissingArtifact', path: '/tmp/out.gpkg' } });
    expect(failed.run).toBe(run);
    expect(failed.lastClick).toEqual({ lat: 4.65, lon: -74.05 });
    expect(failed.pending).toBeNull();
    expect(failed.lastFailure).toEqual({ kind: 'MissingArtifact', path: '/tmp/out.gpkg' });
  });

  it('derives idle, running and loaded status', () => {
    const idle = createInitialSessionState();
    expect(getRunStatus(idle)).toBe('idle');
    const running = sessionReduce(idle, {
      type: 'runStarted',
      pending: { point: { lat: 1, lon: 2 }, parameters: idle.parameters, startedAt: 't0' },
    });
    expect(getRunStatus(running)).toBe('running');
    expect(getRunStatus(sessionReduce(running, { type: 'runSucceeded', run: makeRun('r1') }))).toBe('loaded');
  });
});

describe('session store', () => {
  it('installs a run as one object so readers never see a mix of runs', () => {
    const store = createSessionStore();
    const seen: Array<RunResult | null> = [];
    store.subscribe((state) => seen.push(state.run));

    const first = makeRun('first');
    const second = makeRun('second');
    store.apply({ type: 'runSucceeded', run: first });
    store.apply({ type: 'runSucceeded', run: second });

    expect(seen).toEqual([first, second]);
    expect(seen[0]?.artifactPath).toBe('/out/first.gpkg');
    expect(store.get().run).toBe(second);
  });

  it('reset restores a fresh state regardless of history', () => {
    const store = createSessionStore();
    store.apply({ type: 'clickCaptured', point: { lat: 4.65, lon: -74.05 } });
    store.apply({ type: 'parametersChanged', parameters: { watershedId: 'river1', knownAreaKm2: 120 } });
    store.apply({ type: 'runSucceeded', run: makeRun('r1') });
    store.apply({ type: 'runFailed', error: { kind: 'DelineationFailed', message: 'outside domain' } });

    store.reset();
    expect(store.get()).toEqual(createInitialSessionState());

    store.reset();
    expect(store.get()).toEqual(createInitialSessionState());
    expect(store.generation()).toBe(2);
  });

  it('does not notify listeners when an event changes nothing', () => {
    const store = createSessionStore();
    const pending = { point: { lat: 1, lon: 2 }, parameters: store.get().parameters, startedAt: 't0' };
    store.apply({ type: 'runStarted', pending });

    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    store.apply({ type: 'runStarted', pending });
    expect(listener).not.toHaveBeenCalled();

    unsubscribe();
    store.apply({ type: 'clickCaptured', point: { lat: 0, lon: 0 } });
    expect(listener).not.toHaveBeenCalled();
  });
});
