import { DEFAULT_WATERSHED_ID, type RunStatus, type SessionEvent, type SessionState } from './types';

export type SessionListener = (state: SessionState) => void;

export type SessionStore = {
  get: () => SessionState;
  apply: (event: SessionEvent) => SessionState;
  /** Replaces the state with a fresh one. Safe to call at any time, including mid-run. */
  reset: () => void;
  subscribe: (listener: SessionListener) => () => void;
  /** Bumped on every reset; lets in-flight work detect that its session is gone. */
  generation: () => number;
};

export const createInitialSessionState = (): SessionState => ({
  lastClick: null,
  parameters: { watershedId: DEFAULT_WATERSHED_ID, knownAreaKm2: null },
  run: null,
  pending: null,
  lastFailure: null,
});

export const sessionReduce = (state: SessionState, event: SessionEvent): SessionState => {
  switch (event.type) {
    case 'clickCaptured':
      return { ...state, lastClick: { ...event.point } };
    case 'parametersChanged':
      return { ...state, parameters: { ...state.parameters, ...event.parameters } };
    case 'runStarted':
      if (state.pending) return state;
      return { ...state, pending: event.pending, lastFailure: null };
    case 'runSucceeded':
      return { ...state, run: event.run, pending: null, lastFailure: null };
    case 'runFailed':
      return { ...state, pending: null, lastFailure: event.error };
    default:
      return state;
  }
};

export const getRunStatus = (state: SessionState): RunStatus => {
  if (state.pending) return 'running';
  if (state.run) return 'loaded';
  return 'idle';
};

export const createSessionStore = (initial: SessionState = createInitialSessionState()): SessionStore => {
  let state = initial;
  let generation = 0;
  const listeners = new Set<SessionListener>();

  const publish = () => {
    const snapshot = state;
    listeners.forEach((listener) => listener(snapshot));
  };

  return {
    get: () => state,
    apply: (event) => {
      const next = sessionReduce(state, event);
      if (next === state) return state;
      state = next;
      publish();
      return state;
    },
    reset: () => {
      state = createInitialSessionState();
      generation += 1;
      publish();
    },
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    generation: () => generation,
  };
};
