import { parseFiniteNumber } from '@/platform/mapConfig';

export type DelineatorConfig = {
  baseUrl: string;
  requestTimeoutMs: number;
};

type EnvSource = Record<string, string | undefined>;

export const DEFAULT_DELINEATOR_URL = '/api';
// A delineation on a large basin can take several minutes.
export const DEFAULT_DELINEATOR_TIMEOUT_MS = 15 * 60 * 1000;

const normalizeBaseUrl = (value: string | undefined): string => {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) return DEFAULT_DELINEATOR_URL;
  const withoutTrailing = trimmed.replace(/\/+$/, '');
  return withoutTrailing || DEFAULT_DELINEATOR_URL;
};

export const resolveDelineatorConfig = (env: EnvSource): DelineatorConfig => ({
  baseUrl: normalizeBaseUrl(env.VITE_DELINEATOR_URL),
  requestTimeoutMs: parseFiniteNumber(env.VITE_DELINEATOR_TIMEOUT_MS, DEFAULT_DELINEATOR_TIMEOUT_MS, {
    min: 1000,
    max: 60 * 60 * 1000,
  }),
});
