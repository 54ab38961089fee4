import type { GeoPoint } from '@/features/map/model/types';
import { DEFAULT_WATERSHED_ID, type RunParameters } from './types';

export const isValidGeoPoint = (point: GeoPoint | null | undefined): point is GeoPoint => {
  if (!point) return false;
  const { lat, lon } = point;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return false;
  return lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
};

export const normalizeWatershedId = (value: string | null | undefined): string => {
  const trimmed = value?.trim() ?? '';
  return trimmed || DEFAULT_WATERSHED_ID;
};

export const normalizeKnownArea = (value: number | null | undefined): number | null => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return null;
  return value;
};

export const normalizeRunParameters = (parameters: Partial<RunParameters>): RunParameters => ({
  watershedId: normalizeWatershedId(parameters.watershedId),
  knownAreaKm2: normalizeKnownArea(parameters.knownAreaKm2),
});

const GROUPED_NUMBER = /^\d{1,3}(,\d{3})+(\.\d+)?$/;
const DECIMAL_COMMA = /^\d*,\d+$/;

/**
 * Parses the optional area field; blank or unusable input means "unknown".
 * "1,000" and "1,000.5" are read as thousands grouping, a lone "12,5" as a
 * decimal comma. Any other use of commas is rejected.
 */
export const parseKnownAreaInput = (raw: string): number | null => {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  let normalized = trimmed;
  if (trimmed.includes(',')) {
    if (GROUPED_NUMBER.test(trimmed)) {
      normalized = trimmed.replace(/,/g, '');
    } else if (DECIMAL_COMMA.test(trimmed)) {
      normalized = trimmed.replace(',', '.');
    } else {
      return null;
    }
  }
  return normalizeKnownArea(Number(normalized));
};
