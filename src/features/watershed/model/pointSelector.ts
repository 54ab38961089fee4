import type { GeoPoint } from '@/features/map/model/types';
import { isValidGeoPoint } from './parameters';
import type { SessionStore } from './sessionStore';

export type PointSelector = {
  /** Records the click as the next outlet. Invalid coordinates are dropped without error. */
  select: (point: GeoPoint) => void;
};

export const fromLatLng = (latlng: { lat: number; lng: number }): GeoPoint => ({
  lat: latlng.lat,
  lon: latlng.lng,
});

export const createPointSelector = (store: SessionStore): PointSelector => ({
  select: (point) => {
    if (!isValidGeoPoint(point)) return;
    store.apply({ type: 'clickCaptured', point: { lat: point.lat, lon: point.lon } });
  },
});
