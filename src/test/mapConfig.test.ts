import { describe, expect, it } from 'vitest';
import { resolveMapConfig } from '@/platform/mapConfig';

describe('map config provider resolution', () => {
  it('uses OSM config by default', () => {
    const config = resolveMapConfig({});
    expect(config.provider).toBe('osm');
    expect(config.tileLayerUrl).toContain('tile.openstreetmap.org');
    expect(config.maxNativeZoom).toBe(19);
    expect(config.defaultCenter).toEqual({ lat: 4.6, lon: -74.1 });
    expect(config.defaultZoom).toBe(9);
  });

  it('switches to OpenTopoMap when requested', () => {
    const config = resolveMapConfig({ VITE_MAP_PROVIDER: ' OpenTopoMap ' });
    expect(config.provider).toBe('opentopomap');
    expect(config.tileLayerUrl).toContain('tile.opentopomap.org');
    expect(config.maxZoom).toBe(17);
  });

  it('accepts a default view from env', () => {
    const config = resolveMapConfig({
      VITE_MAP_DEFAULT_LAT: '-33.9',
      VITE_MAP_DEFAULT_LON: '151.2',
      VITE_MAP_DEFAULT_ZOOM: '11.7',
    });
    expect(config.defaultCenter).toEqual({ lat: -33.9, lon: 151.2 });
    expect(config.defaultZoom).toBe(11);
  });

  it('falls back to defaults for empty/invalid env values', () => {
    const config = resolveMapConfig({
      VITE_MAP_DEFAULT_LAT: '95',
      VITE_MAP_DEFAULT_LON: 'west',
      VITE_MAP_DEFAULT_ZOOM: '',
    });
    expect(config.defaultCenter).toEqual({ lat: 4.6, lon: -74.1 });
    expect(config.defaultZoom).toBe(9);
  });
});
