import type { ArtifactStoreBridge } from '@/platform/contracts';
import { normalizeWatershedId } from './parameters';
import type { SessionStore } from './sessionStore';

export type ExportedFile<T> = {
  filename: string;
  mimeType: string;
  data: T;
};

export type ArtifactExporter = {
  exportRaw: () => Promise<ExportedFile<Uint8Array> | null>;
  exportPrimaryAsGeoJSON: () => ExportedFile<string> | null;
};

export const GEOPACKAGE_MIME_TYPE = 'application/geopackage+sqlite3';
export const GEOJSON_MIME_TYPE = 'application/geo+json';

export const safeFilename = (value: string): string => {
  const trimmed = value.trim() || 'watershed';
  // Windows-safe: remove <>:"/\|?* and ASCII control chars, collapse whitespace.
  const withoutControls = Array.from(trimmed)
    .filter((ch) => ch.charCodeAt(0) >= 32)
    .join('');
  const cleaned = withoutControls
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned || 'watershed';
};

export const artifactExtension = (path: string): string => {
  const name = path.replace(/\\/g, '/').split('/').pop() ?? '';
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) return '.gpkg';
  return name.slice(dot).toLowerCase();
};

export const createArtifactExporter = (deps: {
  store: SessionStore;
  artifacts: Pick<ArtifactStoreBridge, 'readBytes'>;
}): ArtifactExporter => {
  const { store, artifacts } = deps;
  const baseName = () => safeFilename(normalizeWatershedId(store.get().parameters.watershedId));

  return {
    exportRaw: async () => {
      const run = store.get().run;
      if (!run) return null;

      let bytes: Uint8Array | null;
      try {
        bytes = await artifacts.readBytes(run.artifactPath);
      } catch {
        // Absence is the only failure the exporter reports.
        return null;
      }
      if (!bytes) return null;

      return {
        filename: `${baseName()}${artifactExtension(run.artifactPath)}`,
        mimeType: GEOPACKAGE_MIME_TYPE,
        data: bytes,
      };
    },
    exportPrimaryAsGeoJSON: () => {
      const run = store.get().run;
      if (!run) return null;
      return {
        filename: `${baseName()}.geojson`,
        mimeType: GEOJSON_MIME_TYPE,
        data: JSON.stringify(run.primaryLayer),
      };
    },
  };
};
