import type { Platform } from "@/platform/contracts";
import { detectElectron } from "@/platform/runtime";
import { resolveMapConfig } from "@/platform/mapConfig";
import { resolveDelineatorConfig } from "@/platform/delineatorConfig";
import { createHttpWatershedBackend } from "@/platform/web/watershedBackend";

const env = import.meta.env as Record<string, string | undefined>;
const mapConfig = resolveMapConfig(env);
const backend = createHttpWatershedBackend(resolveDelineatorConfig(env));

export const webPlatform: Platform = {
  runtime: {
    isElectron: detectElectron(),
  },
  map: {
    tileLayerUrl: () => mapConfig.tileLayerUrl,
    tileLayerAttribution: () => mapConfig.tileLayerAttribution,
    tileSubdomains: () => mapConfig.tileSubdomains,
    maxNativeZoom: () => mapConfig.maxNativeZoom,
    maxZoom: () => mapConfig.maxZoom,
    defaultCenter: () => mapConfig.defaultCenter,
    defaultZoom: () => mapConfig.defaultZoom,
  },
  delineator: backend.delineator,
  spatial: backend.spatial,
  artifacts: backend.artifacts,
};
