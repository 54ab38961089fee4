/// <reference types="vite/client" />

import type { FeatureCollection } from "geojson";

declare global {
	interface Window {
		electronAPI?: {
			watershed: {
				delineatePoint: (request: {
					lat: number;
					lon: number;
					watershedId: string;
					knownAreaKm2: number | null;
				}) => Promise<string>;
				exists: (path: string) => Promise<boolean>;
				listLayers: (path: string) => Promise<string[]>;
				readLayer: (path: string, layerName: string | null) => Promise<FeatureCollection | null>;
				readBytes: (path: string) => Promise<Uint8Array | null>;
			};
		};
	}
}

export {};
