import { useEffect, useRef } from "react";
import { useMap } from "react-leaflet";
import L from "leaflet";

import type { SceneFitBounds } from "@/features/watershed";

// Fits once per run; a scene without fitBounds leaves the current view alone.
const FitBounds = ({ fit }: { fit: SceneFitBounds | null }) => {
  const map = useMap();
  const fittedKeyRef = useRef<string | null>(null);

  useEffect(() => {
    if (!fit || fittedKeyRef.current === fit.key) return;
    fittedKeyRef.current = fit.key;
    map.fitBounds(
      L.latLngBounds([fit.southWest.lat, fit.southWest.lon], [fit.northEast.lat, fit.northEast.lon]),
    );
  }, [fit, map]);

  return null;
};

export default FitBounds;
