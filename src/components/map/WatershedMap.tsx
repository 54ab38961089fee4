import { CircleMarker, GeoJSON, LayersControl, MapContainer, TileLayer, Tooltip, useMapEvents } from "react-leaflet";
import L from "leaflet";
import "leaflet/dist/leaflet.css";

import type { GeoPoint } from "@/features/map/model/types";
import { fromLatLng, type MapScene, type ScenePointLayer } from "@/features/watershed";
import FitBounds from "./FitBounds";

interface WatershedMapProps {
  scene: MapScene;
  initialCenter: GeoPoint;
  initialZoom: number;
  onMapClick: (point: GeoPoint) => void;
}

const ClickCapture = ({ onMapClick }: { onMapClick: (point: GeoPoint) => void }) => {
  useMapEvents({
    click: (event) => onMapClick(fromLatLng(event.latlng)),
  });
  return null;
};

const PointOverlay = ({ layer }: { layer: ScenePointLayer }) => (
  <GeoJSON
    key={layer.key}
    data={layer.data}
    pointToLayer={(_feature, latlng) => L.circleMarker(latlng, layer.marker)}
    onEachFeature={(_feature, leafletLayer) => leafletLayer.bindTooltip(layer.tooltip)}
  />
);

const WatershedMap = ({ scene, initialCenter, initialZoom, onMapClick }: WatershedMapProps) => {
  const { base, watershed, streams, requestedPoint, snapPoint, selectedPoint } = scene;

  return (
    <MapContainer
      center={[initialCenter.lat, initialCenter.lon]}
      zoom={initialZoom}
      maxZoom={base.maxZoom}
      className="h-full w-full"
    >
      <TileLayer
        url={base.url}
        attribution={base.attribution}
        maxNativeZoom={base.maxNativeZoom}
        maxZoom={base.maxZoom}
        {...(base.subdomains ? { subdomains: base.subdomains } : {})}
      />
      <ClickCapture onMapClick={onMapClick} />
      <FitBounds fit={scene.fitBounds} />

      {selectedPoint && (
        <CircleMarker
          center={[selectedPoint.lat, selectedPoint.lon]}
          radius={5}
          pathOptions={{ color: "#0f172a", weight: 2, fillColor: "#ffffff", fillOpacity: 1 }}
        >
          <Tooltip>{`${selectedPoint.lat.toFixed(5)}, ${selectedPoint.lon.toFixed(5)}`}</Tooltip>
        </CircleMarker>
      )}

      <LayersControl position="topright">
        {watershed && (
          <LayersControl.Overlay checked name={watershed.name}>
            <GeoJSON
              key={watershed.key}
              data={watershed.data}
              style={() => watershed.style}
              onEachFeature={(_feature, layer) => layer.bindTooltip(watershed.tooltip)}
            />
          </LayersControl.Overlay>
        )}
        {streams && (
          <LayersControl.Overlay checked name={streams.name}>
            <GeoJSON
              key={streams.key}
              data={streams.data}
              style={() => streams.style}
              onEachFeature={(_feature, layer) => layer.bindTooltip(streams.tooltip)}
            />
          </LayersControl.Overlay>
        )}
        {requestedPoint && (
          <LayersControl.Overlay checked name={requestedPoint.name}>
            <PointOverlay layer={requestedPoint} />
          </LayersControl.Overlay>
        )}
        {snapPoint && (
          <LayersControl.Overlay checked name={snapPoint.name}>
            <PointOverlay layer={snapPoint} />
          </LayersControl.Overlay>
        )}
      </LayersControl>
    </MapContainer>
  );
};

export default WatershedMap;
