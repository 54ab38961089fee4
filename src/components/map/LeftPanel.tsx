import { useEffect, useState } from 'react';
import { AlertTriangle, Download, FileJson, Loader2, MapPin, RotateCcw, Waves } from 'lucide-react';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Label } from '@/components/ui/label';
import type { GeoPoint } from '@/features/map/model/types';
import {
  describeDelineationError,
  parseKnownAreaInput,
  type DelineationError,
  type LayerError,
  type RunParameters,
  type RunStatus,
} from '@/features/watershed';

interface LeftPanelProps {
  parameters: RunParameters;
  selectedPoint: GeoPoint | null;
  status: RunStatus;
  hasRun: boolean;
  layerErrors: readonly LayerError[];
  warnings: readonly string[];
  lastFailure: DelineationError | null;
  coordPrecision: number;
  onParametersChange: (parameters: Partial<RunParameters>) => void;
  onDelineate: () => void;
  onReset: () => void;
  onDownloadRaw: () => void;
  onDownloadGeoJson: () => void;
}

const formatArea = (value: number | null): string => (value === null ? '' : String(value));

const LeftPanel = ({
  parameters,
  selectedPoint,
  status,
  hasRun,
  layerErrors,
  warnings,
  lastFailure,
  coordPrecision,
  onParametersChange,
  onDelineate,
  onReset,
  onDownloadRaw,
  onDownloadGeoJson,
}: LeftPanelProps) => {
  // Free text while typing; only the parsed value goes into the session.
  const [areaText, setAreaText] = useState(() => formatArea(parameters.knownAreaKm2));

  useEffect(() => {
    if (parameters.knownAreaKm2 === null) {
      setAreaText((prev) => (parseKnownAreaInput(prev) === null ? prev : ''));
    }
  }, [parameters.knownAreaKm2]);

  const isRunning = status === 'running';
  const canDelineate = selectedPoint !== null && !isRunning;
  const notices = [...layerErrors.map((entry) => entry.message), ...warnings];

  return (
    <div className="w-72 bg-sidebar border-r border-sidebar-border flex flex-col text-[13px]">
      <div className="panel-header">
        <Waves className="w-4 h-4 inline mr-2" />
        Parameters
      </div>
      <div className="p-3 space-y-3">
        <div className="space-y-1.5">
          <Label htmlFor="watershed-id">Watershed ID</Label>
          <Input
            id="watershed-id"
            value={parameters.watershedId}
            onChange={(event) => onParametersChange({ watershedId: event.target.value })}
          />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="known-area">Known upstream area (km²)</Label>
          <Input
            id="known-area"
            inputMode="decimal"
            placeholder="leave blank if unknown"
            value={areaText}
            onChange={(event) => {
              setAreaText(event.target.value);
              onParametersChange({ knownAreaKm2: parseKnownAreaInput(event.target.value) });
            }}
          />
        </div>
      </div>

      <div className="border-t border-sidebar-border" />

      <div className="p-3 space-y-2">
        <div className="flex items-center gap-2 text-muted-foreground">
          <MapPin className="w-3.5 h-3.5" />
          {selectedPoint ? (
            <span className="font-mono text-foreground">
              {`lat=${selectedPoint.lat.toFixed(coordPrecision)}, lon=${selectedPoint.lon.toFixed(coordPrecision)}`}
            </span>
          ) : (
            <span>Click on the map to pick an outlet</span>
          )}
        </div>
        <Button className="w-full" disabled={!canDelineate} onClick={onDelineate}>
          {isRunning ? <Loader2 className="animate-spin" /> : null}
          {isRunning ? 'Running delineator…' : 'Delineate'}
        </Button>
        <Button variant="outline" className="w-full" onClick={onReset}>
          <RotateCcw />
          Reset session
        </Button>
      </div>

      <div className="border-t border-sidebar-border" />

      <div className="panel-header">Downloads</div>
      <div className="p-3 space-y-2">
        <Button variant="secondary" className="w-full" disabled={!hasRun || isRunning} onClick={onDownloadRaw}>
          <Download />
          Download GeoPackage
        </Button>
        <Button variant="secondary" className="w-full" disabled={!hasRun || isRunning} onClick={onDownloadGeoJson}>
          <FileJson />
          Download GeoJSON
        </Button>
      </div>

      {(lastFailure || notices.length > 0) && <div className="border-t border-sidebar-border" />}

      {lastFailure && (
        <div role="alert" className="m-3 p-2 rounded bg-destructive/10 text-destructive">
          {describeDelineationError(lastFailure)}
        </div>
      )}

      {notices.length > 0 && (
        <ul aria-label="Warnings" className="p-3 space-y-1">
          {notices.map((notice) => (
            <li key={notice} className="flex items-start gap-2 text-amber-700">
              <AlertTriangle className="w-3.5 h-3.5 mt-0.5 shrink-0" />
              <span>{notice}</span>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default LeftPanel;
