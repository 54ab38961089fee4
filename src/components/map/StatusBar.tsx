import type { GeoPoint } from "@/features/map/model/types";
import type { RunStatus, Viewport } from "@/features/watershed";

interface StatusBarProps {
  selectedPoint: GeoPoint | null;
  status: RunStatus;
  artifactPath: string | null;
  viewport: Viewport | null;
  coordPrecision: number;
}

const statusNames: Record<RunStatus, string> = {
  idle: 'Idle',
  running: 'Delineating…',
  loaded: 'Loaded',
};

const formatPoint = (point: GeoPoint, precision: number): string =>
  `${point.lat.toFixed(precision)}°, ${point.lon.toFixed(precision)}°`;

const StatusBar = ({ selectedPoint, status, artifactPath, viewport, coordPrecision }: StatusBarProps) => {
  return (
    <div className="h-7 bg-card border-t border-border flex items-center px-3 gap-6 text-xs">
      <div className="flex items-center gap-2">
        <span className="text-muted-foreground">Point:</span>
        <span className="font-mono text-foreground">
          {selectedPoint ? formatPoint(selectedPoint, coordPrecision) : '—'}
        </span>
      </div>

      {viewport && (
        <div className="flex items-center gap-2">
          <span className="text-muted-foreground">Center:</span>
          <span className="font-mono text-foreground">{formatPoint(viewport.center, coordPrecision)}</span>
        </div>
      )}

      <div className="flex-1" />

      {artifactPath && (
        <div className="flex items-center gap-2 min-w-0">
          <span className="text-muted-foreground">Output:</span>
          <span className="font-mono text-foreground truncate">{artifactPath}</span>
        </div>
      )}

      <div className="flex items-center gap-2">
        <span className="text-muted-foreground">Status:</span>
        <span className="text-primary font-medium">{statusNames[status]}</span>
      </div>
    </div>
  );
};

export default StatusBar;
