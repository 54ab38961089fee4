import { useCallback } from "react";
import LeftPanel from "@/components/map/LeftPanel";
import StatusBar from "@/components/map/StatusBar";
import WatershedMap from "@/components/map/WatershedMap";
import { useWatershedSession } from "@/hooks/useWatershedSession";
import { saveExportedFile } from "@/lib/download";
import { platform } from "@/platform";

const COORD_PRECISION = 5;

const WatershedWorkspace = () => {
  const { state, scene, selectPoint, updateParameters, delineate, reset, downloadRaw, downloadGeoJson } =
    useWatershedSession({ platform, saveFile: saveExportedFile });
  const run = scene.busy ? null : state.run;

  const handleDelineate = useCallback(() => {
    void delineate();
  }, [delineate]);

  const handleDownloadRaw = useCallback(() => {
    void downloadRaw();
  }, [downloadRaw]);

  return (
    <div className="h-screen flex flex-col bg-background text-foreground">
      <header className="h-11 border-b border-border flex items-center px-4 font-semibold">
        Click on the map to delineate a watershed
      </header>
      <div className="flex-1 flex min-h-0">
        <LeftPanel
          parameters={state.parameters}
          selectedPoint={state.lastClick}
          status={scene.status}
          hasRun={state.run !== null}
          layerErrors={run?.layerErrors ?? []}
          warnings={run?.warnings ?? []}
          lastFailure={state.lastFailure}
          coordPrecision={COORD_PRECISION}
          onParametersChange={updateParameters}
          onDelineate={handleDelineate}
          onReset={reset}
          onDownloadRaw={handleDownloadRaw}
          onDownloadGeoJson={downloadGeoJson}
        />
        <main className="flex-1 relative">
          <WatershedMap
            scene={scene}
            initialCenter={platform.map.defaultCenter()}
            initialZoom={platform.map.defaultZoom()}
            onMapClick={selectPoint}
          />
        </main>
      </div>
      <StatusBar
        selectedPoint={state.lastClick}
        status={scene.status}
        artifactPath={run?.artifactPath ?? null}
        viewport={run?.viewport ?? null}
        coordPrecision={COORD_PRECISION}
      />
    </div>
  );
};

export default WatershedWorkspace;
