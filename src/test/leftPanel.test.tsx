import type { ComponentProps } from 'react';
import { fireEvent, render, screen } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';
import LeftPanel from '@/components/map/LeftPanel';
import type { RunParameters } from '@/features/watershed';

const defaults: RunParameters = { watershedId: 'custom', knownAreaKm2: null };

const renderPanel = (overrides: Partial<ComponentProps<typeof LeftPanel>> = {}) => {
  const props: ComponentProps<typeof LeftPanel> = {
    parameters: defaults,
    selectedPoint: null,
    status: 'idle',
    hasRun: false,
    layerErrors: [],
    warnings: [],
    lastFailure: null,
    coordPrecision: 5,
    onParametersChange: vi.fn(),
    onDelineate: vi.fn(),
    onReset: vi.fn(),
    onDownloadRaw: vi.fn(),
    onDownloadGeoJson: vi.fn(),
    ...overrides,
  };
  render(<LeftPanel {...props} />);
  return props;
};

describe('LeftPanel', () => {
  it('disables delineation until a point is selected', () => {
    renderPanel();
    expect(screen.getByRole('button', { name: 'Delineate' })).toBeDisabled();
    expect(screen.getByText('Click on the map to pick an outlet')).toBeInTheDocument();
    expect(screen.getByRole('button', { name: /Download GeoPackage/ })).toBeDisabled();
  });

  it('starts a delineation for the selected point', () => {
    const props = renderPanel({ selectedPoint: { lat: 4.65, lon: -74.05 } });
    expect(screen.getByText('lat=4.65000, lon=-74.05000')).toBeInTheDocument();

    fireEvent.click(screen.getByRole('button', { name: 'Delineate' }));
    expect(props.onDelineate).toHaveBeenCalledTimes(1);
  });

  it('shows an in-progress state while running', () => {
    renderPanel({ selectedPoint: { lat: 4.65, lon: -74.05 }, status: 'running', hasRun: true });
    expect(screen.getByRole('button', { name: 'Running delineator…' })).toBeDisabled();
    expect(screen.getByRole('button', { name: /Download GeoJSON/ })).toBeDisabled();
  });

  it('reports parameter edits', () => {
    const props = renderPanel();
    fireEvent.change(screen.getByLabelText('Watershed ID'), { target: { value: 'river1' } });
    fireEvent.change(screen.getByLabelText('Known upstream area (km²)'), { target: { value: '12,5' } });

    expect(props.onParametersChange).toHaveBeenNthCalledWith(1, { watershedId: 'river1' });
    expect(props.onParametersChange).toHaveBeenNthCalledWith(2, { knownAreaKm2: 12.5 });
  });

  it('lists layer warnings and the last failure', () => {
    renderPanel({
      hasRun: true,
      layerErrors: [{ layer: 'snapPoint', message: 'Snap point layer not found (snap_point): missing' }],
      warnings: ['Watershed has invalid bounds: [NaN, 1, 2, 3]'],
      lastFailure: { kind: 'MissingArtifact', path: '/tmp/out.gpkg' },
    });

    expect(screen.getByText('Snap point layer not found (snap_point): missing')).toBeInTheDocument();
    expect(screen.getByText('Watershed has invalid bounds: [NaN, 1, 2, 3]')).toBeInTheDocument();
    expect(screen.getByRole('alert')).toHaveTextContent('Output file was not created: /tmp/out.gpkg');
  });

  it('wires reset and downloads', () => {
    const props = renderPanel({ hasRun: true });
    fireEvent.click(screen.getByRole('button', { name: /Reset session/ }));
    fireEvent.click(screen.getByRole('button', { name: /Download GeoPackage/ }));
    fireEvent.click(screen.getByRole('button', { name: /Download GeoJSON/ }));

    expect(props.onReset).toHaveBeenCalledTimes(1);
    expect(props.onDownloadRaw).toHaveBeenCalledTimes(1);
    expect(props.onDownloadGeoJson).toHaveBeenCalledTimes(1);
  });
});
