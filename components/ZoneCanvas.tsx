import React, { useMemo } from 'react';
import { GridConfig, Point, TrackSample } from '../types';
import { ZONE_COLORS } from '../constants';
import { ZoneEvaluator } from '../utils/zoneEvaluator';
import { fitViewport, screenToWorld, worldToScreen } from '../utils/mathUtils';
import { trackToSvgPath } from '../utils/exportUtils';
import { AxisLayer } from './AxisLayer';
import { ZoneRenderer } from './ZoneRenderer';

interface ZoneCanvasProps {
  evaluator: ZoneEvaluator | null;
  selectedZone: string | null;
  onSelectZone: (name: string) => void;
  probe: Point | null;
  onProbe: (p: Point) => void;
  track: TrackSample[];
  grid: GridConfig;
  width: number;
  height: number;
  svgRef: React.RefObject<SVGSVGElement | null>;
}

export const ZoneCanvas: React.FC<ZoneCanvasProps> = ({
  evaluator,
  selectedZone,
  onSelectZone,
  probe,
  onProbe,
  track,
  grid,
  width,
  height,
  svgRef,
}) => {
  const bounds = useMemo(
    () => evaluator?.totalBounds() ?? { minX: 0, minY: 0, maxX: 100, maxY: 100 },
    [evaluator]
  );
  const viewport = useMemo(() => fitViewport(bounds, width, height), [bounds, width, height]);

  // Selected zone is drawn last so it stays on top
  const order = useMemo(() => {
    const names = evaluator?.listZones() ?? [];
    return selectedZone ? [...names.filter(n => n !== selectedZone), selectedZone] : names;
  }, [evaluator, selectedZone]);

  const colorOf = (name: string) => {
    const idx = evaluator ? evaluator.listZones().indexOf(name) : 0;
    return ZONE_COLORS[idx % ZONE_COLORS.length];
  };

  const handleClick = (e: React.MouseEvent<SVGSVGElement>) => {
    const rect = e.currentTarget.getBoundingClientRect();
    onProbe(screenToWorld({ x: e.clientX - rect.left, y: e.clientY - rect.top }, viewport));
  };

  const trackPath = trackToSvgPath(track, viewport);

  const probeScreen = probe ? worldToScreen(probe, viewport) : null;

  return (
    <svg
      ref={svgRef}
      width={width}
      height={height}
      className="bg-white rounded-lg border border-slate-200 shadow-sm"
      onClick={handleClick}
    >
      <AxisLayer config={grid} bounds={bounds} viewport={viewport} width={width} height={height} />

      {evaluator && order.map(name => (
        <ZoneRenderer
          key={name}
          name={name}
          geometry={evaluator.getGeometry(name)}
          viewport={viewport}
          color={colorOf(name)}
          isSelected={name === selectedZone}
          onSelect={onSelectZone}
        />
      ))}

      {trackPath && (
        <path d={trackPath} fill="none" stroke="#0f172a" strokeWidth={1} opacity={0.6} className="pointer-events-none" />
      )}

      {probeScreen && (
        <g className="pointer-events-none">
          <circle cx={probeScreen.x} cy={probeScreen.y} r={5} fill="#ef4444" stroke="#ffffff" strokeWidth={2} />
        </g>
      )}
    </svg>
  );
};
