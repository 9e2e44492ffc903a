import React, { useMemo } from 'react';
import { Bounds, GridConfig } from '../types';
import { Viewport, worldToScreen } from '../utils/mathUtils';

interface AxisLayerProps {
  config: GridConfig;
  bounds: Bounds;
  viewport: Viewport;
  width: number;
  height: number;
}

// 1, 2 or 5 times a power of ten
const niceStep = (raw: number): number => {
  if (!(raw > 0)) return 1;
  const exp = Math.pow(10, Math.floor(Math.log10(raw)));
  const f = raw / exp;
  if (f <= 1) return exp;
  if (f <= 2) return 2 * exp;
  if (f <= 5) return 5 * exp;
  return 10 * exp;
};

export const AxisLayer: React.FC<AxisLayerProps> = ({ config, bounds, viewport, width, height }) => {
  const { ticks, color, visible } = config;

  const marks = useMemo(() => {
    const span = Math.max(bounds.maxX - bounds.minX, bounds.maxY - bounds.minY);
    const step = niceStep(span / (ticks || 10));
    const xs: number[] = [];
    const ys: number[] = [];
    for (let x = Math.ceil(bounds.minX / step) * step; x <= bounds.maxX; x += step) xs.push(x);
    for (let y = Math.ceil(bounds.minY / step) * step; y <= bounds.maxY; y += step) ys.push(y);
    return { xs, ys, step };
  }, [bounds, ticks]);

  if (!visible) return null;

  return (
    <g className="axis-layer pointer-events-none select-none">
      {marks.xs.map(x => {
        const sx = worldToScreen({ x, y: 0 }, viewport).x;
        return (
          <React.Fragment key={`gx${x}`}>
            <line x1={sx} y1={0} x2={sx} y2={height} stroke="#e5e7eb" strokeWidth={1} />
            <text x={sx + 2} y={height - 4} fill={color} fontSize="10" fontFamily="monospace">{+x.toFixed(6)}</text>
          </React.Fragment>
        );
      })}
      {marks.ys.map(y => {
        const sy = worldToScreen({ x: 0, y }, viewport).y;
        return (
          <React.Fragment key={`gy${y}`}>
            <line x1={0} y1={sy} x2={width} y2={sy} stroke="#e5e7eb" strokeWidth={1} />
            <text x={4} y={sy - 2} fill={color} fontSize="10" fontFamily="monospace">{+y.toFixed(6)}</text>
          </React.Fragment>
        );
      })}
    </g>
  );
};
