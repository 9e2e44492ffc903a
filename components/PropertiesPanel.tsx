import React from 'react';
import { Crosshair, Ruler, Square, Maximize } from 'lucide-react';
import { Point } from '../types';
import { ZoneEvaluator } from '../utils/zoneEvaluator';

interface PropertiesPanelProps {
  evaluator: ZoneEvaluator | null;
  selectedZone: string | null;
  probe: Point | null;
}

const fmt = (n: number) => n.toFixed(2);

export const PropertiesPanel: React.FC<PropertiesPanelProps> = ({ evaluator, selectedZone, probe }) => {
  const stats = evaluator && selectedZone && evaluator.hasZone(selectedZone)
    ? evaluator.getStats(selectedZone)
    : null;
  const hits = evaluator && probe ? evaluator.zonesContaining(probe) : [];

  return (
    <div className="flex flex-col gap-4 text-sm">
      <div>
        <h2 className="font-semibold text-slate-800 mb-2">
          {selectedZone ? <>Zone: <span className="font-mono">{selectedZone}</span></> : 'No zone selected'}
        </h2>
        {stats && (
          <dl className="grid grid-cols-[auto_1fr] gap-x-3 gap-y-1 text-slate-600">
            <dt className="flex items-center gap-1"><Square size={14} /> Area</dt>
            <dd className="font-mono">{fmt(stats.area)}</dd>
            <dt className="flex items-center gap-1"><Ruler size={14} /> Perimeter</dt>
            <dd className="font-mono">{fmt(stats.perimeter)}</dd>
            <dt className="flex items-center gap-1"><Maximize size={14} /> Bounds</dt>
            <dd className="font-mono">
              ({fmt(stats.bounds.minX)}, {fmt(stats.bounds.minY)}) – ({fmt(stats.bounds.maxX)}, {fmt(stats.bounds.maxY)})
            </dd>
          </dl>
        )}
      </div>

      <div>
        <h3 className="font-semibold text-slate-800 mb-1 flex items-center gap-1.5">
          <Crosshair size={16} /> Point probe
        </h3>
        {probe ? (
          <>
            <div className="font-mono text-slate-600">({fmt(probe.x)}, {fmt(probe.y)})</div>
            <div className="text-slate-500">
              {hits.length > 0 ? <>Inside: <span className="font-mono">{hits.join(', ')}</span></> : 'Outside every zone'}
            </div>
          </>
        ) : (
          <div className="text-slate-400">Click the canvas to test a point</div>
        )}
      </div>
    </div>
  );
};
