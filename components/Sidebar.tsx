import React from 'react';
import { Circle, Hexagon, Layers } from 'lucide-react';
import { ZoneKind } from '../types';
import { ZONE_COLORS } from '../constants';
import { ZoneEvaluator } from '../utils/zoneEvaluator';

interface SidebarProps {
  evaluator: ZoneEvaluator | null;
  selectedZone: string | null;
  onSelectZone: (name: string) => void;
}

const KIND_ICON = {
  [ZoneKind.POLYGON]: Hexagon,
  [ZoneKind.CIRCLE]: Circle,
  [ZoneKind.COMPOSITE]: Layers,
};

export const Sidebar: React.FC<SidebarProps> = ({ evaluator, selectedZone, onSelectZone }) => {
  const zones = evaluator ? evaluator.listZones().map(name => evaluator.getZone(name)) : [];

  return (
    <div className="w-48 bg-white border-r border-slate-200 flex flex-col py-3 gap-1 overflow-y-auto shrink-0">
      <div className="px-3 pb-2 text-xs font-semibold uppercase tracking-wide text-slate-400">Zones</div>
      {zones.length === 0 && (
        <div className="px-3 text-sm text-slate-400">No zones defined</div>
      )}
      {zones.map(({ name, kind, line }, i) => {
        const Icon = KIND_ICON[kind];
        return (
          <button
            key={name}
            onClick={() => onSelectZone(name)}
            className={`mx-2 px-2 py-1.5 rounded-lg flex items-center gap-2 text-sm font-mono transition-all ${
              selectedZone === name
                ? 'bg-blue-600 text-white shadow-md'
                : 'text-slate-600 hover:bg-slate-100 hover:text-slate-900'
            }`}
            title={`Defined on line ${line}`}
          >
            <Icon size={16} color={selectedZone === name ? '#ffffff' : ZONE_COLORS[i % ZONE_COLORS.length]} />
            <span className="truncate">{name}</span>
          </button>
        );
      })}
    </div>
  );
};
