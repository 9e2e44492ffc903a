import React, { useMemo } from 'react';
import { Activity } from 'lucide-react';
import { TrackingData, TrackingSummary, TrackSample } from '../types';
import { ZoneEvaluator } from '../utils/zoneEvaluator';
import { computeOccupancy } from '../utils/trackingUtils';

export interface TrackSelection {
  animal: number;
  bodypart: number;
  threshold: number;
}

interface OccupancyPanelProps {
  evaluator: ZoneEvaluator | null;
  tracking: TrackingData | null;
  summary: TrackingSummary | null;
  track: TrackSample[];
  selection: TrackSelection;
  setSelection: React.Dispatch<React.SetStateAction<TrackSelection>>;
}

export const OccupancyPanel: React.FC<OccupancyPanelProps> = ({
  evaluator,
  tracking,
  summary,
  track,
  selection,
  setSelection,
}) => {
  const occupancy = useMemo(
    () => (evaluator && tracking ? computeOccupancy(evaluator, track, tracking.fps) : []),
    [evaluator, tracking, track]
  );

  if (!tracking || !summary) {
    return (
      <div className="text-sm text-slate-400 flex items-center gap-1.5">
        <Activity size={16} /> Load tracking data to measure zone occupancy
      </div>
    );
  }

  const range = (n: number) => Array.from({ length: n }, (_, i) => i);

  return (
    <div className="flex flex-col gap-3 text-sm">
      <h3 className="font-semibold text-slate-800 flex items-center gap-1.5">
        <Activity size={16} /> Zone occupancy
      </h3>
      <div className="text-xs text-slate-500">
        {summary.numFrames} frames · {summary.numAnimals} animals · {summary.numBodyparts} bodyparts · {tracking.fps} fps
      </div>

      <div className="grid grid-cols-2 gap-2">
        <label className="flex flex-col gap-1 text-xs text-slate-500">
          Animal
          <select
            value={selection.animal}
            onChange={(e) => setSelection(s => ({ ...s, animal: Number(e.target.value) }))}
            className="border border-slate-300 rounded px-1 py-0.5 text-slate-700"
          >
            {range(summary.numAnimals).map(i => <option key={i} value={i}>Animal {i + 1}</option>)}
          </select>
        </label>
        <label className="flex flex-col gap-1 text-xs text-slate-500">
          Bodypart
          <select
            value={selection.bodypart}
            onChange={(e) => setSelection(s => ({ ...s, bodypart: Number(e.target.value) }))}
            className="border border-slate-300 rounded px-1 py-0.5 text-slate-700"
          >
            {range(summary.numBodyparts).map(i => <option key={i} value={i}>Bodypart {i}</option>)}
          </select>
        </label>
      </div>

      <label className="flex flex-col gap-1 text-xs text-slate-500">
        Confidence threshold: <span className="font-mono">{selection.threshold.toFixed(2)}</span>
        <input
          type="range"
          min={0}
          max={1}
          step={0.05}
          value={selection.threshold}
          onChange={(e) => setSelection(s => ({ ...s, threshold: Number(e.target.value) }))}
        />
      </label>

      <table className="w-full text-xs">
        <thead>
          <tr className="text-left text-slate-400">
            <th className="font-medium">Zone</th>
            <th className="font-medium text-right">Time (s)</th>
            <th className="font-medium text-right">Entries</th>
            <th className="font-medium text-right">Share</th>
          </tr>
        </thead>
        <tbody>
          {occupancy.map(o => (
            <tr key={o.zone} className="border-t border-slate-100 text-slate-600">
              <td className="font-mono py-0.5">{o.zone}</td>
              <td className="font-mono text-right">{o.seconds.toFixed(2)}</td>
              <td className="font-mono text-right">{o.entries}</td>
              <td className="font-mono text-right">{(o.fraction * 100).toFixed(1)}%</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
