import React from 'react';
import { AlertTriangle, Play, Eraser, X } from 'lucide-react';
import { OPERATOR_CONFIG } from '../constants';

interface ZoneEditorProps {
  source: string;
  onSourceChange: (source: string) => void;
  onUpdate: () => void;
  onClear: () => void;
  error: string | null;
  onDismissError: () => void;
}

export const ZoneEditor: React.FC<ZoneEditorProps> = ({
  source,
  onSourceChange,
  onUpdate,
  onClear,
  error,
  onDismissError,
}) => {
  return (
    <div className="flex flex-col gap-3">
      <div>
        <h2 className="font-semibold text-slate-800">Zone Definition</h2>
        <p className="text-xs text-slate-500">
          Polygons <code>[(x,y), ...]</code>, circles <code>(cx, cy, r)</code>, and set operations on two zones.
        </p>
      </div>

      <textarea
        value={source}
        onChange={(e) => onSourceChange(e.target.value)}
        onKeyDown={(e) => {
          if (e.key === 'Enter' && (e.ctrlKey || e.metaKey)) {
            e.preventDefault();
            onUpdate();
          }
        }}
        spellCheck={false}
        className="w-full h-72 p-2 font-mono text-xs border border-slate-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 resize-y"
      />

      <div className="flex items-center gap-2">
        <button
          onClick={onUpdate}
          className="px-3 py-1.5 bg-blue-600 text-white rounded-lg flex items-center gap-1.5 text-sm font-semibold hover:bg-blue-700 transition-colors"
          title="Update zones (Ctrl+Enter)"
        >
          <Play size={16} /> Update Zones
        </button>
        <button
          onClick={onClear}
          className="px-3 py-1.5 text-slate-600 hover:bg-slate-100 rounded-lg flex items-center gap-1.5 text-sm font-semibold transition-colors"
        >
          <Eraser size={16} /> Clear
        </button>
      </div>

      <div className="grid grid-cols-2 gap-1">
        {OPERATOR_CONFIG.map(op => (
          <div key={op.id} className="flex items-center gap-1.5 text-xs text-slate-500" title={op.label}>
            <op.icon size={14} />
            <code className="font-mono">{op.example}</code>
          </div>
        ))}
      </div>

      {error && (
        <div className="relative p-3 pr-8 bg-red-50 border border-red-200 text-red-700 rounded-lg text-sm flex gap-2" role="alert">
          <AlertTriangle size={18} className="shrink-0" />
          <span className="font-mono whitespace-pre-wrap">{error}</span>
          <button onClick={onDismissError} className="absolute top-2 right-2 text-red-400 hover:text-red-700" title="Dismiss">
            <X size={16} />
          </button>
        </div>
      )}
    </div>
  );
};
