import React from 'react';
import { Hexagon, FolderOpen, Save, Activity, Download } from 'lucide-react';

interface TopBarProps {
  sourceInputRef: React.RefObject<HTMLInputElement | null>;
  trackingInputRef: React.RefObject<HTMLInputElement | null>;
  onSave: () => void;
  onExportSvg: () => void;
  trackingName: string | null;
}

export const TopBar: React.FC<TopBarProps> = ({
  sourceInputRef,
  trackingInputRef,
  onSave,
  onExportSvg,
  trackingName,
}) => {
  const buttonClass = 'p-2 text-slate-600 hover:bg-slate-100 rounded flex items-center gap-1.5 text-sm font-semibold transition-colors';

  return (
    <div className="flex bg-white border-b border-slate-200 px-4 py-2 items-center justify-between shadow-sm z-20 shrink-0 h-14">
      <div className="flex items-center space-x-2">
        <div className="bg-blue-600 text-white p-1 rounded-lg">
          <Hexagon size={20} />
        </div>
        <h1 className="font-bold text-lg text-slate-800 tracking-tight">ZoneDraw</h1>
      </div>

      <div className="flex items-center space-x-2">
        {trackingName && <span className="text-xs text-slate-400 mr-2">Tracking: {trackingName}</span>}
        <button onClick={() => sourceInputRef.current?.click()} className={buttonClass} title="Open zone source">
          <FolderOpen size={18} /> Open
        </button>
        <button onClick={onSave} className={buttonClass} title="Save zone source">
          <Save size={18} /> Save
        </button>
        <button onClick={() => trackingInputRef.current?.click()} className={buttonClass} title="Load tracking JSON">
          <Activity size={18} /> Tracking
        </button>
        <button onClick={onExportSvg} className={buttonClass} title="Export canvas as SVG">
          <Download size={18} /> SVG
        </button>
      </div>
    </div>
  );
};
