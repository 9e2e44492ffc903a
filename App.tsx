import React, { useState, useRef, useEffect, useMemo, useCallback, useLayoutEffect } from 'react';
import { Point, TrackingData, TrackSample } from './types';
import { DEFAULT_GRID, EDITOR_CIRCLE_RESOLUTION, SAMPLE_ZONE_SOURCE } from './constants';
import { TopBar } from './components/TopBar';
import { Sidebar } from './components/Sidebar';
import { ZoneEditor } from './components/ZoneEditor';
import { ZoneCanvas } from './components/ZoneCanvas';
import { PropertiesPanel } from './components/PropertiesPanel';
import { OccupancyPanel, TrackSelection } from './components/OccupancyPanel';
import { ZoneEvaluator } from './utils/zoneEvaluator';
import { ZoneError } from './utils/zoneErrors';
import { exportSvg, readTextFile, saveZoneSource } from './utils/exportUtils';
import { extractTrack, filterByConfidence, parseTrackingJson, summarizeTracking } from './utils/trackingUtils';

const buildEvaluator = (source: string): { evaluator: ZoneEvaluator } | { error: string } => {
  try {
    return { evaluator: new ZoneEvaluator(source, { circleResolution: EDITOR_CIRCLE_RESOLUTION }) };
  } catch (err) {
    if (err instanceof ZoneError) {
      console.warn('[ZoneEvaluator]', err.message);
      return { error: `${err.name}: ${err.message}` };
    }
    throw err;
  }
};

export default function App() {
  const [source, setSource] = useState(SAMPLE_ZONE_SOURCE);
  const [evaluator, setEvaluator] = useState<ZoneEvaluator | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [selectedZone, setSelectedZone] = useState<string | null>(null);
  const [probe, setProbe] = useState<Point | null>(null);

  const [tracking, setTracking] = useState<TrackingData | null>(null);
  const [trackingName, setTrackingName] = useState<string | null>(null);
  const [selection, setSelection] = useState<TrackSelection>({ animal: 0, bodypart: 0, threshold: 0.5 });

  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });
  const canvasContainerRef = useRef<HTMLDivElement>(null);
  const svgRef = useRef<SVGSVGElement>(null);
  const sourceInputRef = useRef<HTMLInputElement>(null);
  const trackingInputRef = useRef<HTMLInputElement>(null);

  const updateZones = useCallback((text: string) => {
    const result = buildEvaluator(text);
    if ('error' in result) {
      // Keep showing the last good zones alongside the error
      setError(result.error);
      return;
    }
    const next = result.evaluator;
    setEvaluator(next);
    setError(null);
    setSelectedZone(prev => (prev && next.hasZone(prev) ? prev : next.listZones()[0] ?? null));
  }, []);

  useEffect(() => {
    updateZones(SAMPLE_ZONE_SOURCE);
  }, [updateZones]);

  useLayoutEffect(() => {
    const measure = () => {
      const el = canvasContainerRef.current;
      if (!el) return;
      setCanvasSize({ width: Math.max(200, el.clientWidth), height: Math.max(200, el.clientHeight) });
    };
    measure();
    window.addEventListener('resize', measure);
    return () => window.removeEventListener('resize', measure);
  }, []);

  const summary = useMemo(() => (tracking ? summarizeTracking(tracking) : null), [tracking]);

  const track = useMemo<TrackSample[]>(() => {
    if (!tracking || !summary) return [];
    const filtered = filterByConfidence(tracking, { maxAnimals: summary.numAnimals, threshold: selection.threshold });
    return extractTrack(filtered, selection.animal, selection.bodypart);
  }, [tracking, summary, selection]);

  const handleSourceFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    e.target.value = '';
    if (!file) return;
    try {
      const text = await readTextFile(file);
      setSource(text);
      updateZones(text);
    } catch (err) {
      console.error('[App] Failed to open zone source:', err);
      setError(err instanceof Error ? err.message : String(err));
    }
  };

  const handleTrackingFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    e.target.value = '';
    if (!file) return;
    try {
      const data = parseTrackingJson(await readTextFile(file));
      setTracking(data);
      setTrackingName(file.name);
      setSelection(s => ({ ...s, animal: 0, bodypart: 0 }));
    } catch (err) {
      console.error('[App] Failed to load tracking data:', err);
      setError(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    }
  };

  const handleExportSvg = () => {
    if (svgRef.current) exportSvg(svgRef.current, 'zones');
  };

  return (
    <div className="flex flex-col h-screen w-screen overflow-hidden bg-slate-50 text-slate-900">
      <TopBar
        sourceInputRef={sourceInputRef}
        trackingInputRef={trackingInputRef}
        onSave={() => saveZoneSource(source, 'zones')}
        onExportSvg={handleExportSvg}
        trackingName={trackingName}
      />
      <input ref={sourceInputRef} type="file" accept=".zones,.txt" className="hidden" onChange={(e) => { void handleSourceFile(e); }} />
      <input ref={trackingInputRef} type="file" accept=".json,application/json" className="hidden" onChange={(e) => { void handleTrackingFile(e); }} />

      <div className="flex flex-1 min-h-0">
        <Sidebar evaluator={evaluator} selectedZone={selectedZone} onSelectZone={setSelectedZone} />

        <div className="w-[28rem] shrink-0 border-r border-slate-200 bg-white p-4 overflow-y-auto">
          <ZoneEditor
            source={source}
            onSourceChange={setSource}
            onUpdate={() => updateZones(source)}
            onClear={() => setSource('')}
            error={error}
            onDismissError={() => setError(null)}
          />
        </div>

        <div ref={canvasContainerRef} className="flex-1 min-w-0 p-4">
          <ZoneCanvas
            evaluator={evaluator}
            selectedZone={selectedZone}
            onSelectZone={setSelectedZone}
            probe={probe}
            onProbe={setProbe}
            track={track}
            grid={DEFAULT_GRID}
            width={canvasSize.width - 32}
            height={canvasSize.height - 32}
            svgRef={svgRef}
          />
        </div>

        <div className="w-72 shrink-0 border-l border-slate-200 bg-white p-4 overflow-y-auto flex flex-col gap-6">
          <PropertiesPanel evaluator={evaluator} selectedZone={selectedZone} probe={probe} />
          <OccupancyPanel
            evaluator={evaluator}
            tracking={tracking}
            summary={summary}
            track={track}
            selection={selection}
            setSelection={setSelection}
          />
        </div>
      </div>
    </div>
  );
}
