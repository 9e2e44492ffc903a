import { Ring, TrackSample, ZoneGeometry } from '../types';
import { Viewport, worldToScreen } from './mathUtils';

const ringToPath = (ring: Ring, vp: Viewport): string => {
    if (ring.length === 0) return '';
    return ring.map((p, i) => {
        const s = worldToScreen(p, vp);
        return `${i === 0 ? 'M' : 'L'} ${s.x.toFixed(2)} ${s.y.toFixed(2)}`;
    }).join(' ') + ' Z';
};

/**
 * One SVG path per polygon part, holes included as extra subpaths.
 * Draw with fill-rule="evenodd" so the holes stay empty.
 */
export const geometryToSvgPaths = (geometry: ZoneGeometry, vp: Viewport): string[] =>
    geometry.map(part => [part.exterior, ...part.holes].map(r => ringToPath(r, vp)).join(' '));

/** Polyline through a track; each run after a missing frame starts a new subpath. */
export const trackToSvgPath = (track: TrackSample[], vp: Viewport): string => {
    const segments: string[] = [];
    let penDown = false;
    for (const sample of track) {
        if (!sample.point) {
            penDown = false;
            continue;
        }
        const s = worldToScreen(sample.point, vp);
        segments.push(`${penDown ? 'L' : 'M'} ${s.x.toFixed(1)} ${s.y.toFixed(1)}`);
        penDown = true;
    }
    return segments.join(' ');
};

const triggerDownload = (blob: Blob, filename: string) => {
    const url = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.href = url;
    link.download = filename;
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(url);
};

export const exportSvg = (svgElement: SVGSVGElement, filename: string) => {
    const serializer = new XMLSerializer();
    let source = serializer.serializeToString(svgElement);
    if (!source.match(/^<svg[^>]+xmlns="http:\/\/www\.w3\.org\/2000\/svg"/)) {
        source = source.replace(/^<svg/, '<svg xmlns="http://www.w3.org/2000/svg"');
    }
    triggerDownload(new Blob([source], { type: 'image/svg+xml;charset=utf-8' }), `${filename}.svg`);
};

/** Zones are saved as their source text, nothing else. */
export const saveZoneSource = (source: string, filename: string) => {
    triggerDownload(new Blob([source], { type: 'text/plain;charset=utf-8' }), `${filename}.zones`);
};

export const readTextFile = (file: File): Promise<string> => {
    return new Promise((resolve, reject) => {
        const reader = new FileReader();
        reader.onload = (e) => {
            const result = e.target?.result;
            if (typeof result === 'string') resolve(result);
            else reject(new Error(`Could not read ${file.name} as text`));
        };
        reader.onerror = () => reject(reader.error ?? new Error(`Could not read ${file.name}`));
        reader.readAsText(file);
    });
};
