import { describe, it, expect } from 'vitest';
import { geometryToSvgPaths, trackToSvgPath } from './exportUtils';
import { ZoneEvaluator } from './zoneEvaluator';

const vp = { scale: 1, offsetX: 0, offsetY: 0, height: 10 };

describe('SVG Export', () => {
    it('should draw a polygon part as a closed path in screen space', () => {
        const paths = geometryToSvgPaths([
            { exterior: [{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 2 }], holes: [] }
        ], vp);
        expect(paths).toEqual(['M 0.00 10.00 L 2.00 10.00 L 2.00 8.00 Z']);
    });

    it('should append holes as subpaths of their part', () => {
        const paths = geometryToSvgPaths([
            {
                exterior: [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }],
                holes: [[{ x: 1, y: 1 }, { x: 2, y: 1 }, { x: 2, y: 2 }]]
            }
        ], vp);
        expect(paths).toEqual(['M 0.00 10.00 L 4.00 10.00 L 4.00 6.00 Z M 1.00 9.00 L 2.00 9.00 L 2.00 8.00 Z']);
    });

    it('should emit one path per part of a composite zone', () => {
        const zh = new ZoneEvaluator('a = [(0,0),(1,0),(1,1),(0,1)]\nb = [(5,5),(7,5),(7,7),(5,7)]\nboth = a U b');
        expect(geometryToSvgPaths(zh.getGeometry('both'), vp)).toHaveLength(2);
    });

    it('should break a track path at missing frames', () => {
        const path = trackToSvgPath([
            { frame: 0, seconds: 0, point: { x: 0, y: 0 } },
            { frame: 1, seconds: 0.1, point: { x: 1, y: 0 } },
            { frame: 2, seconds: 0.2, point: null },
            { frame: 3, seconds: 0.3, point: { x: 2, y: 2 } },
            { frame: 4, seconds: 0.4, point: { x: 3, y: 2 } },
        ], vp);
        expect(path).toBe('M 0.0 10.0 L 1.0 10.0 M 2.0 8.0 L 3.0 8.0');
    });

    it('should give an empty path for a track without points', () => {
        expect(trackToSvgPath([{ frame: 0, seconds: 0, point: null }], vp)).toBe('');
        expect(trackToSvgPath([], vp)).toBe('');
    });
});
