import { describe, it, expect } from 'vitest';
import {
    circleToRing, fitViewport, isPointInRing, isPointOnRing, isSimpleRing, normalizeRing,
    ringLength, ringSignedArea, screenToWorld, segmentsIntersect, worldToScreen
} from './mathUtils';

const square = [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }, { x: 0, y: 4 }];

describe('Ring Math', () => {
    it('should compute signed area by winding', () => {
        expect(ringSignedArea(square)).toBe(16);
        expect(ringSignedArea([...square].reverse())).toBe(-16);
        expect(ringLength(square)).toBe(16);
    });

    it('should detect crossing and touching segments', () => {
        expect(segmentsIntersect({ x: 0, y: 0 }, { x: 2, y: 2 }, { x: 0, y: 2 }, { x: 2, y: 0 })).toBe(true);
        expect(segmentsIntersect({ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 5 })).toBe(true);
        expect(segmentsIntersect({ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 3, y: 0 }, { x: 5, y: 0 })).toBe(false);
        expect(segmentsIntersect({ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }, { x: 0.4, y: 0.6 })).toBe(false);
    });

    it('should classify simple and non-simple rings', () => {
        expect(isSimpleRing(square)).toBe(true);
        // collinear vertex along an edge is allowed
        expect(isSimpleRing([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }, { x: 0, y: 4 }])).toBe(true);
        // bowtie
        expect(isSimpleRing([{ x: 0, y: 0 }, { x: 10, y: 10 }, { x: 10, y: 0 }, { x: 0, y: 10 }])).toBe(false);
        // spike folding back on its own edge
        expect(isSimpleRing([{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 3 }])).toBe(false);
        // vertex touching a non-adjacent edge
        expect(isSimpleRing([{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }, { x: 2, y: 0 }, { x: 0, y: 4 }])).toBe(false);
        // flat
        expect(isSimpleRing([{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 }])).toBe(false);
    });

    it('should normalize repeated and closing vertices', () => {
        const ring = normalizeRing([
            { x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }, { x: 0, y: 0 }
        ]);
        expect(ring).toEqual([{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }]);
    });

    it('should test points against ring interiors and edges', () => {
        expect(isPointInRing({ x: 2, y: 2 }, square)).toBe(true);
        expect(isPointInRing({ x: 5, y: 2 }, square)).toBe(false);
        expect(isPointOnRing({ x: 4, y: 2 }, square, 1e-9)).toBe(true);
        expect(isPointOnRing({ x: 2, y: 2 }, square, 1e-9)).toBe(false);
    });

    it('should build a regular polygon for a circle', () => {
        const ring = circleToRing({ x: 1, y: 1 }, 2, 4);
        expect(ring).toHaveLength(4);
        expect(ring[0]).toEqual({ x: 3, y: 1 });
        expect(ring[1].x).toBeCloseTo(1);
        expect(ring[1].y).toBeCloseTo(3);
        expect(Math.abs(ringSignedArea(ring))).toBeCloseTo(8);
    });
});

describe('Viewport', () => {
    it('should fit bounds with padding and flip the y axis', () => {
        const vp = fitViewport({ minX: 0, minY: 0, maxX: 100, maxY: 50 }, 220, 120);
        expect(vp.scale).toBe(2);
        expect(worldToScreen({ x: 0, y: 0 }, vp)).toEqual({ x: 10, y: 110 });
        expect(worldToScreen({ x: 100, y: 50 }, vp)).toEqual({ x: 210, y: 10 });

        const back = screenToWorld({ x: 110, y: 60 }, vp);
        expect(back.x).toBeCloseTo(50);
        expect(back.y).toBeCloseTo(25);
    });
});
