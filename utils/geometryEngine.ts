import polygonClipping from 'polygon-clipping';
import type { MultiPolygon, Polygon, Ring as PairRing } from 'polygon-clipping';
import { Bounds, Point, Ring, ZoneGeometry } from '../types';
import { COVERS_EPSILON } from '../constants';
import {
    isPointInRing, isPointOnRing, isSimpleRing, mergeBounds, normalizeRing,
    ringArea, ringBounds, ringLength
} from './mathUtils';

/**
 * The planar operations the zone evaluator needs. The evaluator never
 * touches a geometry library directly, so engines can be swapped in tests.
 */
export interface GeometryEngine {
    union(a: ZoneGeometry, b: ZoneGeometry): ZoneGeometry;
    intersection(a: ZoneGeometry, b: ZoneGeometry): ZoneGeometry;
    difference(a: ZoneGeometry, b: ZoneGeometry): ZoneGeometry;
    xor(a: ZoneGeometry, b: ZoneGeometry): ZoneGeometry;
    area(g: ZoneGeometry): number;
    perimeter(g: ZoneGeometry): number;
    bounds(g: ZoneGeometry): Bounds;
    /** Closed membership: boundary points are covered. */
    covers(g: ZoneGeometry, p: Point): boolean;
    isSimpleRing(ring: Ring): boolean;
}

const toPairs = (ring: Ring): PairRing => ring.map((p): [number, number] => [p.x, p.y]);

const toMultiPolygon = (g: ZoneGeometry): MultiPolygon =>
    g.map((part): Polygon => [toPairs(part.exterior), ...part.holes.map(toPairs)]);

const fromPairs = (ring: PairRing): Ring => normalizeRing(ring.map(([x, y]) => ({ x, y })));

const fromMultiPolygon = (mp: MultiPolygon): ZoneGeometry => {
    const parts: ZoneGeometry = [];
    for (const [exterior, ...holes] of mp) {
        if (!exterior) continue;
        const ext = fromPairs(exterior);
        if (ext.length < 3) continue;
        parts.push({
            exterior: ext,
            holes: holes.map(fromPairs).filter(h => h.length >= 3)
        });
    }
    return parts;
};

const cloneRing = (ring: Ring): Ring => ring.map(p => ({ x: p.x, y: p.y }));

export const cloneGeometry = (g: ZoneGeometry): ZoneGeometry =>
    g.map(part => ({ exterior: cloneRing(part.exterior), holes: part.holes.map(cloneRing) }));

export const geometryArea = (g: ZoneGeometry): number =>
    g.reduce((sum, part) =>
        sum + ringArea(part.exterior) - part.holes.reduce((h, hole) => h + ringArea(hole), 0), 0);

export const geometryPerimeter = (g: ZoneGeometry): number =>
    g.reduce((sum, part) =>
        sum + ringLength(part.exterior) + part.holes.reduce((h, hole) => h + ringLength(hole), 0), 0);

/** Holes lie inside their exterior, so exteriors alone set the box. Infinite for an empty geometry. */
export const geometryBounds = (g: ZoneGeometry): Bounds =>
    g.reduce<Bounds>(
        (acc, part) => mergeBounds(acc, ringBounds(part.exterior)),
        { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity }
    );

export const geometryCovers = (g: ZoneGeometry, p: Point, epsilon = COVERS_EPSILON): boolean => {
    for (const part of g) {
        if (isPointOnRing(p, part.exterior, epsilon)) return true;
        if (part.holes.some(h => isPointOnRing(p, h, epsilon))) return true;
        if (isPointInRing(p, part.exterior) && !part.holes.some(h => isPointInRing(p, h))) return true;
    }
    return false;
};

/** Boolean operations by polygon-clipping, measures by local ring math. */
export const planarEngine: GeometryEngine = {
    union: (a, b) => fromMultiPolygon(polygonClipping.union(toMultiPolygon(a), toMultiPolygon(b))),
    intersection: (a, b) => fromMultiPolygon(polygonClipping.intersection(toMultiPolygon(a), toMultiPolygon(b))),
    difference: (a, b) => fromMultiPolygon(polygonClipping.difference(toMultiPolygon(a), toMultiPolygon(b))),
    xor: (a, b) => fromMultiPolygon(polygonClipping.xor(toMultiPolygon(a), toMultiPolygon(b))),
    area: geometryArea,
    perimeter: geometryPerimeter,
    bounds: geometryBounds,
    covers: (g, p) => geometryCovers(g, p),
    isSimpleRing,
};
