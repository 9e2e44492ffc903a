import { Point, Ring, Bounds } from '../types';

// --- Vector Math Helpers ---
export const crossProduct = (a: Point, b: Point): number => a.x * b.y - a.y * b.x;

export const sub = (p1: Point, p2: Point): Point => ({ x: p1.x - p2.x, y: p1.y - p2.y });

export const distance = (p1: Point, p2: Point) => {
  return Math.sqrt(Math.pow(p2.x - p1.x, 2) + Math.pow(p2.y - p1.y, 2));
};

export const pointsEqual = (a: Point, b: Point): boolean => a.x === b.x && a.y === b.y;

/** Sign of the turn a -> b -> c: >0 left, <0 right, 0 collinear. */
export const orientation = (a: Point, b: Point, c: Point): number => crossProduct(sub(b, a), sub(c, a));

export const getProjectionParameter = (p: Point, a: Point, b: Point): number => {
    const atob = { x: b.x - a.x, y: b.y - a.y };
    const atop = { x: p.x - a.x, y: p.y - a.y };
    const len2 = atob.x * atob.x + atob.y * atob.y;
    if (len2 === 0) return 0;
    return (atop.x * atob.x + atop.y * atob.y) / len2;
};

export const getClosestPointOnSegment = (p: Point, a: Point, b: Point): Point => {
    const t = Math.max(0, Math.min(1, getProjectionParameter(p, a, b)));
    return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
};

export const distanceToSegment = (p: Point, a: Point, b: Point): number =>
    distance(p, getClosestPointOnSegment(p, a, b));

// --- Ring Measures ---

/** Shoelace formula. Positive for counter-clockwise rings. */
export const ringSignedArea = (ring: Ring): number => {
    let area = 0;
    const n = ring.length;
    for (let i = 0; i < n; i++) {
        const j = (i + 1) % n;
        area += ring[i].x * ring[j].y - ring[j].x * ring[i].y;
    }
    return area / 2;
};

export const ringArea = (ring: Ring): number => Math.abs(ringSignedArea(ring));

/** Closed length, including the edge back to the first vertex. */
export const ringLength = (ring: Ring): number => {
    let total = 0;
    const n = ring.length;
    for (let i = 0; i < n; i++) {
        total += distance(ring[i], ring[(i + 1) % n]);
    }
    return total;
};

export const ringBounds = (ring: Ring): Bounds => {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const p of ring) {
        if (p.x < minX) minX = p.x;
        if (p.x > maxX) maxX = p.x;
        if (p.y < minY) minY = p.y;
        if (p.y > maxY) maxY = p.y;
    }
    return { minX, minY, maxX, maxY };
};

export const mergeBounds = (a: Bounds, b: Bounds): Bounds => ({
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
});

// --- Containment ---

/** Ray casting; the boundary itself is not classified reliably. */
export const isPointInRing = (p: Point, ring: Ring): boolean => {
    let inside = false;
    for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
        const xi = ring[i].x, yi = ring[i].y;
        const xj = ring[j].x, yj = ring[j].y;
        const intersect = ((yi > p.y) !== (yj > p.y)) &&
            (p.x < (xj - xi) * (p.y - yi) / (yj - yi) + xi);
        if (intersect) inside = !inside;
    }
    return inside;
};

export const isPointOnRing = (p: Point, ring: Ring, epsilon: number): boolean => {
    for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
        if (distanceToSegment(p, ring[j], ring[i]) <= epsilon) return true;
    }
    return false;
};

// --- Simplicity ---

const onSegment = (p: Point, a: Point, b: Point): boolean =>
    Math.min(a.x, b.x) <= p.x && p.x <= Math.max(a.x, b.x) &&
    Math.min(a.y, b.y) <= p.y && p.y <= Math.max(a.y, b.y);

/** Closed-segment intersection test, touching endpoints included. */
export const segmentsIntersect = (p1: Point, p2: Point, q1: Point, q2: Point): boolean => {
    const d1 = orientation(q1, q2, p1);
    const d2 = orientation(q1, q2, p2);
    const d3 = orientation(p1, p2, q1);
    const d4 = orientation(p1, p2, q2);

    if (((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) &&
        ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0))) {
        return true;
    }
    if (d1 === 0 && onSegment(p1, q1, q2)) return true;
    if (d2 === 0 && onSegment(p2, q1, q2)) return true;
    if (d3 === 0 && onSegment(q1, p1, p2)) return true;
    if (d4 === 0 && onSegment(q2, p1, p2)) return true;
    return false;
};

/**
 * A ring is simple when it has at least three vertices, a non-zero area,
 * no two non-adjacent edges meet and no adjacent edges fold back on each other.
 */
export const isSimpleRing = (ring: Ring): boolean => {
    const n = ring.length;
    if (n < 3) return false;
    if (ringArea(ring) === 0) return false;

    for (let i = 0; i < n; i++) {
        const a1 = ring[i];
        const a2 = ring[(i + 1) % n];
        if (pointsEqual(a1, a2)) return false;

        // Adjacent edge folding back over this one
        const a3 = ring[(i + 2) % n];
        if (orientation(a1, a2, a3) === 0 && getProjectionParameter(a3, a1, a2) < 1) return false;

        for (let j = i + 2; j < n; j++) {
            // Edge n-1 shares vertex 0 with edge 0
            if (i === 0 && j === n - 1) continue;
            const b1 = ring[j];
            const b2 = ring[(j + 1) % n];
            if (segmentsIntersect(a1, a2, b1, b2)) return false;
        }
    }
    return true;
};

/** Drops consecutive repeats and an explicit closing vertex. */
export const normalizeRing = (points: Point[]): Ring => {
    const ring: Ring = [];
    for (const p of points) {
        if (ring.length === 0 || !pointsEqual(ring[ring.length - 1], p)) ring.push(p);
    }
    while (ring.length > 1 && pointsEqual(ring[0], ring[ring.length - 1])) ring.pop();
    return ring;
};

// --- Shape Construction ---

/** Regular n-gon inscribed in the circle, first vertex at angle 0. */
export const circleToRing = (center: Point, radius: number, segments: number): Ring => {
    const ring: Ring = [];
    for (let k = 0; k < segments; k++) {
        const angle = (2 * Math.PI * k) / segments;
        ring.push({
            x: center.x + radius * Math.cos(angle),
            y: center.y + radius * Math.sin(angle)
        });
    }
    return ring;
};

// --- Coordinate System Utilities ---

export interface Viewport {
    scale: number;
    offsetX: number;
    offsetY: number;
    height: number;
}

/** Fits bounds into a width x height canvas with relative padding, y axis pointing up. */
export const fitViewport = (bounds: Bounds, width: number, height: number, padding = 0.05): Viewport => {
    const spanX = bounds.maxX - bounds.minX;
    const spanY = bounds.maxY - bounds.minY;
    const pad = Math.max(spanX, spanY) * padding;
    const w = spanX + 2 * pad || 1;
    const h = spanY + 2 * pad || 1;
    const scale = Math.min(width / w, height / h);
    return {
        scale,
        offsetX: (width - w * scale) / 2 - (bounds.minX - pad) * scale,
        offsetY: (height - h * scale) / 2 - (bounds.minY - pad) * scale,
        height,
    };
};

export const worldToScreen = (p: Point, vp: Viewport): Point => ({
    x: p.x * vp.scale + vp.offsetX,
    y: vp.height - (p.y * vp.scale + vp.offsetY)
});

export const screenToWorld = (p: Point, vp: Viewport): Point => ({
    x: (p.x - vp.offsetX) / vp.scale,
    y: (vp.height - p.y - vp.offsetY) / vp.scale
});
