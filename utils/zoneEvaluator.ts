import { Bounds, Point, SetOperator, Zone, ZoneGeometry, ZoneKind, ZoneStats } from '../types';
import { DEFAULT_CIRCLE_RESOLUTION, RELATIVE_AREA_EPSILON } from '../constants';
import { GeometryEngine, cloneGeometry, planarEngine } from './geometryEngine';
import { LiteralParseError, parseCoordinateList, parseNumberTuple } from './literalParser';
import { circleToRing, mergeBounds, normalizeRing } from './mathUtils';
import {
    DuplicateNameError, EmptyResultError, ShapeError, ZoneConfigError,
    ZoneNotFoundError, ZoneReferenceError, ZoneSyntaxError
} from './zoneErrors';

export interface ZoneEvaluatorOptions {
    /** Segments used to approximate a circle. Integer, at least 3. */
    circleResolution?: number;
    engine?: GeometryEngine;
}

// Names are Unicode letters, digits and underscores
const ASSIGN_RE = /^([\p{L}\p{N}_]+)\s*=\s*(.+)$/u;
const OPERATION_RE = /^([\p{L}\p{N}_]+)\s*([UI\-^])\s*([\p{L}\p{N}_]+)$/u;

const OPERATIONS: Record<SetOperator, (engine: GeometryEngine, a: ZoneGeometry, b: ZoneGeometry) => ZoneGeometry> = {
    [SetOperator.UNION]: (e, a, b) => e.union(a, b),
    [SetOperator.INTERSECTION]: (e, a, b) => e.intersection(a, b),
    [SetOperator.DIFFERENCE]: (e, a, b) => e.difference(a, b),
    [SetOperator.XOR]: (e, a, b) => e.xor(a, b),
};

const OPERATOR_TOKENS: readonly string[] = Object.values(SetOperator);

const isSetOperator = (token: string): token is SetOperator => OPERATOR_TOKENS.includes(token);

/**
 * Builds a table of named planar zones from zone-language source and answers
 * geometric queries against it.
 *
 * ```
 * zone1   = [(0,0),(10,0),(10,10),(0,10)]
 * cir     = (5,5,3)
 * union_z = zone1 U cir
 * ```
 *
 * The table is built once in the constructor. Any error aborts construction,
 * so an instance that exists is always complete and never changes.
 */
export class ZoneEvaluator {
    private readonly zones = new Map<string, Zone>();
    private readonly engine: GeometryEngine;
    private readonly circleResolution: number;

    constructor(source: string, options: ZoneEvaluatorOptions = {}) {
        const circleResolution = options.circleResolution ?? DEFAULT_CIRCLE_RESOLUTION;
        if (!Number.isInteger(circleResolution) || circleResolution < 3) {
            throw new ZoneConfigError(`circle resolution must be an integer of at least 3, got ${circleResolution}`);
        }
        this.circleResolution = circleResolution;
        this.engine = options.engine ?? planarEngine;

        source.split(/\r?\n/).forEach((raw, i) => this.parseLine(raw, i + 1));
    }

    private parseLine(raw: string, line: number): void {
        const text = raw.split('#', 1)[0].trim();
        if (!text) return;

        const m = ASSIGN_RE.exec(text);
        if (!m) {
            throw new ZoneSyntaxError(`expected 'name = expression', got '${text}'`, line);
        }
        const [, name, rawExpr] = m;
        const expr = rawExpr.trim();

        const existing = this.zones.get(name);
        if (existing) {
            throw new DuplicateNameError(name, line, existing.line);
        }

        let zone: Zone;
        if (expr.startsWith('[')) {
            zone = this.buildPolygon(name, expr, line);
        } else if (expr.startsWith('(') && expr.endsWith(')')) {
            zone = this.buildCircle(name, expr, line);
        } else {
            zone = this.buildOperation(name, expr, line);
        }
        this.zones.set(name, zone);
    }

    private buildPolygon(name: string, expr: string, line: number): Zone {
        let coords: Point[];
        try {
            coords = parseCoordinateList(expr);
        } catch (err) {
            if (err instanceof LiteralParseError) {
                throw new ShapeError(`invalid coordinates for '${name}': ${err.message}`, line);
            }
            throw err;
        }

        const ring = normalizeRing(coords);
        if (ring.length < 3) {
            throw new ShapeError(`polygon '${name}' needs at least 3 distinct vertices`, line);
        }
        if (!this.engine.isSimpleRing(ring)) {
            throw new ShapeError(`polygon '${name}' is not a simple polygon`, line);
        }
        return { name, kind: ZoneKind.POLYGON, line, geometry: [{ exterior: ring, holes: [] }] };
    }

    private buildCircle(name: string, expr: string, line: number): Zone {
        let values: number[];
        try {
            values = parseNumberTuple(expr);
        } catch (err) {
            if (err instanceof LiteralParseError) {
                throw new ShapeError(`invalid circle for '${name}': ${err.message}`, line);
            }
            throw err;
        }

        if (values.length !== 3) {
            throw new ShapeError(`circle '${name}' must be (cx, cy, radius), got ${values.length} values`, line);
        }
        const [cx, cy, r] = values;
        if (!(r > 0)) {
            throw new ShapeError(`circle '${name}' must have a positive radius`, line);
        }
        const ring = circleToRing({ x: cx, y: cy }, r, this.circleResolution);
        return { name, kind: ZoneKind.CIRCLE, line, geometry: [{ exterior: ring, holes: [] }] };
    }

    private buildOperation(name: string, expr: string, line: number): Zone {
        const m = OPERATION_RE.exec(expr);
        if (!m) {
            throw new ZoneSyntaxError(`invalid expression for '${name}': '${expr}'`, line);
        }
        const [, left, op, right] = m;
        if (!isSetOperator(op)) {
            throw new ZoneSyntaxError(`unknown operator '${op}'`, line);
        }
        const a = this.zones.get(left);
        if (!a) throw new ZoneReferenceError(left, line);
        const b = this.zones.get(right);
        if (!b) throw new ZoneReferenceError(right, line);

        const geometry = OPERATIONS[op](this.engine, a.geometry, b.geometry);
        const scale = Math.max(this.engine.area(a.geometry), this.engine.area(b.geometry));
        if (geometry.length === 0 || this.engine.area(geometry) <= scale * RELATIVE_AREA_EPSILON) {
            throw new EmptyResultError(name, line);
        }
        return { name, kind: ZoneKind.COMPOSITE, line, geometry };
    }

    private require(name: string): Zone {
        const zone = this.zones.get(name);
        if (!zone) throw new ZoneNotFoundError(name);
        return zone;
    }

    /** Zone names in definition order. */
    listZones(): string[] {
        return [...this.zones.keys()];
    }

    hasZone(name: string): boolean {
        return this.zones.has(name);
    }

    /** A copy of the zone record; changing it never touches the table. */
    getZone(name: string): Zone {
        const zone = this.require(name);
        return { ...zone, geometry: cloneGeometry(zone.geometry) };
    }

    /** Polygon parts with exterior and hole rings, for renderers. Returns a copy. */
    getGeometry(name: string): ZoneGeometry {
        return cloneGeometry(this.require(name).geometry);
    }

    area(name: string): number {
        return this.engine.area(this.require(name).geometry);
    }

    perimeter(name: string): number {
        return this.engine.perimeter(this.require(name).geometry);
    }

    bounds(name: string): Bounds {
        return this.engine.bounds(this.require(name).geometry);
    }

    contains(name: string, point: Point): boolean {
        return this.engine.covers(this.require(name).geometry, point);
    }

    getStats(name: string): ZoneStats {
        const { geometry } = this.require(name);
        return {
            area: this.engine.area(geometry),
            perimeter: this.engine.perimeter(geometry),
            bounds: this.engine.bounds(geometry),
        };
    }

    zonesContaining(point: Point): string[] {
        return this.listZones().filter(name => this.contains(name, point));
    }

    /** Box around every zone, null when nothing is defined. */
    totalBounds(): Bounds | null {
        let total: Bounds | null = null;
        for (const name of this.zones.keys()) {
            const b = this.bounds(name);
            total = total ? mergeBounds(total, b) : b;
        }
        return total;
    }

    get resolution(): number {
        return this.circleResolution;
    }
}
