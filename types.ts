export enum ZoneKind {
  POLYGON = 'POLYGON',
  CIRCLE = 'CIRCLE',
  COMPOSITE = 'COMPOSITE'
}

export enum SetOperator {
  UNION = 'U',
  INTERSECTION = 'I',
  DIFFERENCE = '-',
  XOR = '^'
}

export interface Point {
  x: number;
  y: number;
}

/** Open ring: the closing vertex is implied, never repeated. */
export type Ring = Point[];

export interface PolygonPart {
  exterior: Ring;
  holes: Ring[];
}

/** A planar region as a list of disjoint polygon parts. */
export type ZoneGeometry = PolygonPart[];

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Zone {
  readonly name: string;
  readonly kind: ZoneKind;
  /** 1-based source line the zone was defined on */
  readonly line: number;
  readonly geometry: ZoneGeometry;
}

export interface ZoneStats {
  area: number;
  perimeter: number;
  bounds: Bounds;
}

// --- Tracking data ---

/** [x, y, confidence]; null once filtered out */
export type Keypoint = [number, number, number] | null;

export interface TrackingFrame {
  /** bodyparts[animal][bodypart] */
  bodyparts: Keypoint[][];
  bboxes?: number[][];
  bboxScores?: number[];
}

export interface TrackingData {
  frames: TrackingFrame[];
  fps: number;
}

export interface TrackingSummary {
  numFrames: number;
  numAnimals: number;
  numBodyparts: number;
}

export interface TrackSample {
  frame: number;
  seconds: number;
  point: Point | null;
}

export interface ZoneOccupancy {
  zone: string;
  frames: number;
  seconds: number;
  entries: number;
  /** frames inside / frames with a valid point */
  fraction: number;
}

export interface GridConfig {
  visible: boolean;
  ticks: number;
  color: string;
}
