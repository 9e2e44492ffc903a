import { Keypoint, Point, TrackingData, TrackingFrame, TrackingSummary, TrackSample, ZoneOccupancy } from '../types';
import { DEFAULT_FPS } from '../constants';
import { ZoneEvaluator } from './zoneEvaluator';

export class TrackingFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TrackingFormatError';
    }
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === 'object' && v !== null && !Array.isArray(v);

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const toKeypoint = (v: unknown, where: string): Keypoint => {
    if (v === null) return null;
    if (!Array.isArray(v) || v.length !== 3) {
        throw new TrackingFormatError(`${where}: keypoint must be [x, y, confidence]`);
    }
    // Missing detections are exported as NaN (read as null)
    if (v.some(c => c === null)) return null;
    const [x, y, c] = v;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(c)) {
        throw new TrackingFormatError(`${where}: keypoint values must be numbers`);
    }
    return [x, y, c];
};

const toFrame = (v: unknown, index: number): TrackingFrame => {
    if (!isRecord(v)) throw new TrackingFormatError(`frame ${index}: expected an object`);
    const { bodyparts, bboxes, bbox_scores } = v;
    if (!Array.isArray(bodyparts)) {
        throw new TrackingFormatError(`frame ${index}: 'bodyparts' must be an array`);
    }
    const frame: TrackingFrame = {
        bodyparts: bodyparts.map((animal: unknown, a) => {
            if (!Array.isArray(animal)) {
                throw new TrackingFormatError(`frame ${index}, animal ${a}: expected an array of keypoints`);
            }
            return animal.map((kp: unknown, b) => toKeypoint(kp, `frame ${index}, animal ${a}, bodypart ${b}`));
        })
    };
    if (Array.isArray(bboxes)) {
        frame.bboxes = bboxes.filter((b): b is number[] => Array.isArray(b) && b.every(isFiniteNumber));
    }
    if (Array.isArray(bbox_scores)) {
        frame.bboxScores = bbox_scores.filter(isFiniteNumber);
    }
    return frame;
};

/**
 * Reads a pose-estimation export: either a bare frame list or
 * `{ data: frames, metadata: { fps } }`.
 */
export const parseTrackingJson = (text: string): TrackingData => {
    let raw: unknown;
    try {
        raw = JSON.parse(text.replace(/\bNaN\b/g, 'null'));
    } catch (err) {
        throw new TrackingFormatError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    let frames: unknown = raw;
    let fps = DEFAULT_FPS;
    if (isRecord(raw)) {
        frames = raw.data;
        const { metadata } = raw;
        if (isRecord(metadata) && isFiniteNumber(metadata.fps) && metadata.fps > 0) {
            fps = metadata.fps;
        }
    }
    if (!Array.isArray(frames)) {
        throw new TrackingFormatError('expected a list of frames or an object with a "data" list');
    }
    return { frames: frames.map(toFrame), fps };
};

export const summarizeTracking = (data: TrackingData): TrackingSummary => {
    const first = data.frames[0];
    if (!first) return { numFrames: 0, numAnimals: 0, numBodyparts: 0 };
    const numAnimals = first.bboxScores?.length ?? first.bodyparts.length;
    return {
        numFrames: data.frames.length,
        numAnimals,
        numBodyparts: first.bodyparts[0]?.length ?? 0,
    };
};

export interface ConfidenceFilter {
    maxAnimals: number;
    threshold: number;
    /** Bodypart indices to keep; all when omitted or empty. */
    bodyparts?: number[];
}

/** Returns new data with low-confidence or unselected keypoints set to null. */
export const filterByConfidence = (data: TrackingData, filter: ConfidenceFilter): TrackingData => {
    const selected = filter.bodyparts && filter.bodyparts.length > 0 ? new Set(filter.bodyparts) : null;
    const frames = data.frames.map((frame): TrackingFrame => {
        const next: TrackingFrame = {
            bodyparts: frame.bodyparts.slice(0, filter.maxAnimals).map(animal =>
                animal.map((kp, b): Keypoint => {
                    if (!kp) return null;
                    if (kp[2] < filter.threshold) return null;
                    if (selected && !selected.has(b)) return null;
                    return kp;
                })
            )
        };
        if (frame.bboxes) next.bboxes = frame.bboxes.slice(0, filter.maxAnimals);
        if (frame.bboxScores) next.bboxScores = frame.bboxScores.slice(0, filter.maxAnimals);
        return next;
    });
    return { frames, fps: data.fps };
};

/** One sample per frame; point is null where the keypoint is missing. */
export const extractTrack = (data: TrackingData, animal: number, bodypart: number): TrackSample[] =>
    data.frames.map((frame, i) => {
        const kp = frame.bodyparts[animal]?.[bodypart] ?? null;
        const point: Point | null = kp ? { x: kp[0], y: kp[1] } : null;
        return { frame: i, seconds: i / data.fps, point };
    });

/**
 * Time spent in each zone along a track. An entry is counted whenever a
 * frame inside the zone follows a frame outside it or without a point.
 */
export const computeOccupancy = (evaluator: ZoneEvaluator, track: TrackSample[], fps: number): ZoneOccupancy[] => {
    const valid = track.filter(s => s.point !== null).length;
    return evaluator.listZones().map(zone => {
        let frames = 0;
        let entries = 0;
        let wasInside = false;
        for (const sample of track) {
            const inside = sample.point !== null && evaluator.contains(zone, sample.point);
            if (inside) {
                frames++;
                if (!wasInside) entries++;
            }
            wasInside = inside;
        }
        return {
            zone,
            frames,
            seconds: frames / fps,
            entries,
            fraction: valid === 0 ? 0 : frames / valid,
        };
    });
};
