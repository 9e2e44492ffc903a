import { describe, it, expect } from 'vitest';
import {
    TrackingFormatError, computeOccupancy, extractTrack, filterByConfidence,
    parseTrackingJson, summarizeTracking
} from './trackingUtils';
import { ZoneEvaluator } from './zoneEvaluator';

// Two animals, two bodyparts, five frames at 10 fps
const EXPORT = `{
  "data": [
    { "bodyparts": [[[1, 1, 0.9], [5, 5, 0.2]], [[20, 20, 0.95], [NaN, NaN, NaN]]], "bbox_scores": [0.9, 0.8] },
    { "bodyparts": [[[20, 20, 0.8], [5, 5, 0.7]], [[21, 21, 0.9], [2, 2, 0.9]]], "bbox_scores": [0.9, 0.8] },
    { "bodyparts": [[[NaN, NaN, NaN], [5, 5, 0.7]], [[22, 22, 0.9], [2, 2, 0.9]]], "bbox_scores": [0.9, 0.8] },
    { "bodyparts": [[[5, 5, 0.6], [5, 5, 0.7]], [[23, 23, 0.9], [2, 2, 0.9]]], "bbox_scores": [0.9, 0.8] },
    { "bodyparts": [[[6, 6, 0.4], [5, 5, 0.7]], [[24, 24, 0.9], [2, 2, 0.9]]], "bbox_scores": [0.9, 0.8] }
  ],
  "metadata": { "fps": 10 }
}`;

describe('Tracking Data', () => {
    it('should parse wrapped exports with NaN keypoints', () => {
        const data = parseTrackingJson(EXPORT);
        expect(data.fps).toBe(10);
        expect(data.frames).toHaveLength(5);
        expect(data.frames[0].bodyparts[1][1]).toBeNull();
        expect(data.frames[0].bodyparts[0][0]).toEqual([1, 1, 0.9]);
        expect(data.frames[0].bboxScores).toEqual([0.9, 0.8]);
    });

    it('should parse a bare frame list with the default frame rate', () => {
        const data = parseTrackingJson('[{ "bodyparts": [[[1, 2, 0.5]]] }]');
        expect(data.fps).toBe(30);
        expect(summarizeTracking(data)).toEqual({ numFrames: 1, numAnimals: 1, numBodyparts: 1 });
    });

    it('should reject malformed exports', () => {
        expect(() => parseTrackingJson('{ "data": 5 }')).toThrow(TrackingFormatError);
        expect(() => parseTrackingJson('[{ "bodyparts": [[[1, 2]]] }]')).toThrow('frame 0, animal 0, bodypart 0');
        expect(() => parseTrackingJson('[{}]')).toThrow("frame 0: 'bodyparts' must be an array");
        expect(() => parseTrackingJson('not json')).toThrow(TrackingFormatError);
    });

    it('should summarize frames, animals and bodyparts', () => {
        expect(summarizeTracking(parseTrackingJson(EXPORT))).toEqual({ numFrames: 5, numAnimals: 2, numBodyparts: 2 });
        expect(summarizeTracking({ frames: [], fps: 30 })).toEqual({ numFrames: 0, numAnimals: 0, numBodyparts: 0 });
    });

    it('should drop low confidence keypoints and extra animals', () => {
        const data = parseTrackingJson(EXPORT);
        const filtered = filterByConfidence(data, { maxAnimals: 1, threshold: 0.5 });

        expect(filtered.frames[0].bodyparts).toEqual([[[1, 1, 0.9], null]]);
        expect(filtered.frames[0].bboxScores).toEqual([0.9]);
        expect(filtered.frames[4].bodyparts[0][0]).toBeNull();
        // source data untouched
        expect(data.frames[0].bodyparts[0][1]).toEqual([5, 5, 0.2]);
    });

    it('should keep only the selected bodyparts', () => {
        const filtered = filterByConfidence(parseTrackingJson(EXPORT), { maxAnimals: 2, threshold: 0, bodyparts: [1] });
        expect(filtered.frames[1].bodyparts).toEqual([[null, [5, 5, 0.7]], [null, [2, 2, 0.9]]]);
    });

    it('should extract a track with timestamps', () => {
        const track = extractTrack(parseTrackingJson(EXPORT), 0, 0);
        expect(track.map(s => s.point)).toEqual([
            { x: 1, y: 1 }, { x: 20, y: 20 }, null, { x: 5, y: 5 }, { x: 6, y: 6 }
        ]);
        expect(track[3].seconds).toBeCloseTo(0.3);
        expect(extractTrack(parseTrackingJson(EXPORT), 5, 0).every(s => s.point === null)).toBe(true);
    });

    it('should count frames, entries and time spent in each zone', () => {
        const zones = new ZoneEvaluator('box = [(0,0),(10,0),(10,10),(0,10)]\nfar = (100, 100, 5)');
        const data = parseTrackingJson(EXPORT);
        const occupancy = computeOccupancy(zones, extractTrack(data, 0, 0), data.fps);

        expect(occupancy).toHaveLength(2);
        const [box, far] = occupancy;
        expect(box.zone).toBe('box');
        expect(box.frames).toBe(3);
        expect(box.entries).toBe(2);
        expect(box.seconds).toBeCloseTo(0.3);
        expect(box.fraction).toBe(0.75);
        expect(far).toEqual({ zone: 'far', frames: 0, seconds: 0, entries: 0, fraction: 0 });
    });
});
