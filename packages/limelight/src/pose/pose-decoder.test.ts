/**
 * Pose Decoder Tests
 */
import { describe, it, expect } from 'vitest';
import { POSE_HEADER_LENGTH, decodePoseEstimate } from './pose-decoder.js';

const HEADER = [1, 2, 3, 0, 0, 0, 50, 2, 3.0, 1.5, 0.2];
const TAG_A = [4, -1.5, 2.25, 0.8, 3.1, 3.4, 0.05];
const TAG_B = [7, 10, -4, 1.2, 2.0, 2.2, 0.4];

describe('decodePoseEstimate()', () => {
  it('should decode a well-formed sample', () => {
    const estimate = decodePoseEstimate({ value: [...HEADER, ...TAG_A, ...TAG_B], timestamp: 5_000_000 }, false);

    expect(estimate).not.toBeNull();
    expect(estimate?.timestampSeconds).toBeCloseTo(4.95, 10);
    expect(estimate?.latency).toBe(50);
    expect(estimate?.tagCount).toBe(2);
    expect(estimate?.tagSpan).toBe(3.0);
    expect(estimate?.avgTagDist).toBe(1.5);
    expect(estimate?.avgTagArea).toBe(0.2);
    expect(estimate?.isMegaTag2).toBe(false);
    expect(estimate?.rawFiducials.map((fiducial) => fiducial.id)).toEqual([4, 7]);
    expect(estimate?.rawFiducials[1]?.ambiguity).toBe(0.4);
  });

  it('should read the pose from the first six values', () => {
    const estimate = decodePoseEstimate({ value: [...HEADER, ...TAG_A, ...TAG_B], timestamp: 0 }, true);

    expect(estimate?.pose.x).toBe(1);
    expect(estimate?.pose.y).toBe(2);
    expect(estimate?.pose.z).toBe(3);
    expect(estimate?.isMegaTag2).toBe(true);
  });

  it('should leave tag records empty when the length does not match the tag count', () => {
    const estimate = decodePoseEstimate({ value: [...HEADER, ...TAG_A], timestamp: 5_000_000 }, false);

    expect(estimate?.tagCount).toBe(2);
    expect(estimate?.tagSpan).toBe(3.0);
    expect(estimate?.avgTagDist).toBe(1.5);
    expect(estimate?.avgTagArea).toBe(0.2);
    expect(estimate?.rawFiducials).toEqual([]);
  });

  it('should return null for an empty sample', () => {
    expect(decodePoseEstimate({ value: [], timestamp: 5_000_000 }, false)).toBeNull();
  });

  it('should zero-fill a truncated header', () => {
    const estimate = decodePoseEstimate({ value: [1, 2, 3, 0, 0, 0, 20], timestamp: 1_000_000 }, false);

    expect(estimate?.latency).toBe(20);
    expect(estimate?.tagCount).toBe(0);
    expect(estimate?.avgTagArea).toBe(0);
    expect(estimate?.timestampSeconds).toBeCloseTo(0.98, 10);
    expect(estimate?.rawFiducials).toEqual([]);
  });

  it('should accept a header with no tags', () => {
    const header = [0, 0, 0, 0, 0, 0, 10, 0, 0, 0, 0];
    expect(header).toHaveLength(POSE_HEADER_LENGTH);

    const estimate = decodePoseEstimate({ value: header, timestamp: 2_000_000 }, false);

    expect(estimate?.tagCount).toBe(0);
    expect(estimate?.rawFiducials).toEqual([]);
  });
});
