/**
 * Raw Target Decoder
 * Splits flat fixed-stride arrays into typed target records
 */

import { extractArrayEntry, toInteger } from '../wire/pose-arrays.js';
import type { RawDetection, RawFiducialTarget } from './types.js';

export const RAW_FIDUCIAL_STRIDE = 7;
export const RAW_DETECTION_STRIDE = 12;

/**
 * Decode `values` as consecutive records of `stride` entries.
 * A length that is not a multiple of the stride yields no records.
 */
export function decodeStrided<T>(
  values: readonly number[],
  stride: number,
  build: (read: (offset: number) => number) => T
): T[] {
  if (stride <= 0 || values.length % stride !== 0) {
    return [];
  }

  const count = values.length / stride;
  const records: T[] = [];

  for (let i = 0; i < count; i++) {
    const baseIndex = i * stride;
    records.push(build((offset) => extractArrayEntry(values, baseIndex + offset)));
  }

  return records;
}

export function decodeRawFiducials(values: readonly number[]): RawFiducialTarget[] {
  return decodeStrided(values, RAW_FIDUCIAL_STRIDE, (read) =>
    Object.freeze({
      id: toInteger(read(0)),
      txnc: read(1),
      tync: read(2),
      ta: read(3),
      distToCamera: read(4),
      distToRobot: read(5),
      ambiguity: read(6),
    })
  );
}

export function decodeRawDetections(values: readonly number[]): RawDetection[] {
  return decodeStrided(values, RAW_DETECTION_STRIDE, (read) =>
    Object.freeze({
      classId: toInteger(read(0)),
      txnc: read(1),
      tync: read(2),
      ta: read(3),
      corner0X: read(4),
      corner0Y: read(5),
      corner1X: read(6),
      corner1Y: read(7),
      corner2X: read(8),
      corner2Y: read(9),
      corner3X: read(10),
      corner3Y: read(11),
    })
  );
}
