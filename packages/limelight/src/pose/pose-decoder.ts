/**
 * Pose Decoder
 *
 * Botpose arrays carry 11 header values followed by one 7-value record per tag:
 * [x, y, z, roll, pitch, yaw, latency, tagCount, tagSpan, avgTagDist, avgTagArea, ...tags]
 */

import type { TimestampedValue } from '@llvision/networktables';
import { RAW_FIDUCIAL_STRIDE, decodeRawFiducials } from '../targets/index.js';
import { extractArrayEntry, toInteger, toPose3d } from '../wire/pose-arrays.js';
import type { PoseEstimate } from './pose-estimate.js';

export const POSE_HEADER_LENGTH = 11;

const MICROSECONDS_PER_SECOND = 1_000_000;
const MILLISECONDS_PER_SECOND = 1000;

/**
 * Decode one timestamped botpose sample. Returns null when the sample is empty.
 * Tag records are only filled in when the array length matches the tag count.
 */
export function decodePoseEstimate(
  sample: TimestampedValue<readonly number[]>,
  isMegaTag2: boolean
): PoseEstimate | null {
  const values = sample.value;
  if (values.length === 0) {
    return null;
  }

  const latency = extractArrayEntry(values, 6);
  const tagCount = toInteger(extractArrayEntry(values, 7));

  const timestampSeconds =
    sample.timestamp / MICROSECONDS_PER_SECOND - latency / MILLISECONDS_PER_SECOND;

  const expectedLength = POSE_HEADER_LENGTH + RAW_FIDUCIAL_STRIDE * tagCount;
  const rawFiducials =
    values.length === expectedLength ? decodeRawFiducials(values.slice(POSE_HEADER_LENGTH)) : [];

  return {
    pose: toPose3d(values),
    timestampSeconds,
    latency,
    tagCount,
    tagSpan: extractArrayEntry(values, 8),
    avgTagDist: extractArrayEntry(values, 9),
    avgTagArea: extractArrayEntry(values, 10),
    rawFiducials,
    isMegaTag2,
  };
}
