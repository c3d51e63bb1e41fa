/**
 * Conversions between flat wire arrays and geometry types
 *
 * Pose arrays are laid out as [x, y, z, roll, pitch, yaw] in meters and degrees.
 */

import { DEFAULT_CAMERA_NAME, createChildLogger } from '@llvision/shared';
import { Pose2d, Pose3d, Rotation3d, Translation3d, degreesToRadians } from '../geometry/index.js';

const logger = createChildLogger({ component: 'PoseArrays' });

export const POSE_ARRAY_LENGTH = 6;

/**
 * Value at `index`, or 0 when the array is too short
 */
export function extractArrayEntry(values: readonly number[], index: number): number {
  if (index < 0 || index >= values.length) {
    return 0;
  }
  return values[index] ?? 0;
}

/**
 * Integer cast for wire ids and counts: truncates toward zero, non-finite becomes 0
 */
export function toInteger(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

export function toPose3d(values: readonly number[]): Pose3d {
  if (values.length < POSE_ARRAY_LENGTH) {
    logger.debug({ length: values.length }, 'Pose array too short, using identity pose');
    return new Pose3d();
  }

  return new Pose3d(
    new Translation3d(extractArrayEntry(values, 0), extractArrayEntry(values, 1), extractArrayEntry(values, 2)),
    Rotation3d.fromDegrees(extractArrayEntry(values, 3), extractArrayEntry(values, 4), extractArrayEntry(values, 5))
  );
}

export function toPose2d(values: readonly number[]): Pose2d {
  if (values.length < POSE_ARRAY_LENGTH) {
    logger.debug({ length: values.length }, 'Pose array too short, using identity pose');
    return new Pose2d();
  }

  return new Pose2d(
    extractArrayEntry(values, 0),
    extractArrayEntry(values, 1),
    degreesToRadians(extractArrayEntry(values, 5))
  );
}

export function pose3dToArray(pose: Pose3d): number[] {
  return [
    pose.translation.x,
    pose.translation.y,
    pose.translation.z,
    pose.rotation.rollDegrees,
    pose.rotation.pitchDegrees,
    pose.rotation.yawDegrees,
  ];
}

export function translation3dToArray(translation: Translation3d): number[] {
  return [translation.x, translation.y, translation.z];
}

/**
 * Table name for a camera hostname; blank names fall back to the default camera
 */
export function sanitizeName(name: string | undefined): string {
  const trimmed = name?.trim() ?? '';
  return trimmed === '' ? DEFAULT_CAMERA_NAME : trimmed;
}
