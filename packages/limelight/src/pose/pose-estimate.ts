/**
 * Pose Estimate
 * A robot pose reconstructed from one botpose sample
 */

import type { Logger } from '@llvision/shared';
import { createChildLogger } from '@llvision/shared';
import { Pose3d } from '../geometry/index.js';
import type { RawFiducialTarget } from '../targets/index.js';

const defaultLogger = createChildLogger({ component: 'PoseEstimate' });

export interface PoseEstimate {
  pose: Pose3d;
  /** Capture time in seconds: publish time minus latency */
  timestampSeconds: number;
  /** Milliseconds */
  latency: number;
  tagCount: number;
  /** Largest distance between the tags used, meters */
  tagSpan: number;
  /** Meters */
  avgTagDist: number;
  /** Percentage of the image */
  avgTagArea: number;
  rawFiducials: RawFiducialTarget[];
  /** Produced by the MegaTag2 (IMU-assisted) solver */
  isMegaTag2: boolean;
}

export function createEmptyPoseEstimate(): PoseEstimate {
  return {
    pose: new Pose3d(),
    timestampSeconds: 0,
    latency: 0,
    tagCount: 0,
    tagSpan: 0,
    avgTagDist: 0,
    avgTagArea: 0,
    rawFiducials: [],
    isMegaTag2: false,
  };
}

/**
 * Usable for localization: decoded, with at least one tag record
 */
export function isValidPoseEstimate(estimate: PoseEstimate | null | undefined): estimate is PoseEstimate {
  return estimate != null && estimate.rawFiducials.length !== 0;
}

export function formatPoseEstimate(estimate: PoseEstimate): string {
  const lines = [
    'Pose Estimate Information:',
    `Timestamp (Seconds): ${estimate.timestampSeconds.toFixed(3)}`,
    `Latency: ${estimate.latency.toFixed(3)} ms`,
    `Tag Count: ${estimate.tagCount}`,
    `Tag Span: ${estimate.tagSpan.toFixed(2)} meters`,
    `Average Tag Distance: ${estimate.avgTagDist.toFixed(2)} meters`,
    `Average Tag Area: ${estimate.avgTagArea.toFixed(2)}% of image`,
    `Is MegaTag2: ${estimate.isMegaTag2}`,
    '',
  ];

  if (estimate.rawFiducials.length === 0) {
    lines.push('No RawFiducials data available.');
    return lines.join('\n');
  }

  lines.push('Raw Fiducials Details:');
  estimate.rawFiducials.forEach((fiducial, index) => {
    lines.push(
      ` Fiducial #${index + 1}:`,
      `  ID: ${fiducial.id}`,
      `  TXNC: ${fiducial.txnc.toFixed(2)}`,
      `  TYNC: ${fiducial.tync.toFixed(2)}`,
      `  TA: ${fiducial.ta.toFixed(2)}`,
      `  Distance to Camera: ${fiducial.distToCamera.toFixed(2)} meters`,
      `  Distance to Robot: ${fiducial.distToRobot.toFixed(2)} meters`,
      `  Ambiguity: ${fiducial.ambiguity.toFixed(2)}`,
      ''
    );
  });

  return lines.join('\n');
}

export function logPoseEstimate(estimate: PoseEstimate, logger: Logger = defaultLogger): void {
  logger.info(
    {
      event: 'pose_estimate',
      timestampSeconds: estimate.timestampSeconds,
      tagCount: estimate.tagCount,
      isMegaTag2: estimate.isMegaTag2,
    },
    formatPoseEstimate(estimate)
  );
}
