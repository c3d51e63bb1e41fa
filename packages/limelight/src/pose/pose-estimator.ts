/**
 * Pose Estimator
 * Reads queued botpose samples for one alliance/solver combination
 */

import type { NetworkTable, TopicSubscriber } from '@llvision/networktables';
import { createChildLogger } from '@llvision/shared';
import type { Logger } from '@llvision/shared';
import { READ_KEYS } from '../keys.js';
import { decodeRawFiducials } from '../targets/index.js';
import type { RawFiducialTarget } from '../targets/index.js';
import { decodePoseEstimate } from './pose-decoder.js';
import { isValidPoseEstimate } from './pose-estimate.js';
import type { PoseEstimate } from './pose-estimate.js';

export interface PoseEstimatorDefinition {
  /** Botpose topic on the camera's table */
  topic: string;
  isMegaTag2: boolean;
}

/**
 * Available estimators. The blue-origin variants are the recommended ones;
 * MegaTag2 needs the robot orientation to be published every loop.
 */
export const POSE_ESTIMATORS = {
  RED: { topic: 'botpose_wpired', isMegaTag2: false },
  RED_MEGATAG2: { topic: 'botpose_orb_wpired', isMegaTag2: true },
  BLUE: { topic: 'botpose_wpiblue', isMegaTag2: false },
  BLUE_MEGATAG2: { topic: 'botpose_orb_wpiblue', isMegaTag2: true },
} as const satisfies Record<string, PoseEstimatorDefinition>;

export type PoseEstimatorKind = keyof typeof POSE_ESTIMATORS;

export class PoseEstimator {
  readonly kind: PoseEstimatorKind;
  private readonly definition: PoseEstimatorDefinition;
  private readonly subscriber: TopicSubscriber<number[]>;
  private readonly logger: Logger;

  constructor(
    private readonly networkTable: NetworkTable,
    kind: PoseEstimatorKind
  ) {
    this.kind = kind;
    this.definition = POSE_ESTIMATORS[kind];
    this.subscriber = networkTable.subscribeNumberArray(this.definition.topic, []);
    this.logger = createChildLogger({
      component: 'PoseEstimator',
      camera: networkTable.name,
      estimator: kind,
    });
  }

  get isMegaTag2(): boolean {
    return this.definition.isMegaTag2;
  }

  /**
   * Every sample published since the previous call, oldest first.
   * Empty samples decode to null.
   */
  getBotPoseEstimates(): Array<PoseEstimate | null> {
    const samples = this.subscriber.readQueue();
    const estimates = samples.map((sample) => decodePoseEstimate(sample, this.definition.isMegaTag2));

    this.logger.debug(
      {
        sampleCount: samples.length,
        validCount: estimates.filter(isValidPoseEstimate).length,
      },
      'Read pose estimates'
    );

    return estimates;
  }

  getRawFiducialTargets(): RawFiducialTarget[] {
    return decodeRawFiducials(this.networkTable.getNumberArray(READ_KEYS.rawFiducials, []));
  }

  validPoseEstimate(estimate: PoseEstimate | null | undefined): estimate is PoseEstimate {
    return isValidPoseEstimate(estimate);
  }

  /**
   * Release the topic subscription
   */
  close(): void {
    this.subscriber.close();
  }
}
