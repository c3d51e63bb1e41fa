/**
 * Limelight Settings
 * Chainable writes of camera-side configuration
 *
 * Each with* call is one immediate table write. Writes reach the camera on the
 * next network update; save() pushes them out right away. Nothing is cached
 * locally and nothing is read back.
 */

import type { NetworkTable } from '@llvision/networktables';
import { logSettingWrite } from '@llvision/shared';
import type { Pose3d, Translation3d } from '../geometry/index.js';
import { WRITE_KEYS } from '../keys.js';
import type { WriteKey } from '../keys.js';
import { pose3dToArray, translation3dToArray } from '../wire/pose-arrays.js';

export const LED_MODES = {
  PipelineControl: 0,
  ForceOff: 1,
  ForceBlink: 2,
  ForceOn: 3,
} as const;

export type LedMode = keyof typeof LED_MODES;

export const STREAM_MODES = {
  Standard: 0,
  /** Secondary camera stream placed in the lower-right corner of the primary stream */
  PictureInPictureMain: 1,
  /** Primary camera stream placed in the lower-right corner of the secondary stream */
  PictureInPictureSecondary: 2,
} as const;

export type StreamMode = keyof typeof STREAM_MODES;

/**
 * Fiducial pipeline resolution override; Pipeline keeps the pipeline's own setting
 */
export const DOWNSCALING_OVERRIDES = {
  Pipeline: 0,
  NoDownscale: 1,
  HalfDownscale: 2,
  DoubleDownscale: 3,
  TripleDownscale: 4,
  QuadrupleDownscale: 5,
} as const;

export type DownscalingOverride = keyof typeof DOWNSCALING_OVERRIDES;

export const IMU_MODES = {
  /** Use the robot orientation published by the robot */
  ExternalImu: 0,
  /** Use the robot orientation and seed the internal IMU with it */
  SyncInternalImu: 1,
  InternalImu: 2,
  /** Internal IMU with MegaTag1 yaw corrections */
  MT1AssistInternalImu: 3,
  /** Internal IMU with corrections from the robot-published orientation */
  ExternalAssistInternalImu: 4,
} as const;

export type ImuMode = keyof typeof IMU_MODES;

export class LimelightSettings {
  constructor(private readonly networkTable: NetworkTable) {}

  withLedMode(mode: LedMode): this {
    return this.writeNumber(WRITE_KEYS.ledMode, LED_MODES[mode]);
  }

  withPipelineIndex(index: number): this {
    return this.writeNumber(WRITE_KEYS.pipelineIndex, index);
  }

  /**
   * Tag used for tx/ty targeting when several are in view
   */
  withPriorityTagId(aprilTagId: number): this {
    return this.writeNumber(WRITE_KEYS.priorityTagId, aprilTagId);
  }

  withStreamMode(mode: StreamMode): this {
    return this.writeNumber(WRITE_KEYS.streamMode, STREAM_MODES[mode]);
  }

  /**
   * Crop the processed image. Bounds are normalized to -1..1.
   */
  withCropWindow(minX: number, maxX: number, minY: number, maxY: number): this {
    return this.writeNumberArray(WRITE_KEYS.cropWindow, [minX, maxX, minY, maxY]);
  }

  withImuMode(mode: ImuMode): this {
    return this.writeNumber(WRITE_KEYS.imuMode, IMU_MODES[mode]);
  }

  /**
   * Complementary filter alpha for the IMU assist modes. The camera default is 0.001.
   */
  withImuAssistAlpha(alpha: number): this {
    return this.writeNumber(WRITE_KEYS.imuAssistAlpha, alpha);
  }

  /**
   * Process one frame, then skip `skippedFrames`. Useful to keep temperatures down while disabled.
   */
  withProcessedFrameFrequency(skippedFrames: number): this {
    return this.writeNumber(WRITE_KEYS.processFrameFrequency, skippedFrames);
  }

  withFiducialDownscalingOverride(downscalingOverride: DownscalingOverride): this {
    return this.writeNumber(WRITE_KEYS.fiducialDownscale, DOWNSCALING_OVERRIDES[downscalingOverride]);
  }

  /**
   * Point of interest relative to the tracked tag, meters
   */
  withAprilTagOffset(offset: Translation3d): this {
    return this.writeNumberArray(WRITE_KEYS.fiducial3DOffset, translation3dToArray(offset));
  }

  /**
   * Only these tag ids are used for localization
   */
  withAprilTagIdFilter(idFilter: readonly number[]): this {
    return this.writeNumberArray(WRITE_KEYS.fiducialIdFilters, idFilter);
  }

  /**
   * Camera pose relative to the robot center
   */
  withCameraOffset(offset: Pose3d): this {
    return this.writeNumberArray(WRITE_KEYS.cameraToRobot, pose3dToArray(offset));
  }

  /**
   * Push every pending write to the network now
   */
  save(): void {
    this.networkTable.getInstance().flush();
  }

  private writeNumber(key: WriteKey, value: number): this {
    this.networkTable.setNumber(key, value);
    logSettingWrite(this.networkTable.name, key, value);
    return this;
  }

  private writeNumberArray(key: WriteKey, value: readonly number[]): this {
    this.networkTable.setNumberArray(key, value);
    logSettingWrite(this.networkTable.name, key, value);
    return this;
  }
}
