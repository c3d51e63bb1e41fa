/**
 * @llvision/limelight
 * Typed client for Limelight smart cameras
 */

export * from './geometry/index.js';
export * from './targets/index.js';
export * from './pose/index.js';
export * from './results/index.js';
export { READ_KEYS, WRITE_KEYS } from './keys.js';
export type { ReadKey, WriteKey } from './keys.js';
export {
  POSE_ARRAY_LENGTH,
  extractArrayEntry,
  pose3dToArray,
  sanitizeName,
  toInteger,
  toPose2d,
  toPose3d,
  translation3dToArray,
} from './wire/pose-arrays.js';
export { PipelineDataCollator } from './collator/pipeline-data-collator.js';
export type { LatestResultsOptions } from './collator/pipeline-data-collator.js';
export {
  DOWNSCALING_OVERRIDES,
  IMU_MODES,
  LED_MODES,
  LimelightSettings,
  STREAM_MODES,
} from './settings/limelight-settings.js';
export type { DownscalingOverride, ImuMode, LedMode, StreamMode } from './settings/limelight-settings.js';
export { Limelight, createLimelightFromEnv } from './limelight.js';
export type { LimelightOptions } from './limelight.js';
