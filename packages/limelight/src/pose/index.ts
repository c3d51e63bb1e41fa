export type { PoseEstimate } from './pose-estimate.js';
export {
  createEmptyPoseEstimate,
  formatPoseEstimate,
  isValidPoseEstimate,
  logPoseEstimate,
} from './pose-estimate.js';
export { POSE_HEADER_LENGTH, decodePoseEstimate } from './pose-decoder.js';
export { POSE_ESTIMATORS, PoseEstimator } from './pose-estimator.js';
export type { PoseEstimatorDefinition, PoseEstimatorKind } from './pose-estimator.js';
