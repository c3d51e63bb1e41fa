export type {
  BarcodeTarget,
  ClassifierTarget,
  DecodedPipelineResult,
  DetectorTarget,
  FiducialTarget,
  RetroreflectiveTarget,
} from './schemas.js';
export {
  barcodeTargetSchema,
  classifierTargetSchema,
  detectorTargetSchema,
  fiducialTargetSchema,
  pipelineResultSchema,
  retroreflectiveTargetSchema,
} from './schemas.js';
export type { BotPoseField, PipelineResult, TargetPoseSpace } from './pipeline-result.js';
export {
  createEmptyPipelineResult,
  decodePipelineResult,
  getBotPose2d,
  getBotPose3d,
  getTargetPose2d,
  getTargetPose3d,
  parsePipelineResult,
} from './pipeline-result.js';
