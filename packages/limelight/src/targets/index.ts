export type { RawDetection, RawFiducialTarget } from './types.js';
export {
  RAW_DETECTION_STRIDE,
  RAW_FIDUCIAL_STRIDE,
  decodeRawDetections,
  decodeRawFiducials,
  decodeStrided,
} from './raw-target-decoder.js';
