export {
  Pose2d,
  Pose3d,
  Rotation3d,
  Translation3d,
  degreesToRadians,
  radiansToDegrees,
} from './geometry.js';
