/**
 * Target records decoded from the raw NetworkTables arrays
 */

/**
 * One AprilTag from `rawfiducials` or the tail of a botpose array
 */
export interface RawFiducialTarget {
  readonly id: number;
  /** Horizontal offset from the principal pixel, degrees */
  readonly txnc: number;
  /** Vertical offset from the principal pixel, degrees */
  readonly tync: number;
  /** Area as a percentage of the image */
  readonly ta: number;
  readonly distToCamera: number;
  readonly distToRobot: number;
  readonly ambiguity: number;
}

/**
 * One neural detector result from `rawdetections`
 */
export interface RawDetection {
  readonly classId: number;
  readonly txnc: number;
  readonly tync: number;
  readonly ta: number;
  readonly corner0X: number;
  readonly corner0Y: number;
  readonly corner1X: number;
  readonly corner1Y: number;
  readonly corner2X: number;
  readonly corner2Y: number;
  readonly corner3X: number;
  readonly corner3Y: number;
}
