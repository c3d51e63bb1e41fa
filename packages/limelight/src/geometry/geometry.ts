/**
 * Geometry
 * Minimal 2D/3D pose types for camera and robot transforms.
 * Distances are meters, angles are stored in radians.
 */

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radiansToDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export class Translation3d {
  constructor(
    readonly x: number = 0,
    readonly y: number = 0,
    readonly z: number = 0
  ) {}

  /**
   * Straight-line distance from the origin
   */
  getNorm(): number {
    return Math.hypot(this.x, this.y, this.z);
  }
}

/**
 * Extrinsic roll (X), pitch (Y), yaw (Z) rotation
 */
export class Rotation3d {
  constructor(
    readonly roll: number = 0,
    readonly pitch: number = 0,
    readonly yaw: number = 0
  ) {}

  static fromDegrees(roll: number, pitch: number, yaw: number): Rotation3d {
    return new Rotation3d(degreesToRadians(roll), degreesToRadians(pitch), degreesToRadians(yaw));
  }

  get rollDegrees(): number {
    return radiansToDegrees(this.roll);
  }

  get pitchDegrees(): number {
    return radiansToDegrees(this.pitch);
  }

  get yawDegrees(): number {
    return radiansToDegrees(this.yaw);
  }
}

export class Pose2d {
  constructor(
    readonly x: number = 0,
    readonly y: number = 0,
    /** Heading in radians, counter-clockwise positive */
    readonly heading: number = 0
  ) {}

  get headingDegrees(): number {
    return radiansToDegrees(this.heading);
  }
}

export class Pose3d {
  constructor(
    readonly translation: Translation3d = new Translation3d(),
    readonly rotation: Rotation3d = new Rotation3d()
  ) {}

  get x(): number {
    return this.translation.x;
  }

  get y(): number {
    return this.translation.y;
  }

  get z(): number {
    return this.translation.z;
  }

  /**
   * Project onto the floor plane, keeping yaw as the heading
   */
  toPose2d(): Pose2d {
    return new Pose2d(this.translation.x, this.translation.y, this.rotation.yaw);
  }
}
