/**
 * Geometry Tests
 */
import { describe, it, expect } from 'vitest';
import {
  Pose2d,
  Pose3d,
  Rotation3d,
  Translation3d,
  degreesToRadians,
  radiansToDegrees,
} from './geometry.js';

describe('angle conversion', () => {
  it('should convert between degrees and radians', () => {
    expect(degreesToRadians(180)).toBeCloseTo(Math.PI);
    expect(radiansToDegrees(Math.PI / 2)).toBeCloseTo(90);
  });
});

describe('Translation3d', () => {
  it('should default to the origin', () => {
    const translation = new Translation3d();

    expect(translation.x).toBe(0);
    expect(translation.y).toBe(0);
    expect(translation.z).toBe(0);
  });

  it('should compute the distance from the origin', () => {
    expect(new Translation3d(2, 3, 6).getNorm()).toBe(7);
  });
});

describe('Rotation3d', () => {
  it('should store degrees as radians', () => {
    const rotation = Rotation3d.fromDegrees(90, -45, 180);

    expect(rotation.roll).toBeCloseTo(Math.PI / 2);
    expect(rotation.pitch).toBeCloseTo(-Math.PI / 4);
    expect(rotation.yaw).toBeCloseTo(Math.PI);
    expect(rotation.yawDegrees).toBeCloseTo(180);
    expect(rotation.pitchDegrees).toBeCloseTo(-45);
    expect(rotation.rollDegrees).toBeCloseTo(90);
  });
});

describe('Pose3d', () => {
  it('should project onto the floor keeping yaw', () => {
    const pose = new Pose3d(new Translation3d(1.5, -2, 0.3), Rotation3d.fromDegrees(10, 20, 30));
    const flat = pose.toPose2d();

    expect(flat).toBeInstanceOf(Pose2d);
    expect(flat.x).toBe(1.5);
    expect(flat.y).toBe(-2);
    expect(flat.headingDegrees).toBeCloseTo(30);
  });

  it('should expose translation components', () => {
    const pose = new Pose3d(new Translation3d(4, 5, 6));

    expect([pose.x, pose.y, pose.z]).toEqual([4, 5, 6]);
    expect(pose.rotation.yaw).toBe(0);
  });
});
