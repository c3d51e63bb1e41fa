/**
 * Pipeline Data Collator
 * Per-call reads of the camera's published targeting data
 */

import type { NetworkTable } from '@llvision/networktables';
import { logResultsParse } from '@llvision/shared';
import type { Pose3d } from '../geometry/index.js';
import { READ_KEYS } from '../keys.js';
import { parsePipelineResult } from '../results/index.js';
import type { PipelineResult } from '../results/index.js';
import { decodeRawDetections, decodeRawFiducials } from '../targets/index.js';
import type { RawDetection, RawFiducialTarget } from '../targets/index.js';
import { extractArrayEntry, toInteger, toPose3d } from '../wire/pose-arrays.js';

/**
 * t2d layout: [targetValid, targetCount, targetLatency, captureLatency, tx, ty,
 * txnc, tync, ta, tid, classifierClassIndex, detectorClassIndex,
 * targetLongSidePixels, targetShortSidePixels, targetHorizontalExtentPixels,
 * targetVerticalExtentPixels, targetSkewDegrees]
 */
const T2D_LENGTH = 17;
const T2D_TARGET_COUNT = 1;
const T2D_CLASSIFIER_CLASS_INDEX = 10;
const T2D_DETECTOR_CLASS_INDEX = 11;

/** hw layout: [fps, cpuTemp, ramUsage, temp] */
const HW_FPS = 0;
const HW_CPU_TEMPERATURE = 1;
const HW_RAM_USAGE = 2;
const HW_TEMPERATURE = 3;

export interface LatestResultsOptions {
  /** Log the JSON decode time at info level */
  logParseTime?: boolean;
}

export class PipelineDataCollator {
  constructor(private readonly networkTable: NetworkTable) {}

  getRawDetections(): RawDetection[] {
    return decodeRawDetections(this.networkTable.getNumberArray(READ_KEYS.rawDetections, []));
  }

  getRawFiducialTargets(): RawFiducialTarget[] {
    return decodeRawFiducials(this.networkTable.getNumberArray(READ_KEYS.rawFiducials, []));
  }

  /**
   * Decode the JSON dump. Failures are reported on `error` rather than thrown.
   */
  getLatestResults(options: LatestResultsOptions = {}): PipelineResult {
    const start = performance.now();
    const result = parsePipelineResult(this.getJsonDump());
    const elapsedMs = performance.now() - start;

    result.jsonParseLatency = elapsedMs;
    if (options.logParseTime) {
      logResultsParse(this.networkTable.name, elapsedMs, result.error !== undefined);
    }

    return result;
  }

  hasValidTarget(): boolean {
    return this.networkTable.getNumber(READ_KEYS.targetValid, 0) === 1;
  }

  /**
   * Horizontal offset from the crosshair, degrees
   */
  getTx(): number {
    return this.networkTable.getNumber(READ_KEYS.targetX, 0);
  }

  /**
   * Vertical offset from the crosshair, degrees
   */
  getTy(): number {
    return this.networkTable.getNumber(READ_KEYS.targetY, 0);
  }

  /**
   * Horizontal offset from the principal pixel, degrees.
   * The most accurate 2D metric with a calibrated camera.
   */
  getTxnc(): number {
    return this.networkTable.getNumber(READ_KEYS.targetXNoCrosshair, 0);
  }

  getTync(): number {
    return this.networkTable.getNumber(READ_KEYS.targetYNoCrosshair, 0);
  }

  /**
   * Target area, 0-100 percent of the image
   */
  getTa(): number {
    return this.networkTable.getNumber(READ_KEYS.targetArea, 0);
  }

  getT2DArray(): number[] {
    return this.networkTable.getNumberArray(READ_KEYS.targetT2D, []);
  }

  getTargetCount(): number {
    return this.readT2DIndex(T2D_TARGET_COUNT);
  }

  getClassifierClassIndex(): number {
    return this.readT2DIndex(T2D_CLASSIFIER_CLASS_INDEX);
  }

  getDetectorClassIndex(): number {
    return this.readT2DIndex(T2D_DETECTOR_CLASS_INDEX);
  }

  getClassifierClass(): string {
    return this.networkTable.getString(READ_KEYS.classifierClass, '');
  }

  getDetectorClass(): string {
    return this.networkTable.getString(READ_KEYS.detectorClass, '');
  }

  /**
   * Milliseconds spent in the tracking loop this frame
   */
  getPipelineLatency(): number {
    return this.networkTable.getNumber(READ_KEYS.pipelineLatency, 0);
  }

  /**
   * Milliseconds between mid-exposure and the start of the tracking loop
   */
  getCaptureLatency(): number {
    return this.networkTable.getNumber(READ_KEYS.captureLatency, 0);
  }

  getCurrentPipelineIndex(): number {
    return this.networkTable.getNumber(READ_KEYS.pipelineIndex, 0);
  }

  /**
   * e.g. "pipe_fiducial", "pipe_color"
   */
  getCurrentPipelineType(): string {
    return this.networkTable.getString(READ_KEYS.pipelineType, '');
  }

  getJsonDump(): string {
    return this.networkTable.getString(READ_KEYS.json, '');
  }

  getBotPose3dTargetSpace(): Pose3d {
    return this.readPose(READ_KEYS.botPoseTargetSpace);
  }

  getCameraPose3dTargetSpace(): Pose3d {
    return this.readPose(READ_KEYS.cameraPoseTargetSpace);
  }

  getTargetPose3dCameraSpace(): Pose3d {
    return this.readPose(READ_KEYS.targetPoseCameraSpace);
  }

  getTargetPose3dRobotSpace(): Pose3d {
    return this.readPose(READ_KEYS.targetPoseRobotSpace);
  }

  getCameraPose3dRobotSpace(): Pose3d {
    return this.readPose(READ_KEYS.cameraPoseRobotSpace);
  }

  /**
   * MegaTag standard deviations:
   * [MT1x, MT1y, MT1z, MT1roll, MT1pitch, MT1yaw, MT2x, MT2y, MT2z, MT2roll, MT2pitch, MT2yaw].
   * Computed over the last few seconds of poses, so it lags and is only
   * meaningful while the robot is still. Not suitable for weighting estimates.
   */
  getStandardDeviations(): number[] {
    return this.networkTable.getNumberArray(READ_KEYS.standardDeviations, []);
  }

  /**
   * [H, S, V]
   */
  getTargetColor(): number[] {
    return this.networkTable.getNumberArray(READ_KEYS.targetColor, []);
  }

  getFiducialId(): number {
    return this.networkTable.getNumber(READ_KEYS.tagId, 0);
  }

  getNeuralClassId(): string {
    return this.networkTable.getString(READ_KEYS.targetClass, '');
  }

  getRawBarcodeData(): string[] {
    return this.networkTable.getStringArray(READ_KEYS.rawBarcodes, []);
  }

  getHardwareMetrics(): number[] {
    return this.networkTable.getNumberArray(READ_KEYS.hardwareMetrics, []);
  }

  getFps(): number {
    return extractArrayEntry(this.getHardwareMetrics(), HW_FPS);
  }

  getCpuTemperature(): number {
    return extractArrayEntry(this.getHardwareMetrics(), HW_CPU_TEMPERATURE);
  }

  getRamUsage(): number {
    return extractArrayEntry(this.getHardwareMetrics(), HW_RAM_USAGE);
  }

  getTemperature(): number {
    return extractArrayEntry(this.getHardwareMetrics(), HW_TEMPERATURE);
  }

  private readT2DIndex(index: number): number {
    const t2d = this.getT2DArray();
    if (t2d.length !== T2D_LENGTH) {
      return 0;
    }
    return toInteger(extractArrayEntry(t2d, index));
  }

  private readPose(key: string): Pose3d {
    return toPose3d(this.networkTable.getNumberArray(key, []));
  }
}
