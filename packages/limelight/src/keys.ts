/**
 * Table keys published and consumed by the camera
 */

export const READ_KEYS = {
  rawDetections: 'rawdetections',
  rawFiducials: 'rawfiducials',
  targetValid: 'tv',
  targetX: 'tx',
  targetY: 'ty',
  targetXNoCrosshair: 'txnc',
  targetYNoCrosshair: 'tync',
  targetArea: 'ta',
  targetT2D: 't2d',
  classifierClass: 'tcclass',
  detectorClass: 'tdclass',
  pipelineLatency: 'tl',
  captureLatency: 'cl',
  pipelineIndex: 'getpipe',
  pipelineType: 'getpipetype',
  json: 'json',
  botPoseTargetSpace: 'botpose_targetspace',
  cameraPoseTargetSpace: 'camerapose_targetspace',
  targetPoseCameraSpace: 'targetpose_cameraspace',
  targetPoseRobotSpace: 'targetpose_robotspace',
  cameraPoseRobotSpace: 'camerapose_robotspace',
  standardDeviations: 'stddevs',
  targetColor: 'tc',
  tagId: 'tid',
  targetClass: 'tclass',
  rawBarcodes: 'rawbarcodes',
  hardwareMetrics: 'hw',
} as const;

export const WRITE_KEYS = {
  ledMode: 'ledMode',
  pipelineIndex: 'pipeline',
  priorityTagId: 'priorityid',
  streamMode: 'stream',
  cropWindow: 'crop',
  imuMode: 'imumode_set',
  imuAssistAlpha: 'imuassistalpha_set',
  processFrameFrequency: 'throttle_set',
  fiducialDownscale: 'fiducial_downscale_set',
  fiducial3DOffset: 'fiducial_offset_set',
  cameraToRobot: 'camerapose_robotspace_set',
  fiducialIdFilters: 'fiducial_id_filters_set',
  robotOrientation: 'robot_orientation_set',
} as const;

export type ReadKey = (typeof READ_KEYS)[keyof typeof READ_KEYS];
export type WriteKey = (typeof WRITE_KEYS)[keyof typeof WRITE_KEYS];
