/**
 * Pipeline Result
 * Decoding of the JSON results dump plus pose helpers for its arrays
 */

import type { ZodError } from 'zod';
import { ResultsParseError, wrapError } from '@llvision/shared';
import type { Pose2d, Pose3d } from '../geometry/index.js';
import { toPose2d, toPose3d } from '../wire/pose-arrays.js';
import { pipelineResultSchema } from './schemas.js';
import type { DecodedPipelineResult, FiducialTarget, RetroreflectiveTarget } from './schemas.js';

export interface PipelineResult extends DecodedPipelineResult {
  /** Set when the dump could not be decoded; every other field is then a default */
  error?: string;
  /** Milliseconds spent decoding the dump on this side */
  jsonParseLatency: number;
}

export type BotPoseField = 'generic' | 'wpiRed' | 'wpiBlue';

export type TargetPoseSpace =
  | 'cameraPoseTargetSpace'
  | 'robotPoseFieldSpace'
  | 'robotPoseTargetSpace'
  | 'targetPoseCameraSpace'
  | 'targetPoseRobotSpace';

export function createEmptyPipelineResult(): PipelineResult {
  return { ...pipelineResultSchema.parse({}), jsonParseLatency: 0 };
}

function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decode a results dump. Throws ResultsParseError on malformed JSON or
 * mistyped fields.
 */
export function decodePipelineResult(json: string): PipelineResult {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ResultsParseError(wrapError(error).message);
  }

  const parsed = pipelineResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResultsParseError(formatIssues(parsed.error));
  }

  return { ...parsed.data, jsonParseLatency: 0 };
}

/**
 * Decode a results dump, recording any failure on the result's `error` field
 */
export function parsePipelineResult(json: string): PipelineResult {
  try {
    return decodePipelineResult(json);
  } catch (error) {
    const parseError =
      error instanceof ResultsParseError ? error : new ResultsParseError(wrapError(error).message);
    return { ...createEmptyPipelineResult(), error: parseError.message };
  }
}

function botPoseArray(result: PipelineResult, field: BotPoseField): number[] {
  switch (field) {
    case 'wpiRed':
      return result.botposeWpiRed;
    case 'wpiBlue':
      return result.botposeWpiBlue;
    case 'generic':
      return result.botpose;
  }
}

export function getBotPose3d(result: PipelineResult, field: BotPoseField = 'generic'): Pose3d {
  return toPose3d(botPoseArray(result, field));
}

export function getBotPose2d(result: PipelineResult, field: BotPoseField = 'generic'): Pose2d {
  return toPose2d(botPoseArray(result, field));
}

export function getTargetPose3d(
  target: RetroreflectiveTarget | FiducialTarget,
  space: TargetPoseSpace
): Pose3d {
  return toPose3d(target[space]);
}

export function getTargetPose2d(
  target: RetroreflectiveTarget | FiducialTarget,
  space: TargetPoseSpace
): Pose2d {
  return toPose2d(target[space]);
}
