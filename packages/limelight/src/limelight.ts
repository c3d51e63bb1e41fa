/**
 * Limelight
 * Handle for one camera: its table, settings, results and snapshot endpoint
 */

import { z } from 'zod';
import { getDefaultInstance } from '@llvision/networktables';
import type { NetworkTable, NetworkTableInstance } from '@llvision/networktables';
import {
  DEFAULT_SNAPSHOT_PORT,
  NetworkError,
  ValidationError,
  createChildLogger,
  getConfig,
  wrapError,
} from '@llvision/shared';
import type { Logger } from '@llvision/shared';
import { PipelineDataCollator } from './collator/pipeline-data-collator.js';
import type { Rotation3d } from './geometry/index.js';
import { WRITE_KEYS } from './keys.js';
import { PoseEstimator } from './pose/index.js';
import type { PoseEstimatorKind } from './pose/index.js';
import { LimelightSettings } from './settings/limelight-settings.js';
import { sanitizeName } from './wire/pose-arrays.js';

const limelightOptionsSchema = z.object({
  name: z.string().optional(),
  snapshotPort: z.number().int().min(1).max(65535).default(DEFAULT_SNAPSHOT_PORT),
  snapshotTimeoutMs: z.number().int().positive().optional(),
});

export interface LimelightOptions {
  /** Hostname without `.local`; blank means "limelight" */
  name?: string;
  /** Table instance to use; the process-wide default when omitted */
  instance?: NetworkTableInstance;
  snapshotPort?: number;
  /** Abort snapshot requests after this long. No timeout when omitted. */
  snapshotTimeoutMs?: number;
}

export class Limelight {
  readonly name: string;
  readonly networkTable: NetworkTable;
  readonly settings: LimelightSettings;
  readonly dataCollator: PipelineDataCollator;

  private readonly snapshotPort: number;
  private readonly snapshotTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: LimelightOptions = {}) {
    const { instance, ...rest } = options;
    const parsed = limelightOptionsSchema.safeParse(rest);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid Limelight options: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`
      );
    }

    this.name = sanitizeName(parsed.data.name);
    this.snapshotPort = parsed.data.snapshotPort;
    this.snapshotTimeoutMs = parsed.data.snapshotTimeoutMs;
    this.networkTable = (instance ?? getDefaultInstance()).getTable(this.name);
    this.settings = new LimelightSettings(this.networkTable);
    this.dataCollator = new PipelineDataCollator(this.networkTable);
    this.logger = createChildLogger({ component: 'Limelight', camera: this.name });
  }

  /**
   * Publish the robot's orientation for MegaTag2. Call every loop while using it.
   * Angular rates are not sent.
   */
  setRobotOrientation(rotation: Rotation3d): void {
    this.networkTable.setNumberArray(WRITE_KEYS.robotOrientation, [
      rotation.yawDegrees,
      0,
      rotation.pitchDegrees,
      0,
      rotation.rollDegrees,
      0,
    ]);
    this.networkTable.getInstance().flush();
  }

  makePoseEstimator(kind: PoseEstimatorKind): PoseEstimator {
    return new PoseEstimator(this.networkTable, kind);
  }

  /**
   * URL for a request on the camera's HTTP server, or null when it is malformed
   */
  getUrl(request: string): URL | null {
    const address = `http://${this.name}.local:${this.snapshotPort}/${request}`;
    try {
      return new URL(address);
    } catch (error) {
      this.logger.error({ err: wrapError(error), address }, 'Bad Limelight URL');
      return null;
    }
  }

  /**
   * Ask the camera to store a snapshot. Resolves true when the camera answers 200;
   * failures are logged and resolve false.
   */
  async captureSnapshot(snapshotName?: string): Promise<boolean> {
    const url = this.getUrl('capturesnapshot');
    if (!url) {
      return false;
    }

    const headers: Record<string, string> = {};
    if (snapshotName) {
      headers.snapname = snapshotName;
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: this.snapshotTimeoutMs === undefined ? undefined : AbortSignal.timeout(this.snapshotTimeoutMs),
      });

      if (response.status !== 200) {
        throw new NetworkError(`Bad snapshot response: ${response.status} ${response.statusText}`, response.status, {
          camera: this.name,
        });
      }

      this.logger.debug({ snapshotName }, 'Snapshot captured');
      return true;
    } catch (error) {
      const networkError =
        error instanceof NetworkError
          ? error
          : new NetworkError(`Snapshot request failed: ${wrapError(error).message}`, undefined, {
              camera: this.name,
            });
      this.logger.error({ err: networkError, snapshotName }, 'Snapshot failed');
      return false;
    }
  }

  /**
   * Fire-and-forget snapshot; the outcome is only logged
   */
  snapshot(snapshotName?: string): void {
    void this.captureSnapshot(snapshotName);
  }
}

/**
 * Build a handle from LIMELIGHT_* environment configuration
 */
export function createLimelightFromEnv(instance?: NetworkTableInstance): Limelight {
  const { limelight } = getConfig();
  return new Limelight({
    name: limelight.name,
    instance,
    snapshotPort: limelight.snapshotPort,
    snapshotTimeoutMs: limelight.snapshotTimeoutMs,
  });
}
