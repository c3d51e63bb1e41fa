/**
 * Zod schemas for the camera's JSON results dump
 *
 * Wire keys are short and mixed-case; each schema maps them onto camelCase
 * names. Unknown keys are dropped so newer firmware fields do not break
 * parsing. Missing or null values fall back to zero, empty strings, empty
 * lists, or six-zero pose arrays.
 */

import { z } from 'zod';

const EMPTY_POSE_ARRAY: readonly number[] = [0, 0, 0, 0, 0, 0];

const numberField = () => z.number().nullish().transform((value) => value ?? 0);

const stringField = () => z.string().nullish().transform((value) => value ?? '');

const poseArrayField = () =>
  z
    .array(z.number())
    .nullish()
    .transform((value) => value ?? [...EMPTY_POSE_ARRAY]);

const listField = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);

// `v` is published as 0/1
const flagField = () =>
  z
    .union([z.number(), z.boolean()])
    .nullish()
    .transform((value) => value === true || (typeof value === 'number' && value !== 0));

const targetPoseFields = {
  t6c_ts: poseArrayField(),
  t6r_fs: poseArrayField(),
  t6r_ts: poseArrayField(),
  t6t_cs: poseArrayField(),
  t6t_rs: poseArrayField(),
};

const targetAngleFields = {
  ta: numberField(),
  tx: numberField(),
  ty: numberField(),
  txp: numberField(),
  typ: numberField(),
  tx_nocross: numberField(),
  ty_nocross: numberField(),
};

/**
 * Color/retroreflective pipeline target
 */
export const retroreflectiveTargetSchema = z
  .object({
    ...targetPoseFields,
    ...targetAngleFields,
    ts: numberField(),
  })
  .transform((raw) => ({
    cameraPoseTargetSpace: raw.t6c_ts,
    robotPoseFieldSpace: raw.t6r_fs,
    robotPoseTargetSpace: raw.t6r_ts,
    targetPoseCameraSpace: raw.t6t_cs,
    targetPoseRobotSpace: raw.t6t_rs,
    ta: raw.ta,
    tx: raw.tx,
    ty: raw.ty,
    txPixels: raw.txp,
    tyPixels: raw.typ,
    txNoCrosshair: raw.tx_nocross,
    tyNoCrosshair: raw.ty_nocross,
    ts: raw.ts,
  }));

/**
 * AprilTag pipeline target
 */
export const fiducialTargetSchema = z
  .object({
    fID: numberField(),
    fam: stringField(),
    ...targetPoseFields,
    ...targetAngleFields,
    ts: numberField(),
  })
  .transform((raw) => ({
    fiducialId: raw.fID,
    fiducialFamily: raw.fam,
    cameraPoseTargetSpace: raw.t6c_ts,
    robotPoseFieldSpace: raw.t6r_fs,
    robotPoseTargetSpace: raw.t6r_ts,
    targetPoseCameraSpace: raw.t6t_cs,
    targetPoseRobotSpace: raw.t6t_rs,
    ta: raw.ta,
    tx: raw.tx,
    ty: raw.ty,
    txPixels: raw.txp,
    tyPixels: raw.typ,
    txNoCrosshair: raw.tx_nocross,
    tyNoCrosshair: raw.ty_nocross,
    ts: raw.ts,
  }));

/**
 * Neural classifier pipeline result
 */
export const classifierTargetSchema = z
  .object({
    class: stringField(),
    classID: numberField(),
    conf: numberField(),
    zone: numberField(),
    tx: numberField(),
    txp: numberField(),
    ty: numberField(),
    typ: numberField(),
  })
  .transform((raw) => ({
    className: raw.class,
    classId: raw.classID,
    confidence: raw.conf,
    zone: raw.zone,
    tx: raw.tx,
    txPixels: raw.txp,
    ty: raw.ty,
    tyPixels: raw.typ,
  }));

/**
 * Neural detector pipeline result
 */
export const detectorTargetSchema = z
  .object({
    class: stringField(),
    classID: numberField(),
    conf: numberField(),
    ...targetAngleFields,
  })
  .transform((raw) => ({
    className: raw.class,
    classId: raw.classID,
    confidence: raw.conf,
    ta: raw.ta,
    tx: raw.tx,
    ty: raw.ty,
    txPixels: raw.txp,
    tyPixels: raw.typ,
    txNoCrosshair: raw.tx_nocross,
    tyNoCrosshair: raw.ty_nocross,
  }));

/**
 * Barcode pipeline result
 */
export const barcodeTargetSchema = z
  .object({
    fam: stringField(),
    data: stringField(),
    ...targetAngleFields,
    pts: listField(z.array(z.number())),
  })
  .transform((raw) => ({
    family: raw.fam,
    data: raw.data,
    txPixels: raw.txp,
    tyPixels: raw.typ,
    tx: raw.tx,
    ty: raw.ty,
    txNoCrosshair: raw.tx_nocross,
    tyNoCrosshair: raw.ty_nocross,
    ta: raw.ta,
    corners: raw.pts,
  }));

/**
 * One full processing cycle
 */
export const pipelineResultSchema = z
  .object({
    pID: numberField(),
    tl: numberField(),
    cl: numberField(),
    ts: numberField(),
    ts_rio: numberField(),
    v: flagField(),
    botpose: poseArrayField(),
    botpose_wpired: poseArrayField(),
    botpose_wpiblue: poseArrayField(),
    botpose_tagcount: numberField(),
    botpose_span: numberField(),
    botpose_avgdist: numberField(),
    botpose_avgarea: numberField(),
    t6c_rs: poseArrayField(),
    Retro: listField(retroreflectiveTargetSchema),
    Fiducial: listField(fiducialTargetSchema),
    Classifier: listField(classifierTargetSchema),
    Detector: listField(detectorTargetSchema),
    Barcode: listField(barcodeTargetSchema),
  })
  .transform((raw) => ({
    pipelineId: raw.pID,
    pipelineLatency: raw.tl,
    captureLatency: raw.cl,
    /** Milliseconds since camera boot */
    publishTimestamp: raw.ts,
    rioCaptureTimestamp: raw.ts_rio,
    valid: raw.v,
    botpose: raw.botpose,
    botposeWpiRed: raw.botpose_wpired,
    botposeWpiBlue: raw.botpose_wpiblue,
    botposeTagCount: raw.botpose_tagcount,
    botposeSpan: raw.botpose_span,
    botposeAvgDist: raw.botpose_avgdist,
    botposeAvgArea: raw.botpose_avgarea,
    cameraPoseRobotSpace: raw.t6c_rs,
    retroreflective: raw.Retro,
    fiducials: raw.Fiducial,
    classifiers: raw.Classifier,
    detectors: raw.Detector,
    barcodes: raw.Barcode,
  }));

export type RetroreflectiveTarget = z.output<typeof retroreflectiveTargetSchema>;
export type FiducialTarget = z.output<typeof fiducialTargetSchema>;
export type ClassifierTarget = z.output<typeof classifierTargetSchema>;
export type DetectorTarget = z.output<typeof detectorTargetSchema>;
export type BarcodeTarget = z.output<typeof barcodeTargetSchema>;
export type DecodedPipelineResult = z.output<typeof pipelineResultSchema>;
