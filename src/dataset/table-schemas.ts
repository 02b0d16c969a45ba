/**
 * Zod schemas describing the fields of every annotation table.
 *
 * Objects are strict: a key the table does not define is an error.
 * Optional fields may be omitted or null where the table allows it.
 *
 * @module dataset/table-schemas
 */

import { z } from 'zod';
import type { TableName, TableRecord } from './tables.js';

// ============================================================================
// Field types
// ============================================================================

const Token = z.string().min(1, 'Token must not be empty');
/** A token field where the empty string means "unset". */
const TokenRef = z.string();
const Timestamp = z.number().int();

const Vector3 = z.array(z.number()).length(3);
const Vector6 = z.array(z.number()).length(6);
const Quaternion = z.array(z.number()).length(4);
/** [xmin, ymin, xmax, ymax] */
const Roi = z.array(z.number()).length(4);

const CameraIntrinsic = z
  .array(z.array(z.number()))
  .refine((m) => m.length === 0 || (m.length === 3 && m.every((row) => row.length === 3)), {
    message: 'Expected an empty list or a 3x3 matrix',
  });

const CameraDistortion = z
  .array(z.number())
  .refine((v) => v.length === 0 || v.length === 5, { message: 'Expected 0 or 5 coefficients' });

export const FILE_FORMATS = ['jpg', 'png', 'pcd', 'bin', 'pcd.bin'] as const;
export const SENSOR_MODALITIES = ['lidar', 'camera', 'radar'] as const;
export const VISIBILITY_LEVELS = [
  'full',
  'most',
  'partial',
  'none',
  'unavailable',
  // Legacy percentage buckets
  'v0-40',
  'v40-60',
  'v60-80',
  'v80-100',
] as const;
export const SHIFT_STATES = ['PARK', 'REVERSE', 'NEUTRAL', 'HIGH', 'FORWARD', 'LOW', 'NONE'] as const;

const Ratio = z.number().min(0).max(1);

const AutolabelModel = z
  .object({
    name: z.string(),
    score: Ratio,
    uncertainty: Ratio.nullable().optional(),
  })
  .strict();

const RleMask = z
  .object({
    size: z.array(z.number().int().nonnegative()).length(2),
    counts: z.string(),
  })
  .strict();

const IndicatorState = z.enum(['on', 'off']);

// ============================================================================
// Tables
// ============================================================================

const AttributeSchema = z.object({ token: Token, name: z.string(), description: z.string() }).strict();

const CalibratedSensorSchema = z
  .object({
    token: Token,
    sensor_token: Token,
    translation: Vector3,
    rotation: Quaternion,
    camera_intrinsic: CameraIntrinsic,
    camera_distortion: CameraDistortion,
  })
  .strict();

const CategorySchema = z
  .object({
    token: Token,
    name: z.string(),
    description: z.string(),
    index: z.number().int().nonnegative().nullable().optional(),
  })
  .strict();

const EgoPoseSchema = z
  .object({
    token: Token,
    translation: Vector3,
    rotation: Quaternion,
    timestamp: Timestamp,
    twist: Vector6.nullable().optional(),
    acceleration: Vector3.nullable().optional(),
    geocoordinate: Vector3.nullable().optional(),
  })
  .strict();

const InstanceSchema = z
  .object({
    token: Token,
    category_token: Token,
    instance_name: z.string(),
    nbr_annotations: z.number().int().nonnegative(),
    first_annotation_token: TokenRef,
    last_annotation_token: TokenRef,
  })
  .strict();

const LogSchema = z
  .object({
    token: Token,
    logfile: z.string(),
    vehicle: z.string(),
    data_captured: z.string(),
    location: z.string(),
  })
  .strict();

const MapSchema = z
  .object({ token: Token, log_tokens: z.array(z.string()), category: z.string(), filename: z.string() })
  .strict();

const SampleSchema = z
  .object({ token: Token, timestamp: Timestamp, scene_token: TokenRef, next: TokenRef, prev: TokenRef })
  .strict();

const SampleAnnotationSchema = z
  .object({
    token: Token,
    sample_token: TokenRef,
    instance_token: TokenRef,
    attribute_tokens: z.array(z.string()),
    visibility_token: TokenRef,
    translation: Vector3,
    size: Vector3,
    rotation: Quaternion,
    num_lidar_pts: z.number().int(),
    num_radar_pts: z.number().int(),
    next: TokenRef,
    prev: TokenRef,
    velocity: Vector3.nullable().optional(),
    acceleration: Vector3.nullable().optional(),
  })
  .strict();

const SampleDataSchema = z
  .object({
    token: Token,
    sample_token: TokenRef,
    ego_pose_token: TokenRef,
    calibrated_sensor_token: TokenRef,
    filename: z.string(),
    fileformat: z.enum(FILE_FORMATS),
    width: z.number().int(),
    height: z.number().int(),
    timestamp: Timestamp,
    is_key_frame: z.boolean(),
    next: TokenRef,
    prev: TokenRef,
    is_valid: z.boolean().default(true),
    info_filename: z.string().nullable().optional(),
    autolabel_metadata: z.array(AutolabelModel).nullable().optional(),
  })
  .strict();

const SceneSchema = z
  .object({
    token: Token,
    name: z.string(),
    description: z.string(),
    log_token: TokenRef,
    nbr_samples: z.number().int().nonnegative(),
    first_sample_token: TokenRef,
    last_sample_token: TokenRef,
  })
  .strict();

const SensorSchema = z
  .object({ token: Token, channel: z.string(), modality: z.enum(SENSOR_MODALITIES) })
  .strict();

const VisibilitySchema = z
  .object({ token: Token, level: z.enum(VISIBILITY_LEVELS), description: z.string() })
  .strict();

const LidarsegSchema = z
  .object({ token: Token, sample_data_token: TokenRef, filename: z.string() })
  .strict();

const ObjectAnnSchema = z
  .object({
    token: Token,
    sample_data_token: TokenRef,
    instance_token: TokenRef,
    category_token: TokenRef,
    attribute_tokens: z.array(z.string()),
    bbox: Roi,
    mask: RleMask,
  })
  .strict();

const SurfaceAnnSchema = z
  .object({ token: Token, sample_data_token: TokenRef, category_token: TokenRef, mask: RleMask })
  .strict();

const KeypointSchema = z
  .object({
    token: Token,
    sample_data_token: TokenRef,
    instance_token: TokenRef,
    category_tokens: z.array(z.string()),
    keypoints: z.array(z.array(z.number()).length(2)),
    num_keypoints: z.number().int().nonnegative(),
  })
  .strict();

const OptionalNumber = z.number().nullable().optional();

const VehicleStateSchema = z
  .object({
    token: Token,
    timestamp: Timestamp,
    accel_pedal: OptionalNumber,
    brake_pedal: OptionalNumber,
    steer_pedal: OptionalNumber,
    steering_tire_angle: OptionalNumber,
    steering_wheel_angle: OptionalNumber,
    shift_state: z.enum(SHIFT_STATES).nullable().optional(),
    indicators: z
      .object({ left: IndicatorState, right: IndicatorState, hazard: IndicatorState })
      .strict()
      .nullable()
      .optional(),
    additional_info: z.object({ speed: OptionalNumber }).strict().nullable().optional(),
  })
  .strict();

export const TABLE_SCHEMAS: Readonly<Record<TableName, z.ZodTypeAny>> = {
  attribute: AttributeSchema,
  calibrated_sensor: CalibratedSensorSchema,
  category: CategorySchema,
  ego_pose: EgoPoseSchema,
  instance: InstanceSchema,
  log: LogSchema,
  map: MapSchema,
  sample: SampleSchema,
  sample_annotation: SampleAnnotationSchema,
  sample_data: SampleDataSchema,
  scene: SceneSchema,
  sensor: SensorSchema,
  visibility: VisibilitySchema,
  lidarseg: LidarsegSchema,
  object_ann: ObjectAnnSchema,
  surface_ann: SurfaceAnnSchema,
  keypoint: KeypointSchema,
  vehicle_state: VehicleStateSchema,
};

// ============================================================================
// Validation
// ============================================================================

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join('.') : '(record)';
}

/**
 * Validate every record of a table.
 *
 * @returns One line per issue: `[table] <token>: <path>: <message>`
 */
export function validateTableRecords(table: TableName, records: readonly TableRecord[]): string[] {
  const schema = TABLE_SCHEMAS[table];
  const problems: string[] = [];
  records.forEach((record, position) => {
    const result = schema.safeParse(record);
    if (result.success) return;
    const token = typeof record.token === 'string' && record.token !== '' ? record.token : `#${position}`;
    for (const issue of result.error.issues) {
      problems.push(`[${table}] ${token}: ${formatPath(issue.path)}: ${issue.message}`);
    }
  });
  return problems;
}
