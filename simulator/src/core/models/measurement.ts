/**
 * 센서 측정값 (SensorMeasurement)
 *
 * 틱당 센서 하나의 판독값. 생성 시 모든 불변식을 검사하고
 * 이후에는 변경할 수 없다 (deep freeze).
 */

import { z } from 'zod';
import { SENSOR_TYPES, SensorType, MetaValue } from '../../../../shared/schemas';
import { ValidationError } from './errors';

export interface SensorMeasurement {
  readonly tick: number;
  readonly utcTimestamp: string;
  readonly sensorId: string;
  readonly sensorType: SensorType;
  /** 측정 벡터 (의미는 센서 유형별) */
  readonly z: readonly number[];
  /** 측정 공분산 (z 차원과 같은 정방 행렬) */
  readonly R: readonly (readonly number[])[];
  readonly quality: number;
  readonly latencyMs: number;
  /** 드롭된 측정값은 감사용으로만 남고 융합에서 제외된다 */
  readonly dropped: boolean;
  readonly meta: Readonly<Record<string, MetaValue>>;
}

export interface SensorMeasurementInput {
  tick: number;
  utcTimestamp: string;
  sensorId: string;
  sensorType: SensorType;
  z: readonly number[];
  R: readonly (readonly number[])[];
  quality: number;
  latencyMs: number;
  dropped?: boolean;
  meta?: Readonly<Record<string, MetaValue>>;
}

const metaValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const measurementSchema = z
  .object({
    tick: z.number().int().nonnegative(),
    utcTimestamp: z.string().min(1),
    sensorId: z.string().min(1),
    sensorType: z.enum(SENSOR_TYPES),
    z: z.array(z.number().finite()).min(1),
    R: z.array(z.array(z.number().finite())),
    quality: z.number().min(0).max(1),
    latencyMs: z.number().finite().nonnegative(),
    dropped: z.boolean().default(false),
    meta: z.record(metaValueSchema).default({}),
  })
  .superRefine((m, ctx) => {
    const n = m.R.length;
    if (n === 0 || m.R.some((row) => row.length !== n)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['R'],
        message: '공분산 행렬은 2차원 정방 행렬이어야 합니다',
      });
      return;
    }
    if (n !== m.z.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['R'],
        message: `공분산 차원(${n})이 측정 벡터 차원(${m.z.length})과 다릅니다`,
      });
    }
  });

/**
 * 측정값 생성 (검증 실패 시 ValidationError)
 */
export function createSensorMeasurement(input: SensorMeasurementInput): SensorMeasurement {
  const result = measurementSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('SensorMeasurement', result.error);
  }

  const data = result.data;
  return Object.freeze({
    ...data,
    z: Object.freeze([...data.z]),
    R: Object.freeze(data.R.map((row) => Object.freeze([...row]))),
    meta: Object.freeze({ ...data.meta }),
  });
}
