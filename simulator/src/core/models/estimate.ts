/**
 * 융합 추정값 (FusedEstimate)
 */

import { z } from 'zod';
import { ValidationError } from './errors';

export interface FusedEstimate {
  readonly lat: number;
  readonly lon: number;
  readonly altitudeM: number;
  readonly velocityMps: number;
  readonly headingDeg: number;

  readonly threatIndex: number;
  readonly civDensity: number;

  /** 융합 신뢰도 (0~1) */
  readonly fusionConf: number;
  /** 측정값 간 불일치 (0~1) */
  readonly surprise: number;

  /** 센서 ID → 정규화 가중치 (비어있지 않으면 합 = 1) */
  readonly sensorContrib: Readonly<Record<string, number>>;
  readonly usedMeasCount: number;
}

export type FusedEstimateInput = Omit<FusedEstimate, 'sensorContrib'> & {
  sensorContrib?: Readonly<Record<string, number>>;
};

const CONTRIB_SUM_TOLERANCE = 1e-9;

const estimateSchema = z
  .object({
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    altitudeM: z.number().min(-1000).max(50000),
    velocityMps: z.number().min(0).max(2000),
    headingDeg: z.number().min(0).max(360),
    threatIndex: z.number().min(0).max(100),
    civDensity: z.number().min(0).max(1),
    fusionConf: z.number().min(0).max(1),
    surprise: z.number().min(0).max(1),
    sensorContrib: z.record(z.number().min(0).max(1)).default({}),
    usedMeasCount: z.number().int().nonnegative(),
  })
  .superRefine((e, ctx) => {
    const weights = Object.values(e.sensorContrib);
    if (weights.length === 0) return;
    const sum = weights.reduce((acc, w) => acc + w, 0);
    if (Math.abs(sum - 1) > CONTRIB_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sensorContrib'],
        message: `센서 기여도 합이 1이 아닙니다 (${sum})`,
      });
    }
  });

/**
 * 융합 추정값 생성 (검증 실패 시 ValidationError)
 */
export function createFusedEstimate(input: FusedEstimateInput): FusedEstimate {
  const result = estimateSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('FusedEstimate', result.error);
  }
  return Object.freeze({
    ...result.data,
    sensorContrib: Object.freeze({ ...result.data.sensorContrib }),
  });
}
