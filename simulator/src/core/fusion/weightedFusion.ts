/**
 * 가중 평균 위치 융합
 *
 * 가중치 = 1/tr(R) × 1/(1 + 지연/200) × 품질 × 센서 유형 사전값
 *
 * 신뢰도:
 * - 측정값 2개 미만: 0.5 / surprise 0.5
 * - 그 외: 가중 분산(위경도 ÷1e-3, 고도 ÷10 스케일)에서 surprise 산출
 */

import { POSITION_SENSOR_TYPES } from '../../../../shared/schemas';
import { FusionConfig } from '../../config/fusionConfig';
import { FusedEstimate, SensorMeasurement, createFusedEstimate } from '../models';
import { clamp, trace } from '../math/matrix';
import { FusionStrategy } from './types';

const MIN_TRACE = 1e-9;
const MIN_WEIGHT_SUM = 1e-12;
const DEFAULT_PRIOR = 0.5;

/** 위치 성분 스케일 (위도, 경도, 고도) */
const DEVIATION_SCALE = [1e-3, 1e-3, 10];

/**
 * 위치 측정값이 하나도 없을 때의 추정값
 */
export function fallbackEstimate(): FusedEstimate {
  return createFusedEstimate({
    lat: 0,
    lon: 0,
    altitudeM: 0,
    velocityMps: 0,
    headingDeg: 0,
    threatIndex: 0,
    civDensity: 0,
    fusionConf: 0.1,
    surprise: 1.0,
    sensorContrib: {},
    usedMeasCount: 0,
  });
}

/**
 * 측정값 하나의 원시 가중치 (정규화 전)
 */
export function measurementWeight(m: SensorMeasurement, config: FusionConfig): number {
  const invTrace = 1 / Math.max(trace(m.R), MIN_TRACE);
  const latencyFactor = 1 / (1 + m.latencyMs / 200);
  const quality = clamp(m.quality, 0, 1);
  const prior = config.positionFusionWeight[m.sensorType] ?? DEFAULT_PRIOR;
  return Math.max(0, invTrace * latencyFactor * quality * prior);
}

/**
 * 가중치 정규화 (합이 0이면 균등)
 */
export function normalizeWeights(raw: readonly number[]): number[] {
  const sum = raw.reduce((acc, w) => acc + w, 0);
  if (sum <= MIN_WEIGHT_SUM) {
    return raw.map(() => 1 / raw.length);
  }
  return raw.map((w) => w / sum);
}

/**
 * 가중 분산 기반 신뢰도 / surprise
 */
export function confidenceFromDispersion(
  positions: readonly (readonly number[])[],
  weights: readonly number[],
  fused: readonly number[]
): { fusionConf: number; surprise: number } {
  if (positions.length < 2) {
    return { fusionConf: 0.5, surprise: 0.5 };
  }

  let weightedSq = 0;
  positions.forEach((p, i) => {
    let sq = 0;
    for (let k = 0; k < 3; k++) {
      const d = (p[k] - fused[k]) / DEVIATION_SCALE[k];
      sq += d * d;
    }
    weightedSq += weights[i] * sq;
  });

  const dispersion = Math.sqrt(weightedSq);
  const surprise = clamp(dispersion / 2, 0, 1);
  return { fusionConf: clamp(1 - surprise, 0, 1), surprise };
}

export class WeightedFusion implements FusionStrategy {
  readonly name = 'weighted' as const;
  private config: FusionConfig;

  constructor(config: FusionConfig) {
    this.config = config;
  }

  fuse(measurements: readonly SensorMeasurement[]): FusedEstimate {
    const candidates = measurements.filter(
      (m) => !m.dropped && POSITION_SENSOR_TYPES.includes(m.sensorType) && m.z.length >= 3
    );

    if (candidates.length === 0) {
      return fallbackEstimate();
    }

    const weights = normalizeWeights(candidates.map((m) => measurementWeight(m, this.config)));
    const positions = candidates.map((m) => [m.z[0], m.z[1], m.z[2]]);

    const fused = [0, 0, 0];
    positions.forEach((p, i) => {
      for (let k = 0; k < 3; k++) {
        fused[k] += weights[i] * p[k];
      }
    });

    // 같은 센서가 여러 틱에 걸쳐 선택되면 기여도 합산
    const sensorContrib: Record<string, number> = {};
    candidates.forEach((m, i) => {
      sensorContrib[m.sensorId] = (sensorContrib[m.sensorId] ?? 0) + weights[i];
    });

    const { fusionConf, surprise } = confidenceFromDispersion(positions, weights, fused);

    return createFusedEstimate({
      lat: fused[0],
      lon: fused[1],
      altitudeM: fused[2],
      // 속도/방위는 위치 융합에서 추정하지 않음
      velocityMps: 0,
      headingDeg: 0,
      threatIndex: 0,
      civDensity: 0,
      fusionConf,
      surprise,
      sensorContrib,
      usedMeasCount: candidates.length,
    });
  }
}
