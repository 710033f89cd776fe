/**
 * EO/IR 카메라 모델
 *
 * 드롭 확률은 열화 계수와 상위 링크 두절에 함께 의존한다
 * (링크가 끊기면 EO/IR 도 신뢰도가 떨어짐).
 */

import { GroundTruth, SensorContext } from '../types';
import { EnvironmentProfile } from '../core/scenario/presets';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix, squared, vectorAdd, vectorScale } from '../core/math/matrix';

export const EOIR_SENSOR_ID = 'EOIR_1';

const BASE_STD = [0.0006, 0.0006, 8.0];
const DEGRADE_STD = [0.0013, 0.0013, 20.0];

export function simulateEoir(
  ctx: SensorContext,
  truth: GroundTruth,
  env: EnvironmentProfile,
  rng: SeededRandom,
  commsLoss: number
): SensorMeasurement {
  const degrade = env.eoirDegrade;
  const dropped = rng.chance(0.03 + degrade * 0.22 + commsLoss * 0.15);

  const std = vectorAdd(BASE_STD, vectorScale(degrade, DEGRADE_STD));
  const zTrue = [truth.lat, truth.lon, truth.altitudeM];

  if (dropped) {
    return createSensorMeasurement({
      tick: ctx.tick,
      utcTimestamp: ctx.utcTimestamp,
      sensorId: EOIR_SENSOR_ID,
      sensorType: 'EOIR',
      z: zTrue,
      R: diagonalMatrix(squared(std)),
      quality: 0,
      latencyMs: clamp(180 + rng.normal(0, 55), 80, 400),
      dropped: true,
      meta: { dropped_reason: 'synthetic_eoir_drop' },
    });
  }

  const noise = rng.normalVector(std);
  const hotRatio = clamp(truth.visionHotRatio + rng.normal(0, 0.03), 0, 1);

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: EOIR_SENSOR_ID,
    sensorType: 'EOIR',
    z: vectorAdd(zTrue, noise),
    R: diagonalMatrix(squared(std)),
    quality: clamp(0.82 - degrade * 0.55 - commsLoss * 0.2, 0.1, 0.85),
    latencyMs: clamp(140 + rng.normal(0, 45), 60, 320),
    dropped: false,
    meta: { hot_ratio: hotRatio },
  });
}
