/**
 * 기압 고도계 모델 (σ = 7m)
 */

import { GroundTruth, SensorContext } from '../types';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix } from '../core/math/matrix';

export const BARO_SENSOR_ID = 'BARO_1';

export function simulateBaro(
  ctx: SensorContext,
  truth: GroundTruth,
  rng: SeededRandom
): SensorMeasurement {
  const altBaro = truth.altitudeM + rng.normal(0, 7.0);

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: BARO_SENSOR_ID,
    sensorType: 'BARO',
    z: [altBaro, 0, 0],
    R: diagonalMatrix([49, 1, 1]),
    quality: 0.85,
    latencyMs: clamp(30 + rng.normal(0, 10), 5, 80),
    dropped: false,
    meta: { altitude_m_baro: altBaro },
  });
}
