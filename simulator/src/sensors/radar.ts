/**
 * Pseudo-Radar 시뮬레이션 모델
 *
 * 레이더 파라미터:
 * - coverage_probability: 55% (간헐적 커버리지)
 * - position_noise_sigma: 위경도 0.00045°, 고도 6.5m
 * - quality: 0.75 고정, 드롭 모델 없음
 */

import { GroundTruth, SensorContext } from '../types';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix, squared, vectorAdd } from '../core/math/matrix';

export const RADAR_SENSOR_ID = 'RADAR_1';
export const RADAR_COVERAGE_PROBABILITY = 0.55;

const RADAR_STD = [0.00045, 0.00045, 6.5];

export function simulateRadar(
  ctx: SensorContext,
  truth: GroundTruth,
  rng: SeededRandom
): SensorMeasurement {
  const noise = rng.normalVector(RADAR_STD);
  const zTrue = [truth.lat, truth.lon, truth.altitudeM];

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: RADAR_SENSOR_ID,
    sensorType: 'RADAR',
    z: vectorAdd(zTrue, noise),
    R: diagonalMatrix(squared(RADAR_STD)),
    quality: 0.75,
    latencyMs: clamp(110 + rng.normal(0, 35), 50, 280),
    dropped: false,
    meta: {},
  });
}
