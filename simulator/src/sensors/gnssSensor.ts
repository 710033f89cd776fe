/**
 * GNSS 모델 (재밍 드롭 + 스푸핑 편향)
 *
 * - 드롭 확률: 2% + 25% × jam
 * - 표준편차: 기본 + jam 비례 항 (위경도/고도)
 * - 스푸핑: jam × 15% 확률로 독립 가우시안 편향 주입
 */

import { GroundTruth, SensorContext } from '../types';
import { EnvironmentProfile } from '../core/scenario/presets';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix, squared, vectorAdd, vectorScale } from '../core/math/matrix';

export const GNSS_SENSOR_ID = 'GNSS_A';

const BASE_STD = [0.00025, 0.00025, 3.5];
const JAM_STD = [0.0012, 0.0012, 15.0];
const SPOOF_STD = [0.002, 0.002, 10.0];

export function simulateGnss(
  ctx: SensorContext,
  truth: GroundTruth,
  env: EnvironmentProfile,
  rng: SeededRandom
): SensorMeasurement {
  const jam = env.gnssJamFactor;
  const dropped = rng.chance(0.02 + jam * 0.25);

  const std = vectorAdd(BASE_STD, vectorScale(jam, JAM_STD));
  const zTrue = [truth.lat, truth.lon, truth.altitudeM];

  if (dropped) {
    // 감사 기록용으로 부풀린 공분산은 유지
    return createSensorMeasurement({
      tick: ctx.tick,
      utcTimestamp: ctx.utcTimestamp,
      sensorId: GNSS_SENSOR_ID,
      sensorType: 'GNSS',
      z: zTrue,
      R: diagonalMatrix(squared(std)),
      quality: 0,
      latencyMs: clamp(120 + rng.normal(0, 35), 60, 300),
      dropped: true,
      meta: { dropped_reason: 'synthetic_jam_drop', jam_factor: jam },
    });
  }

  const noise = rng.normalVector(std);

  let spoofBias = [0, 0, 0];
  if (rng.chance(jam * 0.15)) {
    spoofBias = rng.normalVector(SPOOF_STD);
  }

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: GNSS_SENSOR_ID,
    sensorType: 'GNSS',
    z: vectorAdd(vectorAdd(zTrue, noise), spoofBias),
    R: diagonalMatrix(squared(std)),
    quality: clamp(0.95 - jam * 0.6, 0.15, 0.95),
    latencyMs: clamp(90 + rng.normal(0, 25), 40, 220),
    dropped: false,
    meta: { jam_factor: jam },
  });
}
