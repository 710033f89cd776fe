/**
 * IMU 드리프트 모델
 */

import { SensorContext } from '../types';
import { EnvironmentProfile } from '../core/scenario/presets';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix } from '../core/math/matrix';

export const IMU_SENSOR_ID = 'IMU_1';

export function simulateImu(
  ctx: SensorContext,
  env: EnvironmentProfile,
  rng: SeededRandom
): SensorMeasurement {
  // 반정규 노이즈
  const drift = clamp(0.02 + env.imuDriftBias + Math.abs(rng.normal(0, 0.01)), 0.005, 0.12);

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: IMU_SENSOR_ID,
    sensorType: 'IMU',
    z: [drift, 0, 0],
    R: diagonalMatrix([0.0004, 1, 1]),
    quality: clamp(1 - drift / 0.15, 0.2, 1),
    latencyMs: clamp(20 + rng.normal(0, 8), 5, 60),
    dropped: false,
    meta: { imu_drift_deg_s: drift },
  });
}
