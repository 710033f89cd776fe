/**
 * 데이터링크 모델
 *
 * 지연 = 환경 기본 지연 + 가우시안 지터 (40~800ms)
 * 통신 두절 확률 = 2% + 최대 8% (지연/600 비례)
 */

import { SensorContext } from '../types';
import { EnvironmentProfile } from '../core/scenario/presets';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { clamp, diagonalMatrix } from '../core/math/matrix';

export const LINK_SENSOR_ID = 'LINK_1';

export function simulateLink(
  ctx: SensorContext,
  env: EnvironmentProfile,
  rng: SeededRandom
): SensorMeasurement {
  const latency = clamp(env.latencyBase + rng.normal(0, env.latencyJitter), 40, 800);
  const commsLoss = rng.chance(0.02 + 0.08 * (latency / 600)) ? 1 : 0;

  return createSensorMeasurement({
    tick: ctx.tick,
    utcTimestamp: ctx.utcTimestamp,
    sensorId: LINK_SENSOR_ID,
    sensorType: 'LINK',
    z: [latency, commsLoss, 0],
    R: diagonalMatrix([25, 0.05, 1]),
    quality: clamp(1 - latency / 900, 0.1, 1),
    latencyMs: latency,
    dropped: false,
    meta: { comms_loss: commsLoss },
  });
}
