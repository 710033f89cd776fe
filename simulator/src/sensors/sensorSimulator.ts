/**
 * 합성 센서 시뮬레이터
 *
 * 틱당 센서별 측정값 1개 생성.
 * 난수 소비 순서 고정: LINK → IMU → BARO → GNSS → EOIR → (RADAR)
 */

import { GroundTruth, SensorContext } from '../types';
import { EnvironmentProfile } from '../core/scenario/presets';
import { SeededRandom } from '../core/random/seededRandom';
import { SensorMeasurement } from '../core/models';
import { simulateLink } from './linkSensor';
import { simulateImu } from './imuSensor';
import { simulateBaro } from './baroSensor';
import { simulateGnss } from './gnssSensor';
import { simulateEoir } from './eoirSensor';
import { simulateRadar, RADAR_COVERAGE_PROBABILITY } from './radar';

export class SensorSimulator {
  /**
   * 모든 센서 시뮬레이션 (한 틱)
   *
   * @param ctx 생성 중인 틱 번호와 타임스탬프
   * @param truth 해당 틱의 실측값
   * @param env 환경 열화 프로필
   * @param rng 틱별 난수 생성기
   */
  simulateAll(
    ctx: SensorContext,
    truth: GroundTruth,
    env: EnvironmentProfile,
    rng: SeededRandom
  ): SensorMeasurement[] {
    const measurements: SensorMeasurement[] = [];

    const link = simulateLink(ctx, env, rng);
    measurements.push(link);
    const commsLoss = typeof link.meta.comms_loss === 'number' ? link.meta.comms_loss : 0;

    measurements.push(simulateImu(ctx, env, rng));
    measurements.push(simulateBaro(ctx, truth, rng));
    measurements.push(simulateGnss(ctx, truth, env, rng));
    measurements.push(simulateEoir(ctx, truth, env, rng, commsLoss));

    // 레이더는 간헐적으로만 관측
    if (rng.chance(RADAR_COVERAGE_PROBABILITY)) {
      measurements.push(simulateRadar(ctx, truth, rng));
    }

    return measurements;
  }
}
