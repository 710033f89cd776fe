/**
 * 합성 지상 실측값 생성
 *
 * 직전 실측값에서 출발하는 제한된 랜덤 워크.
 * 동압은 고도에 대한 지수 대기 밀도 모델로 계산한다.
 */

import { GroundTruth } from '../../types';
import { clamp } from '../math/matrix';
import { SeededRandom } from '../random/seededRandom';
import { AreaOfOperation, EnvironmentProfile, FlightEnvelope } from './presets';

/** 해면 공기 밀도 (kg/m³) */
const SEA_LEVEL_DENSITY = 1.225;
/** 밀도 척도 고도 (m) */
const DENSITY_SCALE_HEIGHT_M = 8000;
/** 마하 1 속도 근사 (m/s) */
const SPEED_OF_SOUND_MPS = 295;

const MAX_ALTITUDE_M = 18000;
const MAX_Q_KPA = 900;

const INITIAL_THREAT = 40;
const INITIAL_CIV_DENSITY = 0.3;

/**
 * 고도별 동압 (kPa)
 */
export function dynamicPressureKpa(velocityMps: number, altitudeM: number): number {
  const rho = SEA_LEVEL_DENSITY * Math.exp(-altitudeM / DENSITY_SCALE_HEIGHT_M);
  return clamp((0.5 * rho * velocityMps * velocityMps) / 1000, 0, MAX_Q_KPA);
}

/**
 * 다음 틱의 실측값 생성
 *
 * 난수 소비 순서: mach → 고도 → 열 → 위도 → 경도 → 위협 → 민간 밀도 → 열상 비율
 */
export function generateGroundTruth(
  previous: GroundTruth | null,
  area: AreaOfOperation,
  env: EnvironmentProfile,
  envelope: FlightEnvelope,
  rng: SeededRandom
): GroundTruth {
  const mach = clamp((previous?.mach ?? 0) + rng.uniform(0.01, 0.05), 0, envelope.maxMach);
  const altitudeM = clamp((previous?.altitudeM ?? 0) + rng.uniform(50, 150), 0, MAX_ALTITUDE_M);

  const velocityMps = mach * SPEED_OF_SOUND_MPS;
  const qKpa = dynamicPressureKpa(velocityMps, altitudeM);

  const thermalIndex = clamp(
    0.2 + 0.5 * (mach / envelope.maxMach) + env.thermalBias + rng.normal(0, 0.02),
    0,
    1
  );

  const lat = area.baseLat + rng.uniform(-area.latDelta, area.latDelta);
  const lon = area.baseLon + rng.uniform(-area.lonDelta, area.lonDelta);

  const threatIndex = clamp((previous?.threatIndex ?? INITIAL_THREAT) + rng.uniform(-5, 5), 0, 100);
  const civDensity = clamp(
    (previous?.civDensity ?? INITIAL_CIV_DENSITY) + rng.uniform(-0.05, 0.05),
    0,
    1
  );

  return {
    mach,
    velocityMps,
    altitudeM,
    qKpa,
    thermalIndex,
    gLoad: 1.0,
    lat,
    lon,
    threatIndex,
    civDensity,
    navDrift: 5.0,
    visionHotRatio: clamp(0.1 + rng.normal(0, 0.03), 0, 1),
  };
}
