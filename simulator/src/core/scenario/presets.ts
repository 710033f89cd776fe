/**
 * 시나리오 프리셋
 *
 * 작전 구역 / 환경 열화 프로필 / 비행 포락선 / 거버넌스 임계값 / 임무 단계.
 * 모든 값은 합성 데이터이며 변경 불가.
 */

// ============================================
// 타입 정의
// ============================================

/** 작전 구역 (AO) */
export interface AreaOfOperation {
  readonly label: string;
  readonly baseLat: number;
  readonly baseLon: number;
  readonly latDelta: number;
  readonly lonDelta: number;
}

/** 환경 열화 프로필 */
export interface EnvironmentProfile {
  readonly name: string;
  readonly latencyBase: number;
  readonly latencyJitter: number;
  readonly thermalBias: number;
  readonly imuDriftBias: number;
  readonly gnssJamFactor: number;
  readonly eoirDegrade: number;
}

/** 비행 포락선 */
export interface FlightEnvelope {
  readonly name: string;
  readonly maxMach: number;
  readonly maxQKpa: number;
  readonly maxG: number;
  readonly maxThermalIndex: number;
  readonly maxLatencyMs: number;
  readonly description: string;
}

/** 거버넌스 임계값 프리셋 */
export interface ThresholdPreset {
  readonly name: string;
  readonly clarityThreshold: number;
  readonly threatThreshold: number;
  readonly description: string;
}

/** 임무 단계 */
export interface MissionStage {
  readonly code: string;
  readonly label: string;
  /** 단계 지속 틱 수 (마지막 단계는 종료되지 않음) */
  readonly duration: number;
  readonly flightPhase: string;
  readonly description: string;
}

// ============================================
// 프리셋 정의
// ============================================

export const AO_PRESETS: Readonly<Record<string, AreaOfOperation>> = {
  'Kharkiv (synthetic)': {
    label: 'Kharkiv Region',
    baseLat: 49.9935,
    baseLon: 36.2304,
    latDelta: 0.08,
    lonDelta: 0.12,
  },
  'Black Sea (synthetic)': {
    label: 'Black Sea',
    baseLat: 44.5,
    baseLon: 34.0,
    latDelta: 0.2,
    lonDelta: 0.3,
  },
  'Test Range (synthetic)': {
    label: 'Test Range',
    baseLat: 35.0,
    baseLon: -117.0,
    latDelta: 0.1,
    lonDelta: 0.1,
  },
};

export const ENVIRONMENTS: Readonly<Record<string, EnvironmentProfile>> = {
  'Clear Skies / Clean Link': {
    name: 'Clear',
    latencyBase: 120,
    latencyJitter: 40,
    thermalBias: 0.0,
    imuDriftBias: 0.0,
    gnssJamFactor: 0.0,
    eoirDegrade: 0.0,
  },
  'High Latency Link': {
    name: 'High Lat',
    latencyBase: 260,
    latencyJitter: 80,
    thermalBias: 0.05,
    imuDriftBias: 0.02,
    gnssJamFactor: 0.05,
    eoirDegrade: 0.10,
  },
  'GNSS Degraded / Spoof Risk': {
    name: 'GNSS Degraded',
    latencyBase: 180,
    latencyJitter: 70,
    thermalBias: 0.03,
    imuDriftBias: 0.03,
    gnssJamFactor: 0.55,
    eoirDegrade: 0.15,
  },
  'EO/IR Degraded': {
    name: 'EOIR Degraded',
    latencyBase: 140,
    latencyJitter: 60,
    thermalBias: 0.02,
    imuDriftBias: 0.02,
    gnssJamFactor: 0.05,
    eoirDegrade: 0.55,
  },
};

export const ENVELOPES: Readonly<Record<string, FlightEnvelope>> = {
  'Nominal Demo Flight': {
    name: 'Nominal Demo Flight',
    maxMach: 1.8,
    maxQKpa: 650,
    maxG: 4.5,
    maxThermalIndex: 0.78,
    maxLatencyMs: 300,
    description: 'Balanced flight envelope',
  },
  'Conservative Test Profile': {
    name: 'Conservative Test Profile',
    maxMach: 1.2,
    maxQKpa: 450,
    maxG: 3.5,
    maxThermalIndex: 0.65,
    maxLatencyMs: 250,
    description: 'Tight, conservative envelope',
  },
  'Aggressive Envelope Probe': {
    name: 'Aggressive Envelope Probe',
    maxMach: 2.3,
    maxQKpa: 800,
    maxG: 5.5,
    maxThermalIndex: 0.90,
    maxLatencyMs: 350,
    description: 'Aggressive test envelope',
  },
};

export const THRESHOLDS: Readonly<Record<string, ThresholdPreset>> = {
  Balanced: {
    name: 'Balanced',
    clarityThreshold: 75,
    threatThreshold: 65,
    description: 'Standard operational thresholds',
  },
  Conservative: {
    name: 'Conservative',
    clarityThreshold: 85,
    threatThreshold: 55,
    description: 'Higher safety margins',
  },
  Aggressive: {
    name: 'Aggressive',
    clarityThreshold: 65,
    threatThreshold: 75,
    description: 'Accept higher risk for mission',
  },
};

export const MISSION_STAGES: readonly MissionStage[] = [
  { code: 'STAGE_1_BOOST', label: 'Boost', duration: 40, flightPhase: 'ASCENT', description: 'Initial acceleration phase' },
  { code: 'STAGE_2_GRID', label: 'Grid', duration: 70, flightPhase: 'CRUISE', description: 'Grid search pattern' },
  { code: 'STAGE_3_RELAY', label: 'Relay', duration: 70, flightPhase: 'CRUISE', description: 'Data relay and communication' },
  { code: 'STAGE_4_COLLAPSE', label: 'Collapse', duration: 50, flightPhase: 'DESCENT', description: 'Orbit collapse and descent' },
  { code: 'STAGE_5_RTB', label: 'RTB', duration: 9999, flightPhase: 'RECOVERY', description: 'Return to base' },
];

export const DEFAULT_AREA_NAME = 'Kharkiv (synthetic)';
export const DEFAULT_ENVIRONMENT_NAME = 'Clear Skies / Clean Link';
export const DEFAULT_ENVELOPE_NAME = 'Nominal Demo Flight';
export const DEFAULT_THRESHOLD_NAME = 'Balanced';

// ============================================
// 조회 (알 수 없는 이름은 기본값)
// ============================================

function resolve<T>(table: Readonly<Record<string, T>>, name: string, fallbackName: string, kind: string): T {
  const preset = table[name];
  if (preset !== undefined) return preset;
  console.warn(`[Scenario] 알 수 없는 ${kind}: "${name}" → "${fallbackName}" 사용`);
  return table[fallbackName];
}

export function resolveArea(name: string): AreaOfOperation {
  return resolve(AO_PRESETS, name, DEFAULT_AREA_NAME, '작전 구역');
}

export function resolveEnvironment(name: string): EnvironmentProfile {
  return resolve(ENVIRONMENTS, name, DEFAULT_ENVIRONMENT_NAME, '환경 프로필');
}

export function resolveEnvelope(name: string): FlightEnvelope {
  return resolve(ENVELOPES, name, DEFAULT_ENVELOPE_NAME, '비행 포락선');
}

export function resolveThreshold(name: string): ThresholdPreset {
  return resolve(THRESHOLDS, name, DEFAULT_THRESHOLD_NAME, '임계값 프리셋');
}

/**
 * 임무 단계 진행
 *
 * 생성되는 틱이 속할 단계와 단계 내 틱 번호(1부터)를 돌려준다.
 * 직전 틱에서 지속 시간을 채웠으면 다음 단계로 넘어간다.
 */
export function advanceMissionStage(
  stageIndex: number,
  stageTick: number
): { stageIndex: number; stageTick: number } {
  const index = Math.min(Math.max(stageIndex, 0), MISSION_STAGES.length - 1);
  const isLast = index === MISSION_STAGES.length - 1;

  if (!isLast && stageTick >= MISSION_STAGES[index].duration) {
    return { stageIndex: index + 1, stageTick: 1 };
  }
  return { stageIndex: index, stageTick: stageTick + 1 };
}

export function getMissionStage(stageIndex: number): MissionStage {
  const index = Math.min(Math.max(stageIndex, 0), MISSION_STAGES.length - 1);
  return MISSION_STAGES[index];
}

/**
 * 선택 가능한 프리셋 이름 목록
 */
export function listPresetNames(): {
  areas: string[];
  environments: string[];
  envelopes: string[];
  thresholds: string[];
} {
  return {
    areas: Object.keys(AO_PRESETS),
    environments: Object.keys(ENVIRONMENTS),
    envelopes: Object.keys(ENVELOPES),
    thresholds: Object.keys(THRESHOLDS),
  };
}
