/**
 * 공통 이벤트 JSON Schema 정의
 *
 * 대시보드 ↔ 시뮬레이터 간 통신 프로토콜
 * (텔레메트리, 감사 레코드, 거버넌스 경보, 제어 명령)
 */

// ============================================
// 기본 타입
// ============================================

/** 센서 유형 */
export const SENSOR_TYPES = ['IMU', 'GNSS', 'BARO', 'RADAR', 'EOIR', 'RF', 'LINK'] as const;
export type SensorType = (typeof SENSOR_TYPES)[number];

/** 위치 융합이 가능한 센서 */
export const POSITION_SENSOR_TYPES: readonly SensorType[] = ['GNSS', 'EOIR', 'RADAR'];

/** 시스템 상태 (거버넌스 분류) */
export const SYSTEM_STATES = ['STABLE', 'TENSE', 'HIGH_RISK', 'CRITICAL'] as const;
export type SystemState = (typeof SYSTEM_STATES)[number];

/** 융합 전략 */
export type FusionStrategyName =
  | 'weighted'  // 가중 평균 (기본)
  | 'kalman';   // 칼만 (미구현, 호출 시 실패)

/** 경보 심각도 */
export type AlertSeverity = 'WARNING' | 'CRITICAL';

/** 경보 종류 */
export type AlertKind =
  | 'CLARITY'            // 명료도 저하
  | 'FUSION_CONFIDENCE'  // 융합 신뢰도 저하
  | 'THREAT'             // 위협 지수 초과
  | 'STALE_SENSOR';      // 센서 미수신

/** 측정값 메타데이터 값 */
export type MetaValue = string | number | boolean;

// ============================================
// 텔레메트리 (틱 단위 스냅샷)
// ============================================

export interface Telemetry {
  // 시간
  readonly tick: number;
  readonly utcTimestamp: string;
  readonly missionTimeS: number;
  readonly missionStageCode: string;
  readonly missionStageLabel: string;
  readonly missionStageTick: number;
  readonly flightPhase: string;

  // 물리 상태
  readonly mach: number;
  readonly velocityMps: number;
  /** 융합 고도 (m) */
  readonly altitudeM: number;
  readonly qKpa: number;
  readonly thermalIndex: number;
  readonly gLoad: number;
  readonly linkLatencyMs: number;
  readonly imuDriftDegS: number;

  // 항법 (융합)
  readonly lat: number;
  readonly lon: number;

  // 환경
  readonly threatIndex: number;
  readonly civDensity: number;
  readonly navDrift: number;
  readonly commsLoss: number;
  readonly visionHotRatio: number;

  // 거버넌스
  readonly clarity: number;
  readonly risk: number;
  readonly predictedRisk: number;
  readonly state: SystemState;
  readonly envelopePressure: number;

  // 콘솔 계약값 (0~1)
  readonly ccCombined: number;
  readonly ccNavConf: number;
  readonly ccCommsConf: number;
  readonly ccVisionConf: number;
  readonly ccClarityFactor: number;
  readonly ccThreatFactor: number;

  // 융합 상태
  readonly fusionConf: number;
  readonly fusionSurprise: number;
}

// ============================================
// 감사 레코드
// ============================================

/** 융합에 사용된 측정값 요약 (해시 입력) */
export interface MeasurementSummary {
  sensor_id: string;
  type: SensorType;
  quality: number;
  latency_ms: number;
  tick: number;
  z3: number[];
  R_trace: number;
  dropped: boolean;
  meta: Record<string, MetaValue>;
}

/** 융합 결과 요약 (해시 입력) */
export interface FusedOutputSummary {
  lat: number;
  lon: number;
  altitude_m: number;
  velocity_mps: number;
  heading_deg: number;
  fusion_conf: number;
  surprise: number;
  sensor_contrib: Record<string, number>;
  used_meas_count: number;
}

export interface AuditRecord {
  readonly tick: number;
  readonly utc: string;
  readonly usedMeasurements: readonly Readonly<MeasurementSummary>[];
  readonly fusedOutput: Readonly<FusedOutputSummary>;
  /** canonical JSON 의 SHA-256 (hex) */
  readonly sha256: string;
}

// ============================================
// 거버넌스 경보
// ============================================

export interface GovernanceAlert {
  severity: AlertSeverity;
  kind: AlertKind;
  message: string;
  value: number;
  threshold: number;
  sensor_id?: string;
}

// ============================================
// 시나리오 선택
// ============================================

export interface ScenarioSelection {
  areaName: string;
  environmentName: string;
  envelopeName: string;
  thresholdName: string;
  fusionStrategyName: string;
}

// ============================================
// 시뮬레이터 → 대시보드 이벤트
// ============================================

export interface TelemetryUpdateEvent {
  type: 'telemetry_update';
  telemetry: Telemetry;
  sensor_contrib: Record<string, number>;
}

export interface AuditAppendedEvent {
  type: 'audit_appended';
  tick: number;
  sha256: string;
  used_count: number;
}

export interface GovernanceAlertEvent {
  type: 'governance_alert';
  tick: number;
  alerts: GovernanceAlert[];
}

export interface SimulationStatusEvent {
  type: 'simulation_status';
  run_id: string;
  seed: number;
  tick: number;
  mission_time_s: number;
  is_running: boolean;
  speed_multiplier: number;
  scenario: ScenarioSelection;
}

export interface SimulationErrorEvent {
  type: 'simulation_error';
  tick: number;
  message: string;
}

export type SimulatorToDashboardEvent =
  | TelemetryUpdateEvent
  | AuditAppendedEvent
  | GovernanceAlertEvent
  | SimulationStatusEvent
  | SimulationErrorEvent;

// ============================================
// 대시보드 → 시뮬레이터 명령
// ============================================

export interface SimulationControlCommand {
  type: 'simulation_control';
  action: 'start' | 'pause' | 'reset' | 'step' | 'set_speed';
  seed?: number;
  speed_multiplier?: number;
}

export interface ScenarioSelectCommand {
  type: 'scenario_select';
  area?: string;
  environment?: string;
  envelope?: string;
  threshold?: string;
  fusion_strategy?: string;
}

export interface GetHistoryCommand {
  type: 'get_history';
  limit?: number;
}

export interface GetAuditChainCommand {
  type: 'get_audit_chain';
  limit?: number;
}

export interface VerifyAuditCommand {
  type: 'verify_audit';
}

export type DashboardToSimulatorCommand =
  | SimulationControlCommand
  | ScenarioSelectCommand
  | GetHistoryCommand
  | GetAuditChainCommand
  | VerifyAuditCommand;

// ============================================
// 시뮬레이터 → 요청 클라이언트 응답
// ============================================

/** 선택 가능한 프리셋 이름 목록 */
export interface PresetCatalog {
  areas: string[];
  environments: string[];
  envelopes: string[];
  thresholds: string[];
  fusion_strategies: FusionStrategyName[];
}

export interface InitialStateMessage {
  type: 'initial_state';
  status: SimulationStatusEvent;
  presets: PresetCatalog;
  latest?: Telemetry;
}

export interface HistoryResponse {
  type: 'history';
  telemetry: Telemetry[];
}

export interface AuditChainResponse {
  type: 'audit_chain';
  records: AuditRecord[];
}

export interface AuditVerificationResponse {
  type: 'audit_verification';
  verified: number;
  invalid_ticks: number[];
}

export type SimulatorResponse =
  | InitialStateMessage
  | HistoryResponse
  | AuditChainResponse
  | AuditVerificationResponse;
