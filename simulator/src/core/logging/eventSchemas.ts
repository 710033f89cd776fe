/**
 * 실행 로깅용 이벤트 스키마 정의
 *
 * 모든 이벤트는 이 스키마를 따라야 합니다.
 * JSONL 형식으로 1줄 1이벤트 저장됩니다.
 */

import {
  GovernanceAlert,
  ScenarioSelection,
  SystemState,
} from '../../../../shared/schemas';
import { FusionConfigFile } from '../../config/fusionConfig';

// ============================================
// 기본 이벤트 인터페이스
// ============================================

export interface BaseEvent {
  timestamp: number;  // 임무 시간 (초)
  event: string;      // 이벤트 타입
}

// ============================================
// 실행 이벤트
// ============================================

export interface RunStartEvent extends BaseEvent {
  event: 'run_start';
  run_id: string;
  seed: number;
  epoch_utc: string;
  scenario: ScenarioSelection;
  config: Required<FusionConfigFile>;
}

export interface RunResetEvent extends BaseEvent {
  event: 'run_reset';
  previous_run_id: string;
  run_id: string;
  seed: number;
}

export interface RunEndEvent extends BaseEvent {
  event: 'run_end';
  run_id: string;
  final_tick: number;
  summary: RunStats;
}

// ============================================
// 틱 이벤트
// ============================================

export interface TickEvent extends BaseEvent {
  event: 'tick';
  tick: number;
  stage: string;
  lat: number;
  lon: number;
  altitude_m: number;
  fusion_conf: number;
  surprise: number;
  clarity: number;
  risk: number;
  predicted_risk: number;
  state: SystemState;
  measurement_count: number;
  used_count: number;
}

export interface AuditRecordEvent extends BaseEvent {
  event: 'audit_record';
  tick: number;
  sha256: string;
  used_count: number;
}

export interface GovernanceAlertLogEvent extends BaseEvent {
  event: 'governance_alert';
  tick: number;
  alerts: GovernanceAlert[];
}

// ============================================
// 제어 이벤트
// ============================================

export interface SimulationControlEvent extends BaseEvent {
  event: 'simulation_control';
  action: 'start' | 'pause' | 'reset' | 'step' | 'set_speed' | 'scenario_select' | 'error_pause';
  detail?: Record<string, string | number | boolean>;
}

// ============================================
// 통합 타입
// ============================================

export type LogEvent =
  | RunStartEvent
  | RunResetEvent
  | RunEndEvent
  | TickEvent
  | AuditRecordEvent
  | GovernanceAlertLogEvent
  | SimulationControlEvent;

/** 실행 통계 */
export interface RunStats {
  ticks: number;
  alerts: number;
  critical_alerts: number;
  state_counts: Record<SystemState, number>;
}
