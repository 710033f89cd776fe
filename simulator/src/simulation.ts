/**
 * 시뮬레이션 엔진
 *
 * 타이머로 스텝 엔진을 구동하고 대시보드 이벤트를 발생
 * 모든 이벤트를 JSONL로 자동 로깅
 */

import {
  AuditRecord,
  GovernanceAlert,
  ScenarioSelection,
  SimulationStatusEvent,
  SimulatorToDashboardEvent,
  Telemetry,
} from '../../shared/schemas';

import { getConfig } from './config';
import { FusionConfig, loadFusionConfig, toConfigFile } from './config/fusionConfig';
import { verifyAuditChain } from './core/audit';
import { getLogger, RunLogger } from './core/logging/logger';
import { SimulationControlEvent } from './core/logging/eventSchemas';
import { EngineState } from './core/state';
import { StepEngine, StepOutcome } from './stepEngine';

export interface SimulationEngineOptions {
  fusionConfig?: FusionConfig;
  seed?: number;
  epochMs?: number;
  tickIntervalMs?: number;
  scenario?: Partial<ScenarioSelection>;
  logger?: RunLogger;
}

export class SimulationEngine {
  private state: EngineState;
  private stepEngine: StepEngine;
  private onEvent: (event: SimulatorToDashboardEvent) => void;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private logger: RunLogger;
  private tickIntervalMs: number;
  private speedMultiplier: number = 1;
  private isRunning: boolean = false;

  constructor(
    onEvent: (event: SimulatorToDashboardEvent) => void,
    options: SimulationEngineOptions = {}
  ) {
    this.onEvent = onEvent;

    this.tickIntervalMs = options.tickIntervalMs ?? getConfig().tickIntervalMs;
    this.logger = options.logger ?? this.createDefaultLogger();

    const fusionConfig =
      options.fusionConfig ?? loadFusionConfig(getConfig().fusionConfigPath).config;

    this.state = new EngineState({
      config: fusionConfig,
      seed: options.seed ?? getConfig().runSeed,
      epochMs: options.epochMs ?? getConfig().runEpochMs,
      scenario: options.scenario,
    });
    this.stepEngine = new StepEngine();

    this.logger.startRun({
      run_id: this.state.runId,
      seed: this.state.rngSeed,
      epoch_utc: this.state.utcFor(0),
      scenario: { ...this.state.scenario },
      config: toConfigFile(this.state.config),
    });
  }

  private createDefaultLogger(): RunLogger {
    const config = getConfig();
    return getLogger({
      logsDir: config.logsDir,
      enabled: config.logEnabled,
      consoleOutput: config.logConsoleOutput,
    });
  }

  // ============================================
  // 제어
  // ============================================

  /**
   * 시뮬레이션 시작
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.scheduleTimer();

    this.logControl('start');
    this.emitStatusEvent();
  }

  /**
   * 시뮬레이션 일시정지
   */
  pause(): void {
    if (!this.isRunning) return;

    this.stopTimer();
    this.logControl('pause');
    this.emitStatusEvent();
  }

  /**
   * 한 틱만 실행 (일시정지 상태에서도 가능)
   */
  stepOnce(): StepOutcome | null {
    this.logControl('step');
    const outcome = this.tick();
    this.emitStatusEvent();
    return outcome;
  }

  /**
   * 시뮬레이션 리셋 (새 시드 선택 가능)
   */
  reset(seed?: number): void {
    this.pause();

    const previousRunId = this.state.runId;
    this.stepEngine.reset(this.state, seed);

    this.logger.log({
      timestamp: 0,
      event: 'run_reset',
      previous_run_id: previousRunId,
      run_id: this.state.runId,
      seed: this.state.rngSeed,
    });
    console.log(`[Simulator] 리셋: run=${this.state.runId}, seed=${this.state.rngSeed}`);

    this.emitStatusEvent();
  }

  /**
   * 시나리오 선택 변경 (다음 틱부터 적용)
   */
  setScenario(selection: Partial<ScenarioSelection>): void {
    const next: ScenarioSelection = { ...this.state.scenario };
    if (selection.areaName !== undefined) next.areaName = selection.areaName;
    if (selection.environmentName !== undefined) next.environmentName = selection.environmentName;
    if (selection.envelopeName !== undefined) next.envelopeName = selection.envelopeName;
    if (selection.thresholdName !== undefined) next.thresholdName = selection.thresholdName;
    if (selection.fusionStrategyName !== undefined) {
      next.fusionStrategyName = selection.fusionStrategyName;
    }
    this.state.scenario = next;

    this.logControl('scenario_select', {
      area: next.areaName,
      environment: next.environmentName,
      envelope: next.envelopeName,
      threshold: next.thresholdName,
      fusion_strategy: next.fusionStrategyName,
    });
    this.emitStatusEvent();
  }

  /**
   * 속도 배율 설정
   */
  setSpeedMultiplier(multiplier: number): void {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new RangeError(`속도 배율은 0보다 커야 합니다: ${multiplier}`);
    }
    this.speedMultiplier = multiplier;

    this.logControl('set_speed', { speed_multiplier: multiplier });

    if (this.isRunning && this.tickTimer) {
      clearInterval(this.tickTimer);
      this.scheduleTimer();
    }
    this.emitStatusEvent();
  }

  /**
   * 종료 (타이머 정지 + 로그 마무리)
   */
  shutdown(): void {
    this.stopTimer();
    this.logger.endRun(this.state.missionTimeS, this.state.tick);
  }

  // ============================================
  // 조회
  // ============================================

  getState(): EngineState {
    return this.state;
  }

  getStatus(): SimulationStatusEvent {
    return {
      type: 'simulation_status',
      run_id: this.state.runId,
      seed: this.state.rngSeed,
      tick: this.state.tick,
      mission_time_s: this.state.missionTimeS,
      is_running: this.isRunning,
      speed_multiplier: this.speedMultiplier,
      scenario: { ...this.state.scenario },
    };
  }

  /**
   * 최근 텔레메트리 (오래된 순)
   */
  getHistory(limit?: number): Telemetry[] {
    return limit === undefined ? this.state.history.toArray() : this.state.history.tail(limit);
  }

  /**
   * 최근 감사 레코드 (오래된 순)
   */
  getAuditChain(limit?: number): AuditRecord[] {
    return limit === undefined ? this.state.auditChain.toArray() : this.state.auditChain.tail(limit);
  }

  verifyAuditChain(): { verified: number; invalidTicks: number[] } {
    return verifyAuditChain(this.state.auditChain.toArray());
  }

  getLogger(): RunLogger {
    return this.logger;
  }

  // ============================================
  // 틱 처리
  // ============================================

  private scheduleTimer(): void {
    this.tickTimer = setInterval(() => {
      this.tick();
    }, this.tickIntervalMs / this.speedMultiplier);
  }

  private stopTimer(): void {
    this.isRunning = false;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
  }

  /**
   * 한 틱 실행. 실패하면 루프를 멈추고 오류 이벤트를 보낸다 (상태 변경 없음).
   */
  private tick(): StepOutcome | null {
    let outcome: StepOutcome;
    try {
      outcome = this.stepEngine.step(this.state);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Simulator] 틱 ${this.state.tick + 1} 실행 실패: ${message}`);

      const wasRunning = this.isRunning;
      this.stopTimer();
      this.logControl('error_pause', { tick: this.state.tick + 1, message });

      this.onEvent({ type: 'simulation_error', tick: this.state.tick + 1, message });
      if (wasRunning) this.emitStatusEvent();
      return null;
    }

    this.recordOutcome(outcome);
    return outcome;
  }

  private recordOutcome(outcome: StepOutcome): void {
    const { telemetry, audit, measurements, alerts } = outcome;
    const timestamp = telemetry.missionTimeS;

    // 로깅: tick
    this.logger.log({
      timestamp,
      event: 'tick',
      tick: telemetry.tick,
      stage: telemetry.missionStageCode,
      lat: telemetry.lat,
      lon: telemetry.lon,
      altitude_m: telemetry.altitudeM,
      fusion_conf: telemetry.fusionConf,
      surprise: telemetry.fusionSurprise,
      clarity: telemetry.clarity,
      risk: telemetry.risk,
      predicted_risk: telemetry.predictedRisk,
      state: telemetry.state,
      measurement_count: measurements.length,
      used_count: audit.usedMeasurements.length,
    });

    // 로깅: audit_record
    this.logger.log({
      timestamp,
      event: 'audit_record',
      tick: audit.tick,
      sha256: audit.sha256,
      used_count: audit.usedMeasurements.length,
    });

    this.onEvent({
      type: 'telemetry_update',
      telemetry,
      sensor_contrib: { ...audit.fusedOutput.sensor_contrib },
    });
    this.onEvent({
      type: 'audit_appended',
      tick: audit.tick,
      sha256: audit.sha256,
      used_count: audit.usedMeasurements.length,
    });

    if (alerts.length > 0) {
      this.emitAlerts(telemetry.tick, timestamp, alerts);
    }
  }

  private emitAlerts(tick: number, timestamp: number, alerts: GovernanceAlert[]): void {
    this.logger.log({ timestamp, event: 'governance_alert', tick, alerts });
    this.onEvent({ type: 'governance_alert', tick, alerts });
  }

  private logControl(
    action: SimulationControlEvent['action'],
    detail?: SimulationControlEvent['detail']
  ): void {
    this.logger.log({
      timestamp: this.state.missionTimeS,
      event: 'simulation_control',
      action,
      detail,
    });
  }

  /**
   * 시뮬레이션 상태 이벤트 발생
   */
  private emitStatusEvent(): void {
    this.onEvent(this.getStatus());
  }
}
