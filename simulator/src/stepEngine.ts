/**
 * 스텝 엔진
 *
 * 한 번 호출에 정확히 한 틱을 진행한다:
 *  1. 시나리오 프리셋 조회 (알 수 없는 이름은 기본값)
 *  2. 틱별 난수 생성기 (rngSeed + tick + 1)
 *  3. 실측값 생성 → 4. 센서 시뮬레이션
 *  5. 예상 측정값 히스토리로 융합 → 6. 같은 선택으로 감사 레코드
 *  7. 거버넌스 → 8. 임무 단계 / 텔레메트리 조립
 *  9. 커밋
 *
 * 모든 계산이 성공한 뒤에만 상태를 변경한다. 도중에 예외가 나면
 * 상태와 EMA 는 호출 전 그대로 남는다.
 */

import { AuditRecord, GovernanceAlert, Telemetry } from '../../shared/schemas';
import { buildAuditRecord } from './core/audit';
import { FusionEngine } from './core/fusion';
import { ClarityRiskCalculator, evaluateGovernanceAlerts, findStaleSensors } from './core/governance';
import { SensorMeasurement, createTelemetry } from './core/models';
import { createTickRandom } from './core/random/seededRandom';
import { generateGroundTruth } from './core/scenario/groundTruth';
import {
  advanceMissionStage,
  getMissionStage,
  resolveArea,
  resolveEnvelope,
  resolveEnvironment,
  resolveThreshold,
} from './core/scenario/presets';
import { EngineState } from './core/state';
import { EOIR_SENSOR_ID, IMU_SENSOR_ID, LINK_SENSOR_ID, SensorSimulator } from './sensors';

export interface StepOutcome {
  state: EngineState;
  telemetry: Telemetry;
  audit: AuditRecord;
  measurements: SensorMeasurement[];
  alerts: GovernanceAlert[];
}

function numericMeta(m: SensorMeasurement | undefined, key: string, fallback: number): number {
  const value = m?.meta[key];
  return typeof value === 'number' ? value : fallback;
}

export class StepEngine {
  private sensors = new SensorSimulator();
  private governance = new ClarityRiskCalculator();
  private fusion: FusionEngine | null = null;
  private fusionKey: { config: object; strategy: string } | null = null;

  /**
   * 상태 설정/전략 이름이 바뀐 경우에만 융합 엔진 재생성
   */
  private fusionFor(state: EngineState): FusionEngine {
    const strategy = state.scenario.fusionStrategyName;
    if (
      this.fusion === null ||
      this.fusionKey === null ||
      this.fusionKey.config !== state.config ||
      this.fusionKey.strategy !== strategy
    ) {
      this.fusion = new FusionEngine(state.config, strategy);
      this.fusionKey = { config: state.config, strategy };
    }
    return this.fusion;
  }

  /**
   * 한 틱 진행
   */
  step(state: EngineState): StepOutcome {
    const config = state.config;
    const nextTick = state.tick + 1;
    const utc = state.utcFor(nextTick);

    // 1. 프리셋
    const env = resolveEnvironment(state.scenario.environmentName);
    const envelope = resolveEnvelope(state.scenario.envelopeName);
    const area = resolveArea(state.scenario.areaName);
    const threshold = resolveThreshold(state.scenario.thresholdName);

    // 2~4. 실측값 + 센서 (같은 생성기, 고정 순서)
    const rng = createTickRandom(state.rngSeed, nextTick);
    const truth = generateGroundTruth(state.lastTruth, area, env, envelope, rng);
    const measurements = this.sensors.simulateAll({ tick: nextTick, utcTimestamp: utc }, truth, env, rng);

    // 5. 융합 (커밋 전 예상 히스토리 기준, 용량 초과분은 제외)
    const prospective = [...state.measHistory.toArray(), ...measurements].slice(
      -state.measHistory.capacity
    );
    const { estimate, used } = this.fusionFor(state).run(prospective, nextTick);

    // 6. 감사
    const audit = buildAuditRecord(nextTick, utc, used, estimate);

    // 7. 거버넌스 (EMA 는 아직 확정하지 않음)
    const governance = this.governance.evaluate(
      envelope,
      { qKpa: truth.qKpa, thermalIndex: truth.thermalIndex, threatIndex: truth.threatIndex },
      estimate
    );

    // 8. 임무 단계 + 텔레메트리
    const stage = advanceMissionStage(state.missionStageIndex, state.missionStageTick);
    const missionStage = getMissionStage(stage.stageIndex);
    const missionTimeS = state.missionTimeS + config.dtSeconds;

    const link = measurements.find((m) => m.sensorId === LINK_SENSOR_ID);
    const imu = measurements.find((m) => m.sensorId === IMU_SENSOR_ID);
    const eoir = measurements.find((m) => m.sensorId === EOIR_SENSOR_ID);

    const telemetry = createTelemetry({
      tick: nextTick,
      utcTimestamp: utc,
      missionTimeS,
      missionStageCode: missionStage.code,
      missionStageLabel: missionStage.label,
      missionStageTick: stage.stageTick,
      flightPhase: missionStage.flightPhase,

      mach: truth.mach,
      velocityMps: truth.velocityMps,
      altitudeM: estimate.altitudeM,
      qKpa: truth.qKpa,
      thermalIndex: truth.thermalIndex,
      gLoad: truth.gLoad,
      linkLatencyMs: link?.z[0] ?? 0,
      imuDriftDegS: numericMeta(imu, 'imu_drift_deg_s', 0),

      lat: estimate.lat,
      lon: estimate.lon,

      threatIndex: truth.threatIndex,
      civDensity: truth.civDensity,
      navDrift: truth.navDrift,
      commsLoss: numericMeta(link, 'comms_loss', 0),
      visionHotRatio: truth.visionHotRatio,

      clarity: governance.clarity,
      risk: governance.risk,
      predictedRisk: governance.predictedRisk,
      state: governance.state,
      envelopePressure: governance.envelopePressure,

      ccCombined: governance.clarity / 100,
      ccNavConf: estimate.fusionConf,
      ccCommsConf: link?.quality ?? 1,
      ccVisionConf: eoir?.quality ?? 0,
      ccClarityFactor: governance.clarity / 100,
      ccThreatFactor: Math.max(0.2, 1 - truth.threatIndex / 150),

      fusionConf: estimate.fusionConf,
      fusionSurprise: estimate.surprise,
    });

    // 센서 수신 시각 (커밋 전 사본)
    const lastSeenTick = new Map(state.lastSeenTick);
    for (const m of measurements) {
      lastSeenTick.set(m.sensorId, m.tick);
    }
    const stale = findStaleSensors(lastSeenTick, nextTick, config.staleTicks);
    const alerts = evaluateGovernanceAlerts(telemetry, config, threshold, stale);

    // 9. 커밋
    state.measHistory.pushAll(measurements);
    for (const [sensorId, tick] of lastSeenTick) {
      state.lastSeenTick.set(sensorId, tick);
    }
    state.auditChain.push(audit);
    state.history.push(telemetry);
    state.fused = estimate;
    state.lastTruth = truth;
    state.tick = nextTick;
    state.missionTimeS = missionTimeS;
    state.missionStageIndex = stage.stageIndex;
    state.missionStageTick = stage.stageTick;
    this.governance.commit(governance);

    return { state, telemetry, audit, measurements, alerts };
  }

  /**
   * 상태 + 거버넌스 EMA 초기화
   */
  reset(state: EngineState, newSeed?: number): void {
    state.reset(newSeed);
    this.governance.reset();
  }

  get clarityEma(): number {
    return this.governance.currentEma;
  }
}
