/**
 * 엔진 런타임 상태
 *
 * - 시뮬레이션 시계 / 임무 단계
 * - 실행 식별자, 시드 (재현성)
 * - 시나리오 선택
 * - 히스토리 링 버퍼 (텔레메트리, 측정값, 감사 레코드)
 * - 최근 융합 결과
 *
 * 비즈니스 로직 없음. 스텝 엔진만 틱당 한 번 변경한다.
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditRecord, ScenarioSelection, Telemetry } from '../../../../shared/schemas';
import { FusionConfig, createFusionConfig } from '../../config/fusionConfig';
import { GroundTruth } from '../../types';
import { FusedEstimate, SensorMeasurement } from '../models';
import { DEFAULT_FUSION_STRATEGY } from '../fusion/types';
import {
  DEFAULT_AREA_NAME,
  DEFAULT_ENVELOPE_NAME,
  DEFAULT_ENVIRONMENT_NAME,
  DEFAULT_THRESHOLD_NAME,
} from '../scenario/presets';
import { RingBuffer } from './ringBuffer';

/** 2024-01-01T00:00:00Z */
export const DEFAULT_EPOCH_MS = Date.UTC(2024, 0, 1);

export interface EngineStateOptions {
  config?: FusionConfig;
  /** 미지정 시 현재 시각 기반 */
  seed?: number;
  /** 틱 0 의 UTC 시각 (ms) */
  epochMs?: number;
  scenario?: Partial<ScenarioSelection>;
}

export const DEFAULT_SCENARIO: Readonly<ScenarioSelection> = {
  areaName: DEFAULT_AREA_NAME,
  environmentName: DEFAULT_ENVIRONMENT_NAME,
  envelopeName: DEFAULT_ENVELOPE_NAME,
  thresholdName: DEFAULT_THRESHOLD_NAME,
  fusionStrategyName: DEFAULT_FUSION_STRATEGY,
};

/**
 * 시각 기반 시드 (32비트)
 */
export function wallClockSeed(): number {
  return Date.now() % 2 ** 32;
}

export class EngineState {
  readonly config: FusionConfig;

  // 시뮬레이션 시계
  tick = 0;
  missionTimeS = 0;
  missionStageIndex = 0;
  missionStageTick = 0;

  // 식별 / 재현성
  runId: string;
  rngSeed: number;
  readonly epochMs: number;

  // 시나리오 선택
  scenario: ScenarioSelection;

  // 히스토리
  readonly history: RingBuffer<Telemetry>;
  readonly measHistory: RingBuffer<SensorMeasurement>;
  readonly auditChain: RingBuffer<AuditRecord>;

  // 융합 출력
  fused: FusedEstimate | null = null;
  lastTruth: GroundTruth | null = null;
  readonly lastSeenTick = new Map<string, number>();

  constructor(options: EngineStateOptions = {}) {
    this.config = options.config ?? createFusionConfig();
    this.rngSeed = options.seed ?? wallClockSeed();
    this.epochMs = options.epochMs ?? Date.now();
    this.runId = uuidv4();
    this.scenario = { ...DEFAULT_SCENARIO, ...options.scenario };

    this.history = new RingBuffer<Telemetry>(this.config.maxTelemetryHistory);
    this.measHistory = new RingBuffer<SensorMeasurement>(this.config.maxMeasurementHistory);
    this.auditChain = new RingBuffer<AuditRecord>(this.config.maxAuditHistory);
  }

  /**
   * 틱의 UTC 타임스탬프 (ISO-8601)
   */
  utcFor(tick: number): string {
    return new Date(this.epochMs + tick * this.config.dtSeconds * 1000).toISOString();
  }

  /**
   * 새 실행으로 초기화 (설정/시나리오 유지, 버퍼 비움)
   */
  reset(newSeed?: number): void {
    this.tick = 0;
    this.missionTimeS = 0;
    this.missionStageIndex = 0;
    this.missionStageTick = 0;

    this.history.clear();
    this.measHistory.clear();
    this.auditChain.clear();
    this.lastSeenTick.clear();

    this.fused = null;
    this.lastTruth = null;

    if (newSeed !== undefined) {
      this.rngSeed = newSeed;
    }
    this.runId = uuidv4();
  }
}
