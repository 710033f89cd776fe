/**
 * 융합 엔진
 *
 * 1. 시간 게이트로 측정값 선택 (최신순 스캔)
 * 2. 선택된 전략으로 융합
 * 3. 선택 목록을 감사 레코드용으로 함께 반환
 */

import { FusionStrategyName } from '../../../../shared/schemas';
import { FusionConfig } from '../../config/fusionConfig';
import { SensorMeasurement } from '../models';
import { KalmanFusion } from './kalmanFusion';
import {
  DEFAULT_FUSION_STRATEGY,
  FusionRunResult,
  FusionStrategy,
  isFusionStrategyName,
} from './types';
import { WeightedFusion } from './weightedFusion';

/**
 * 측정값 나이 (ms): 틱 차이 + 센서 지연
 */
export function measurementAgeMs(m: SensorMeasurement, currentTick: number, config: FusionConfig): number {
  return Math.abs((currentTick - m.tick) * config.dtSeconds * 1000 + m.latencyMs);
}

/**
 * 시간 게이트 측정값 선택
 *
 * - 최신순으로 스캔, 드롭된 측정값은 건너뜀
 * - 나이 ≤ 게이트 (경계 포함) 이면 선택
 * - 게이트 밖 측정값을 처음 만나면 중단 (그보다 오래된 것은 보지 않음)
 *
 * @returns 최신순 선택 목록
 */
export function selectMeasurements(
  history: readonly SensorMeasurement[],
  currentTick: number,
  config: FusionConfig
): SensorMeasurement[] {
  const selected: SensorMeasurement[] = [];

  for (let i = history.length - 1; i >= 0; i--) {
    const m = history[i];
    if (m.dropped) continue;

    if (measurementAgeMs(m, currentTick, config) > config.fusionTimeGateMs) {
      break;
    }
    selected.push(m);
  }

  return selected;
}

export class FusionEngine {
  private config: FusionConfig;
  private strategies: Map<FusionStrategyName, FusionStrategy>;
  private strategy: FusionStrategy;

  constructor(config: FusionConfig, strategyName: string = DEFAULT_FUSION_STRATEGY) {
    this.config = config;
    this.strategies = new Map<FusionStrategyName, FusionStrategy>([
      ['weighted', new WeightedFusion(config)],
      ['kalman', new KalmanFusion()],
    ]);
    this.strategy = this.resolve(strategyName);
  }

  /**
   * 전략 변경 (알 수 없는 이름은 weighted)
   */
  setStrategy(strategyName: string): void {
    this.strategy = this.resolve(strategyName);
  }

  get strategyName(): FusionStrategyName {
    return this.strategy.name;
  }

  /**
   * 선택 + 융합. 선택은 한 번만 계산하고 감사 레코드에 재사용한다.
   */
  run(history: readonly SensorMeasurement[], currentTick: number): FusionRunResult {
    const used = selectMeasurements(history, currentTick, this.config);
    const estimate = this.strategy.fuse(used);
    return { estimate, used };
  }

  private resolve(strategyName: string): FusionStrategy {
    const name = isFusionStrategyName(strategyName) ? strategyName : DEFAULT_FUSION_STRATEGY;
    if (name !== strategyName) {
      console.warn(`[Fusion] 알 수 없는 융합 전략: "${strategyName}" → "${name}" 사용`);
    }
    const strategy = this.strategies.get(name);
    if (strategy === undefined) {
      throw new Error(`[Fusion] 등록되지 않은 융합 전략: ${name}`);
    }
    return strategy;
  }
}
