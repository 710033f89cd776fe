/**
 * 센서 융합 타입 정의
 *
 * 시간 게이트를 통과한 측정값 집합 → 단일 위치/신뢰도 추정
 */

import { FusionStrategyName } from '../../../../shared/schemas';
import { FusedEstimate, SensorMeasurement } from '../models';

// ============================================
// 융합 전략 인터페이스
// ============================================

/**
 * 융합 전략
 *
 * 입력 목록에는 드롭/비위치 센서가 섞여 있을 수 있으며
 * 걸러내는 것은 전략의 책임이다.
 */
export interface FusionStrategy {
  readonly name: FusionStrategyName;
  fuse(measurements: readonly SensorMeasurement[]): FusedEstimate;
}

/**
 * 한 틱의 융합 결과
 *
 * used 는 감사 레코드에 그대로 들어가는 선택 목록 (최신순)
 */
export interface FusionRunResult {
  estimate: FusedEstimate;
  used: SensorMeasurement[];
}

export const FUSION_STRATEGY_NAMES: readonly FusionStrategyName[] = ['weighted', 'kalman'];
export const DEFAULT_FUSION_STRATEGY: FusionStrategyName = 'weighted';

export function isFusionStrategyName(name: string): name is FusionStrategyName {
  return FUSION_STRATEGY_NAMES.some((candidate) => candidate === name);
}
