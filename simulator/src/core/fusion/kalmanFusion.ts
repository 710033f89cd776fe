/**
 * 칼만 융합 (미구현)
 *
 * 상태 전이/공정 잡음 모델이 검증되기 전까지는 선택은 가능하지만
 * 호출하면 항상 실패한다. 가중 평균으로 대체하지 않는다.
 */

import { FusedEstimate, FusionStrategyNotImplementedError, SensorMeasurement } from '../models';
import { FusionStrategy } from './types';

export class KalmanFusion implements FusionStrategy {
  readonly name = 'kalman' as const;

  fuse(_measurements: readonly SensorMeasurement[]): FusedEstimate {
    throw new FusionStrategyNotImplementedError(this.name);
  }
}
