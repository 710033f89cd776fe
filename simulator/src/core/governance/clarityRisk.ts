/**
 * 명료도(Clarity) / 위험도(Risk) 계산
 *
 * 입력:
 * - 물리 포락선 신호 (동압, 열 지수)
 * - 위협 지수
 * - 융합 건전성 (신뢰도, surprise)
 *
 * 출력: clarity(0~100), risk(0~100), 예측 risk, 시스템 상태, 포락선 압력(0~2)
 *
 * EMA 상태만 계산기 내부에 남는다. evaluate 는 상태를 바꾸지 않으며
 * commit 으로 확정한다 (스텝 엔진의 원자적 커밋용).
 */

import { SystemState } from '../../../../shared/schemas';
import { PhysicalSignals } from '../../types';
import { clamp } from '../math/matrix';
import { FusedEstimate } from '../models';
import { FlightEnvelope } from '../scenario/presets';

export const INITIAL_CLARITY_EMA = 0.9;
const EMA_ALPHA = 0.15;

export interface GovernanceResult {
  clarity: number;
  risk: number;
  predictedRisk: number;
  state: SystemState;
  envelopePressure: number;
  /** 확정 시 저장될 EMA 값 (0~1) */
  clarityEma: number;
}

/**
 * 명료도/위험도 → 시스템 상태
 */
export function classifySystemState(clarity: number, risk: number): SystemState {
  if (clarity >= 90 && risk < 30) return 'STABLE';
  if (clarity >= 80) return 'TENSE';
  if (clarity >= 65) return 'HIGH_RISK';
  return 'CRITICAL';
}

export class ClarityRiskCalculator {
  private clarityEma: number = INITIAL_CLARITY_EMA;

  get currentEma(): number {
    return this.clarityEma;
  }

  reset(): void {
    this.clarityEma = INITIAL_CLARITY_EMA;
  }

  /**
   * 계산만 수행 (EMA 미갱신)
   */
  evaluate(
    envelope: FlightEnvelope,
    physical: PhysicalSignals,
    fused: Pick<FusedEstimate, 'fusionConf' | 'surprise'>
  ): GovernanceResult {
    const qNorm = clamp(physical.qKpa / envelope.maxQKpa, 0, 1.6);
    const thermalNorm = clamp(physical.thermalIndex / envelope.maxThermalIndex, 0, 1.8);
    const threatNorm = clamp(physical.threatIndex / 100, 0, 1);

    const pressure = 0.6 * qNorm + 0.4 * thermalNorm;
    const { fusionConf, surprise } = fused;

    // 포락선/위협 기반 명료도에 인식론적 패널티 적용
    let raw = clamp(1 - pressure - 0.3 * threatNorm, 0.55, 1);
    raw *= clamp(0.7 + 0.3 * fusionConf, 0, 1);
    raw *= clamp(1 - 0.3 * surprise, 0, 1);

    const clarityEma = EMA_ALPHA * raw + (1 - EMA_ALPHA) * this.clarityEma;
    const clarity = clarityEma * 100;

    const risk = clamp(
      pressure * 60 + (100 - clarity) * 0.45 + (1 - fusionConf) * 18 + surprise * 14,
      0,
      100
    );
    const predictedRisk = clamp(risk + 8 * (pressure - 0.8), 0, 100);

    return {
      clarity,
      risk,
      predictedRisk,
      state: classifySystemState(clarity, risk),
      envelopePressure: pressure,
      clarityEma,
    };
  }

  /**
   * evaluate 결과 확정
   */
  commit(result: GovernanceResult): void {
    this.clarityEma = result.clarityEma;
  }

  /**
   * evaluate + commit
   */
  compute(
    envelope: FlightEnvelope,
    physical: PhysicalSignals,
    fused: Pick<FusedEstimate, 'fusionConf' | 'surprise'>
  ): GovernanceResult {
    const result = this.evaluate(envelope, physical, fused);
    this.commit(result);
    return result;
  }
}
