/**
 * 명료도/위험도 계산 테스트
 */

import {
  ClarityRiskCalculator,
  INITIAL_CLARITY_EMA,
  classifySystemState,
} from '../core/governance';
import { ENVELOPES } from '../core/scenario/presets';

const envelope = ENVELOPES['Nominal Demo Flight'];
const calm = { qKpa: 0, thermalIndex: 0, threatIndex: 0 };
const perfect = { fusionConf: 1, surprise: 0 };

describe('classifySystemState', () => {
  it('명료도/위험도 구간별 상태를 돌려줘야 함', () => {
    expect(classifySystemState(95, 10)).toBe('STABLE');
    expect(classifySystemState(90, 29.9)).toBe('STABLE');
    expect(classifySystemState(95, 30)).toBe('TENSE');
    expect(classifySystemState(85, 50)).toBe('TENSE');
    expect(classifySystemState(70, 0)).toBe('HIGH_RISK');
    expect(classifySystemState(65, 0)).toBe('HIGH_RISK');
    expect(classifySystemState(64.9, 0)).toBe('CRITICAL');
  });
});

describe('ClarityRiskCalculator', () => {
  it('첫 계산은 초기 EMA 0.9 에서 출발해야 함', () => {
    const calculator = new ClarityRiskCalculator();
    const result = calculator.compute(envelope, calm, perfect);

    // 0.15 × 1 + 0.85 × 0.9
    expect(result.clarityEma).toBeCloseTo(0.915, 12);
    expect(result.clarity).toBeCloseTo(91.5, 9);
    expect(result.risk).toBeCloseTo(3.825, 9);
    expect(result.predictedRisk).toBe(0);
    expect(result.envelopePressure).toBe(0);
    expect(result.state).toBe('STABLE');
  });

  it('evaluate 는 EMA 를 갱신하지 않아야 함', () => {
    const calculator = new ClarityRiskCalculator();
    const first = calculator.evaluate(envelope, calm, perfect);
    const second = calculator.evaluate(envelope, calm, perfect);

    expect(second).toEqual(first);
    expect(calculator.currentEma).toBe(INITIAL_CLARITY_EMA);

    calculator.commit(first);
    expect(calculator.currentEma).toBe(first.clarityEma);
  });

  it('일정한 입력에서 EMA 가 원시 명료도로 수렴해야 함', () => {
    const calculator = new ClarityRiskCalculator();
    let last = calculator.compute(envelope, calm, perfect);
    for (let i = 0; i < 200; i++) {
      last = calculator.compute(envelope, calm, perfect);
    }

    expect(last.clarity).toBeCloseTo(100, 6);
    expect(last.risk).toBeCloseTo(0, 6);
  });

  it('포락선 초과와 낮은 융합 신뢰도는 CRITICAL 로 수렴해야 함', () => {
    const calculator = new ClarityRiskCalculator();
    // qNorm 1.6, thermalNorm 1.8 에서 포화 → 압력 1.68
    const extreme = { qKpa: 2000, thermalIndex: 5, threatIndex: 100 };
    let last = calculator.compute(envelope, extreme, { fusionConf: 0, surprise: 1 });
    for (let i = 0; i < 200; i++) {
      last = calculator.compute(envelope, extreme, { fusionConf: 0, surprise: 1 });
    }

    expect(last.envelopePressure).toBeCloseTo(1.68, 12);
    // 0.55 하한 × 0.7 × 0.7
    expect(last.clarity).toBeCloseTo(26.95, 6);
    expect(last.risk).toBe(100);
    expect(last.predictedRisk).toBe(100);
    expect(last.state).toBe('CRITICAL');
  });

  it('reset 은 EMA 를 초기값으로 되돌려야 함', () => {
    const calculator = new ClarityRiskCalculator();
    calculator.compute(envelope, calm, { fusionConf: 0, surprise: 1 });
    expect(calculator.currentEma).not.toBe(INITIAL_CLARITY_EMA);

    calculator.reset();
    expect(calculator.currentEma).toBe(INITIAL_CLARITY_EMA);
  });
});
