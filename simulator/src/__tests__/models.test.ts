/**
 * 도메인 값 객체 검증 테스트
 */

import {
  ValidationError,
  createFusedEstimate,
  createSensorMeasurement,
  SensorMeasurementInput,
} from '../core/models';
import { diagonalMatrix } from '../core/math/matrix';

function validInput(overrides: Partial<SensorMeasurementInput> = {}): SensorMeasurementInput {
  return {
    tick: 1,
    utcTimestamp: '2024-01-01T00:00:01.000Z',
    sensorId: 'GNSS_A',
    sensorType: 'GNSS',
    z: [50.0, 36.0, 1000],
    R: diagonalMatrix([1e-6, 1e-6, 10]),
    quality: 0.9,
    latencyMs: 80,
    ...overrides,
  };
}

describe('SensorMeasurement', () => {
  it('유효한 입력으로 생성되고 기본값이 채워져야 함', () => {
    const m = createSensorMeasurement(validInput());

    expect(m.dropped).toBe(false);
    expect(m.meta).toEqual({});
    expect(m.z).toEqual([50.0, 36.0, 1000]);
  });

  it('생성된 측정값은 깊게 동결되어야 함', () => {
    const m = createSensorMeasurement(validInput({ meta: { jam_factor: 0.1 } }));

    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.z)).toBe(true);
    expect(Object.isFrozen(m.R)).toBe(true);
    expect(Object.isFrozen(m.R[0])).toBe(true);
    expect(Object.isFrozen(m.meta)).toBe(true);
  });

  it('입력 배열을 바꿔도 측정값은 변하지 않아야 함', () => {
    const z = [1, 2, 3];
    const m = createSensorMeasurement(validInput({ z }));
    z[0] = 99;

    expect(m.z[0]).toBe(1);
  });

  it('공분산이 정방 행렬이 아니면 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ R: [[1, 0], [0, 1, 0]] }))).toThrow(ValidationError);
  });

  it('공분산 차원이 측정 벡터와 다르면 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ R: diagonalMatrix([1, 1]) }))).toThrow(
      /공분산 차원\(2\)이 측정 벡터 차원\(3\)과 다릅니다/
    );
  });

  it('빈 측정 벡터는 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ z: [], R: [] }))).toThrow(ValidationError);
  });

  it('유한하지 않은 값은 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ z: [NaN, 0, 0] }))).toThrow(ValidationError);
  });

  it('범위를 벗어난 품질/지연은 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ quality: 1.5 }))).toThrow(ValidationError);
    expect(() => createSensorMeasurement(validInput({ latencyMs: -1 }))).toThrow(ValidationError);
  });

  it('음수 틱과 빈 센서 ID 는 거부해야 함', () => {
    expect(() => createSensorMeasurement(validInput({ tick: -1 }))).toThrow(ValidationError);
    expect(() => createSensorMeasurement(validInput({ sensorId: '' }))).toThrow(ValidationError);
  });

  it('ValidationError 는 위반 항목 목록을 가져야 함', () => {
    try {
      createSensorMeasurement(validInput({ quality: 2, latencyMs: -5 }));
      throw new Error('예외가 발생해야 함');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.message.startsWith('SensorMeasurement 검증 실패')).toBe(true);
      }
    }
  });
});

describe('FusedEstimate', () => {
  const base = {
    lat: 50,
    lon: 36,
    altitudeM: 1000,
    velocityMps: 0,
    headingDeg: 0,
    threatIndex: 0,
    civDensity: 0,
    fusionConf: 0.8,
    surprise: 0.2,
    usedMeasCount: 2,
  };

  it('기여도 합이 1이면 생성되어야 함', () => {
    const e = createFusedEstimate({ ...base, sensorContrib: { GNSS_A: 0.6, RADAR_1: 0.4 } });
    expect(e.sensorContrib).toEqual({ GNSS_A: 0.6, RADAR_1: 0.4 });
    expect(Object.isFrozen(e.sensorContrib)).toBe(true);
  });

  it('기여도가 비어 있으면 합 검사를 하지 않아야 함', () => {
    const e = createFusedEstimate(base);
    expect(e.sensorContrib).toEqual({});
  });

  it('기여도 합이 1에서 벗어나면 거부해야 함', () => {
    expect(() => createFusedEstimate({ ...base, sensorContrib: { GNSS_A: 0.5, RADAR_1: 0.4 } })).toThrow(
      ValidationError
    );
  });

  it('1e-9 를 넘는 기여도 합 오차는 거부해야 함', () => {
    expect(() =>
      createFusedEstimate({ ...base, sensorContrib: { GNSS_A: 0.6, RADAR_1: 0.40000001 } })
    ).toThrow(ValidationError);
  });

  it('허용 오차 이내의 기여도 합은 허용해야 함', () => {
    expect(() =>
      createFusedEstimate({ ...base, sensorContrib: { GNSS_A: 0.6, RADAR_1: 0.4000000005 } })
    ).not.toThrow();
  });

  it('범위를 벗어난 위도/신뢰도는 거부해야 함', () => {
    expect(() => createFusedEstimate({ ...base, lat: 91 })).toThrow(ValidationError);
    expect(() => createFusedEstimate({ ...base, fusionConf: 1.2 })).toThrow(ValidationError);
    expect(() => createFusedEstimate({ ...base, usedMeasCount: 1.5 })).toThrow(ValidationError);
  });
});
