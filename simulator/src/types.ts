/**
 * 시뮬레이터 내부 타입 정의
 */

/** 합성 지상 실측값 (틱당 1회 생성) */
export interface GroundTruth {
  mach: number;
  velocityMps: number;
  altitudeM: number;
  qKpa: number;
  thermalIndex: number;
  gLoad: number;
  lat: number;
  lon: number;
  threatIndex: number;
  civDensity: number;
  navDrift: number;
  visionHotRatio: number;
}

/** 거버넌스 계산에 들어가는 물리 신호 */
export interface PhysicalSignals {
  qKpa: number;
  thermalIndex: number;
  threatIndex: number;
}

/** 센서 시뮬레이션 컨텍스트 */
export interface SensorContext {
  /** 생성 중인 (다음) 틱 번호 */
  tick: number;
  utcTimestamp: string;
}
