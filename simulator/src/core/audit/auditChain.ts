/**
 * 감사 레코드 생성 / 검증
 *
 * 틱마다 융합에 사용된 측정값 요약과 융합 결과를 기록하고
 * canonical JSON (키 재귀 정렬, 공백 없음) 의 SHA-256 으로 식별한다.
 * 같은 내용이면 맵 삽입 순서와 무관하게 같은 해시가 나온다.
 */

import { createHash } from 'crypto';
import {
  AuditRecord,
  FusedOutputSummary,
  MeasurementSummary,
} from '../../../../shared/schemas';
import { trace } from '../math/matrix';
import { FusedEstimate, SensorMeasurement } from '../models';

// ============================================
// Canonical JSON
// ============================================

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * 키를 재귀 정렬한 JSON 직렬화
 *
 * 정수형 키도 문자열 순서로 정렬되도록 직접 조립한다.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    const body = entries
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`)
      .join(',');
    return `{${body}}`;
  }
  // undefined / 함수는 배열 원소에서 null 로 직렬화
  return JSON.stringify(value) ?? 'null';
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

// ============================================
// 요약
// ============================================

export function summarizeMeasurement(m: SensorMeasurement): MeasurementSummary {
  return {
    sensor_id: m.sensorId,
    type: m.sensorType,
    quality: m.quality,
    latency_ms: m.latencyMs,
    tick: m.tick,
    z3: m.z.slice(0, 3),
    R_trace: trace(m.R),
    dropped: m.dropped,
    meta: { ...m.meta },
  };
}

export function summarizeFused(fused: FusedEstimate): FusedOutputSummary {
  return {
    lat: fused.lat,
    lon: fused.lon,
    altitude_m: fused.altitudeM,
    velocity_mps: fused.velocityMps,
    heading_deg: fused.headingDeg,
    fusion_conf: fused.fusionConf,
    surprise: fused.surprise,
    sensor_contrib: { ...fused.sensorContrib },
    used_meas_count: fused.usedMeasCount,
  };
}

/**
 * 해시 입력: {tick, utc, used, fused}
 */
export function computeAuditDigest(
  tick: number,
  utc: string,
  used: readonly Readonly<MeasurementSummary>[],
  fused: Readonly<FusedOutputSummary>
): string {
  return sha256Hex(canonicalJson({ tick, utc, used, fused }));
}

// ============================================
// 생성 / 검증
// ============================================

/**
 * 감사 레코드 생성 (순수 함수)
 */
export function buildAuditRecord(
  tick: number,
  utc: string,
  used: readonly SensorMeasurement[],
  fused: FusedEstimate
): AuditRecord {
  const usedMeasurements = used.map(summarizeMeasurement);
  const fusedOutput = summarizeFused(fused);

  return Object.freeze({
    tick,
    utc,
    usedMeasurements: Object.freeze(usedMeasurements.map((s) => Object.freeze(s))),
    fusedOutput: Object.freeze(fusedOutput),
    sha256: computeAuditDigest(tick, utc, usedMeasurements, fusedOutput),
  });
}

/**
 * 해시 재계산 후 일치 여부
 */
export function verifyAuditRecord(record: AuditRecord): boolean {
  const expected = computeAuditDigest(
    record.tick,
    record.utc,
    record.usedMeasurements,
    record.fusedOutput
  );
  return expected === record.sha256;
}

/**
 * 레코드 목록 검증 → 불일치 틱 목록
 */
export function verifyAuditChain(records: readonly AuditRecord[]): {
  verified: number;
  invalidTicks: number[];
} {
  const invalidTicks = records.filter((r) => !verifyAuditRecord(r)).map((r) => r.tick);
  return { verified: records.length - invalidTicks.length, invalidTicks };
}
