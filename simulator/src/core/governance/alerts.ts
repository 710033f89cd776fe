/**
 * 거버넌스 경보 평가
 *
 * 텔레메트리 한 건을 설정 임계값과 비교하여 경보 목록을 만든다.
 * 상태를 갖지 않으며 같은 입력이면 같은 경보를 낸다.
 */

import { GovernanceAlert, Telemetry } from '../../../../shared/schemas';
import { FusionConfig } from '../../config/fusionConfig';
import { ThresholdPreset } from '../scenario/presets';

/**
 * 수신이 끊긴 센서 판정: tick − lastSeenTick > staleTicks
 */
export function findStaleSensors(
  lastSeenTick: ReadonlyMap<string, number>,
  tick: number,
  staleTicks: number
): { sensorId: string; ticksSince: number }[] {
  const stale: { sensorId: string; ticksSince: number }[] = [];
  for (const [sensorId, seen] of lastSeenTick) {
    const ticksSince = tick - seen;
    if (ticksSince > staleTicks) {
      stale.push({ sensorId, ticksSince });
    }
  }
  return stale.sort((a, b) => a.sensorId.localeCompare(b.sensorId));
}

export function evaluateGovernanceAlerts(
  telemetry: Telemetry,
  config: FusionConfig,
  threshold: ThresholdPreset,
  staleSensors: readonly { sensorId: string; ticksSince: number }[] = []
): GovernanceAlert[] {
  const alerts: GovernanceAlert[] = [];

  // 명료도
  if (telemetry.clarity < config.clarityCriticalThreshold) {
    alerts.push({
      severity: 'CRITICAL',
      kind: 'CLARITY',
      message: `명료도 위험 수준: ${telemetry.clarity.toFixed(1)}`,
      value: telemetry.clarity,
      threshold: config.clarityCriticalThreshold,
    });
  } else if (telemetry.clarity < config.clarityWarningThreshold) {
    alerts.push({
      severity: 'WARNING',
      kind: 'CLARITY',
      message: `명료도 저하: ${telemetry.clarity.toFixed(1)}`,
      value: telemetry.clarity,
      threshold: config.clarityWarningThreshold,
    });
  }

  // 융합 신뢰도
  if (telemetry.fusionConf < config.fusionConfCritical) {
    alerts.push({
      severity: 'CRITICAL',
      kind: 'FUSION_CONFIDENCE',
      message: `융합 신뢰도 위험 수준: ${telemetry.fusionConf.toFixed(2)}`,
      value: telemetry.fusionConf,
      threshold: config.fusionConfCritical,
    });
  } else if (telemetry.fusionConf < config.fusionConfWarning) {
    alerts.push({
      severity: 'WARNING',
      kind: 'FUSION_CONFIDENCE',
      message: `융합 신뢰도 저하: ${telemetry.fusionConf.toFixed(2)}`,
      value: telemetry.fusionConf,
      threshold: config.fusionConfWarning,
    });
  }

  // 위협 지수
  if (telemetry.threatIndex > threshold.threatThreshold) {
    alerts.push({
      severity: 'WARNING',
      kind: 'THREAT',
      message: `위협 지수 임계 초과 (${threshold.name}): ${telemetry.threatIndex.toFixed(1)}`,
      value: telemetry.threatIndex,
      threshold: threshold.threatThreshold,
    });
  }

  for (const { sensorId, ticksSince } of staleSensors) {
    alerts.push({
      severity: 'WARNING',
      kind: 'STALE_SENSOR',
      message: `센서 ${sensorId} ${ticksSince}틱 동안 수신 없음`,
      value: ticksSince,
      threshold: config.staleTicks,
      sensor_id: sensorId,
    });
  }

  return alerts;
}
