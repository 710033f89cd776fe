/**
 * 테스트 공용 픽스처
 */

import { SensorType, Telemetry } from '../../../shared/schemas';
import { SensorMeasurement, createSensorMeasurement } from '../core/models';
import { diagonalMatrix } from '../core/math/matrix';
import { GroundTruth } from '../types';

export interface MeasurementOverrides {
  tick?: number;
  sensorId?: string;
  sensorType?: SensorType;
  z?: number[];
  variances?: number[];
  quality?: number;
  latencyMs?: number;
  dropped?: boolean;
  meta?: Record<string, string | number | boolean>;
}

export function makeMeasurement(overrides: MeasurementOverrides = {}): SensorMeasurement {
  const tick = overrides.tick ?? 1;
  return createSensorMeasurement({
    tick,
    utcTimestamp: new Date(Date.UTC(2024, 0, 1) + tick * 1000).toISOString(),
    sensorId: overrides.sensorId ?? 'GNSS_A',
    sensorType: overrides.sensorType ?? 'GNSS',
    z: overrides.z ?? [50, 36, 1000],
    R: diagonalMatrix(overrides.variances ?? [1, 1, 1]),
    quality: overrides.quality ?? 1,
    latencyMs: overrides.latencyMs ?? 0,
    dropped: overrides.dropped ?? false,
    meta: overrides.meta ?? {},
  });
}

export function makeTruth(overrides: Partial<GroundTruth> = {}): GroundTruth {
  return {
    mach: 0.8,
    velocityMps: 236,
    altitudeM: 2500,
    qKpa: 25,
    thermalIndex: 0.4,
    gLoad: 1.0,
    lat: 50.0,
    lon: 36.2,
    threatIndex: 40,
    civDensity: 0.3,
    navDrift: 5.0,
    visionHotRatio: 0.1,
    ...overrides,
  };
}

export function makeTelemetry(overrides: Partial<Telemetry> = {}): Telemetry {
  return {
    tick: 1,
    utcTimestamp: '2024-01-01T00:00:01.000Z',
    missionTimeS: 1,
    missionStageCode: 'STAGE_1_BOOST',
    missionStageLabel: 'Boost',
    missionStageTick: 1,
    flightPhase: 'ASCENT',
    mach: 0.5,
    velocityMps: 147.5,
    altitudeM: 1000,
    qKpa: 12,
    thermalIndex: 0.3,
    gLoad: 1.0,
    linkLatencyMs: 120,
    imuDriftDegS: 0.02,
    lat: 50,
    lon: 36,
    threatIndex: 40,
    civDensity: 0.3,
    navDrift: 5,
    commsLoss: 0,
    visionHotRatio: 0.1,
    clarity: 92,
    risk: 10,
    predictedRisk: 5,
    state: 'STABLE',
    envelopePressure: 0.2,
    ccCombined: 0.9,
    ccNavConf: 0.9,
    ccCommsConf: 0.9,
    ccVisionConf: 0.9,
    ccClarityFactor: 0.92,
    ccThreatFactor: 0.6,
    fusionConf: 0.9,
    fusionSurprise: 0.1,
    ...overrides,
  };
}
