/**
 * 틱 단위 텔레메트리 레코드
 */

import { z } from 'zod';
import { SYSTEM_STATES, Telemetry } from '../../../../shared/schemas';
import { ValidationError } from './errors';

const unit = () => z.number().min(0).max(1);
const percent = () => z.number().min(0).max(100);

const telemetrySchema = z.object({
  tick: z.number().int().nonnegative(),
  utcTimestamp: z.string().min(1),
  missionTimeS: z.number().nonnegative(),
  missionStageCode: z.string(),
  missionStageLabel: z.string(),
  missionStageTick: z.number().int().nonnegative(),
  flightPhase: z.string(),

  mach: z.number().min(0).max(5),
  velocityMps: z.number().min(0).max(2000),
  altitudeM: z.number().min(-1000).max(50000),
  qKpa: z.number().min(0).max(1000),
  thermalIndex: unit(),
  gLoad: z.number().min(0).max(10),
  linkLatencyMs: z.number().min(0).max(2000),
  imuDriftDegS: z.number().min(0).max(2),

  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),

  threatIndex: percent(),
  civDensity: unit(),
  navDrift: percent(),
  commsLoss: unit(),
  visionHotRatio: unit(),

  clarity: percent(),
  risk: percent(),
  predictedRisk: percent(),
  state: z.enum(SYSTEM_STATES),
  envelopePressure: z.number().min(0).max(2),

  ccCombined: unit(),
  ccNavConf: unit(),
  ccCommsConf: unit(),
  ccVisionConf: unit(),
  ccClarityFactor: unit(),
  ccThreatFactor: unit(),

  fusionConf: unit(),
  fusionSurprise: unit(),
});

/**
 * 텔레메트리 생성 (검증 실패 시 ValidationError)
 */
export function createTelemetry(input: Telemetry): Telemetry {
  const result = telemetrySchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod('Telemetry', result.error);
  }
  return Object.freeze(result.data);
}
