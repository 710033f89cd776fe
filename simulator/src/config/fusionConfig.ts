/**
 * 융합 설정 로더
 *
 * config/fusion_config.json 을 읽어서 기본값 위에 덮어씁니다.
 * 파일이 없거나 형식이 잘못되면 기본값을 사용하고 경고를 남깁니다.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export interface FusionConfig {
  // 시간 / 주기
  readonly dtSeconds: number;
  readonly fusionTimeGateMs: number;
  readonly staleTicks: number;

  // 히스토리 버퍼 용량
  readonly maxTelemetryHistory: number;
  readonly maxMeasurementHistory: number;
  readonly maxAuditHistory: number;

  /** 센서 유형별 위치 융합 사전 가중치 */
  readonly positionFusionWeight: Readonly<Record<string, number>>;

  // 거버넌스 임계값
  readonly clarityWarningThreshold: number;
  readonly clarityCriticalThreshold: number;
  readonly fusionConfWarning: number;
  readonly fusionConfCritical: number;
}

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  dtSeconds: 1.0,
  fusionTimeGateMs: 350,
  staleTicks: 6,
  maxTelemetryHistory: 600,
  maxMeasurementHistory: 3000,
  maxAuditHistory: 1000,
  positionFusionWeight: {
    GNSS: 1.0,
    EOIR: 0.8,
    RADAR: 0.9,
    BARO: 0.3,
  },
  clarityWarningThreshold: 75,
  clarityCriticalThreshold: 65,
  fusionConfWarning: 0.6,
  fusionConfCritical: 0.4,
};

export const DEFAULT_FUSION_CONFIG_FILE = path.resolve(process.cwd(), 'config/fusion_config.json');

/**
 * 설정 파일 스키마 (snake_case, 모든 키 선택)
 */
const fusionConfigFileSchema = z
  .object({
    dt_seconds: z.number().positive(),
    fusion_time_gate_ms: z.number().nonnegative(),
    stale_ticks: z.number().int().positive(),
    max_telemetry_history: z.number().int().positive(),
    max_measurement_history: z.number().int().positive(),
    max_audit_history: z.number().int().positive(),
    position_fusion_weight: z.record(z.number().nonnegative()),
    clarity_warning_threshold: z.number().min(0).max(100),
    clarity_critical_threshold: z.number().min(0).max(100),
    fusion_conf_warning: z.number().min(0).max(1),
    fusion_conf_critical: z.number().min(0).max(1),
  })
  .partial();

export type FusionConfigFile = z.infer<typeof fusionConfigFileSchema>;

export interface FusionConfigLoadResult {
  config: FusionConfig;
  source: 'file' | 'default';
  path: string;
  warnings: string[];
}

/**
 * 기본값 + 부분 덮어쓰기
 */
export function createFusionConfig(overrides: Partial<FusionConfig> = {}): FusionConfig {
  return {
    ...DEFAULT_FUSION_CONFIG,
    ...overrides,
    positionFusionWeight: {
      ...DEFAULT_FUSION_CONFIG.positionFusionWeight,
      ...overrides.positionFusionWeight,
    },
  };
}

/**
 * snake_case 파일 값을 설정 객체로 변환
 */
export function fromConfigFile(file: FusionConfigFile): FusionConfig {
  const defaults = DEFAULT_FUSION_CONFIG;
  return {
    dtSeconds: file.dt_seconds ?? defaults.dtSeconds,
    fusionTimeGateMs: file.fusion_time_gate_ms ?? defaults.fusionTimeGateMs,
    staleTicks: file.stale_ticks ?? defaults.staleTicks,
    maxTelemetryHistory: file.max_telemetry_history ?? defaults.maxTelemetryHistory,
    maxMeasurementHistory: file.max_measurement_history ?? defaults.maxMeasurementHistory,
    maxAuditHistory: file.max_audit_history ?? defaults.maxAuditHistory,
    positionFusionWeight: {
      ...defaults.positionFusionWeight,
      ...file.position_fusion_weight,
    },
    clarityWarningThreshold: file.clarity_warning_threshold ?? defaults.clarityWarningThreshold,
    clarityCriticalThreshold: file.clarity_critical_threshold ?? defaults.clarityCriticalThreshold,
    fusionConfWarning: file.fusion_conf_warning ?? defaults.fusionConfWarning,
    fusionConfCritical: file.fusion_conf_critical ?? defaults.fusionConfCritical,
  };
}

/**
 * 설정 객체를 snake_case 파일 형식으로 변환 (내보내기용)
 */
export function toConfigFile(config: FusionConfig): Required<FusionConfigFile> {
  return {
    dt_seconds: config.dtSeconds,
    fusion_time_gate_ms: config.fusionTimeGateMs,
    stale_ticks: config.staleTicks,
    max_telemetry_history: config.maxTelemetryHistory,
    max_measurement_history: config.maxMeasurementHistory,
    max_audit_history: config.maxAuditHistory,
    position_fusion_weight: { ...config.positionFusionWeight },
    clarity_warning_threshold: config.clarityWarningThreshold,
    clarity_critical_threshold: config.clarityCriticalThreshold,
    fusion_conf_warning: config.fusionConfWarning,
    fusion_conf_critical: config.fusionConfCritical,
  };
}

/**
 * 융합 설정 로드. 실패해도 예외를 던지지 않는다.
 */
export function loadFusionConfig(filePath: string = DEFAULT_FUSION_CONFIG_FILE): FusionConfigLoadResult {
  const warnings: string[] = [];
  const fallback = (reason: string): FusionConfigLoadResult => {
    warnings.push(reason);
    console.warn(`[Config] ${reason}. 기본 융합 설정 사용`);
    return { config: createFusionConfig(), source: 'default', path: filePath, warnings };
  };

  if (!fs.existsSync(filePath)) {
    return fallback(`융합 설정 파일 없음: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fallback(`융합 설정 파일 파싱 실패 (${filePath}): ${message}`);
  }

  const parsed = fusionConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return fallback(`융합 설정 검증 실패 (${filePath}): ${issues}`);
  }

  console.log(`[Config] 융합 설정 로드: ${filePath}`);
  return { config: fromConfigFile(parsed.data), source: 'file', path: filePath, warnings };
}
