/**
 * 환경 변수 검증 및 로드
 * Zod 스키마 기반 타입 안전 환경 설정
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

// .env 파일 로드
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  console.log('[Config] .env 파일 로드됨:', envPath);
}

/**
 * 환경 변수 스키마 정의
 */
const envSchema = z.object({
  // 서버 설정
  SIMULATOR_PORT: z
    .string()
    .default('8080')
    .transform((val) => parseInt(val, 10))
    .refine((val) => val > 0 && val < 65536, {
      message: 'SIMULATOR_PORT는 1-65535 사이여야 합니다',
    }),

  SIMULATOR_WS_URL: z
    .string()
    .default('ws://localhost:8080')
    .refine((val) => val.startsWith('ws://') || val.startsWith('wss://'), {
      message: 'SIMULATOR_WS_URL은 ws:// 또는 wss://로 시작해야 합니다',
    }),

  // 로깅 설정
  LOGS_DIR: z.string().default('./logs'),

  LOG_CONSOLE_OUTPUT: z
    .string()
    .default('false')
    .transform((val) => val.toLowerCase() === 'true'),

  LOG_ENABLED: z
    .string()
    .default('true')
    .transform((val) => val.toLowerCase() !== 'false'),

  // 융합 설정 파일 (없으면 기본 경로)
  FUSION_CONFIG_PATH: z.string().optional(),

  // 시뮬레이션 루프
  TICK_INTERVAL_MS: z
    .string()
    .default('250')
    .transform((val) => parseInt(val, 10))
    .refine((val) => Number.isFinite(val) && val >= 10, {
      message: 'TICK_INTERVAL_MS는 10 이상이어야 합니다',
    }),

  // 고정 시드 (재현 실행용)
  RUN_SEED: z
    .string()
    .regex(/^\d+$/, { message: 'RUN_SEED는 0 이상의 정수여야 합니다' })
    .transform((val) => parseInt(val, 10))
    .optional(),

  // 틱 0 의 UTC 기준 시각 (epoch ms, 재현 실행용)
  RUN_EPOCH_MS: z
    .string()
    .regex(/^\d+$/, { message: 'RUN_EPOCH_MS는 0 이상의 정수여야 합니다' })
    .transform((val) => parseInt(val, 10))
    .optional(),

  // 환경 설정
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  // 보안 설정
  AUTH_ENABLED: z
    .string()
    .default('false')
    .transform((val) => val.toLowerCase() === 'true'),

  AUTH_TOKEN: z.string().optional(),
});

/**
 * 환경 변수 타입
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증 및 로드
 */
export function loadAndValidateEnv(): Env {
  try {
    const env = envSchema.parse(process.env);

    if (env.AUTH_ENABLED && !env.AUTH_TOKEN) {
      throw new Error(
        'AUTH_ENABLED가 true일 때 AUTH_TOKEN은 필수입니다'
      );
    }

    if (env.NODE_ENV === 'production' && !env.AUTH_ENABLED) {
      console.warn(
        '[Config] 경고: 프로덕션 환경에서 인증이 비활성화되어 있습니다'
      );
    }

    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] 환경 변수 검증 실패:');
      error.issues.forEach((issue: z.ZodIssue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new Error('환경 변수 설정이 올바르지 않습니다');
    }
    throw error;
  }
}

/**
 * 환경 변수 출력 (디버깅용, 민감한 정보 마스킹)
 */
export function printEnvConfig(env: Env): void {
  console.log('========================================');
  console.log('  환경 설정');
  console.log('========================================');
  console.log(`환경: ${env.NODE_ENV}`);
  console.log(`포트: ${env.SIMULATOR_PORT}`);
  console.log(`WebSocket URL: ${env.SIMULATOR_WS_URL}`);
  console.log(`로그 디렉토리: ${env.LOGS_DIR}`);
  console.log(`로그 활성화: ${env.LOG_ENABLED}`);
  console.log(`콘솔 로그 출력: ${env.LOG_CONSOLE_OUTPUT}`);
  console.log(`융합 설정 파일: ${env.FUSION_CONFIG_PATH ?? '(기본값)'}`);
  console.log(`틱 간격: ${env.TICK_INTERVAL_MS}ms`);
  console.log(`시드: ${env.RUN_SEED ?? '(시각 기반)'}`);
  console.log(
    `기준 시각: ${env.RUN_EPOCH_MS !== undefined ? new Date(env.RUN_EPOCH_MS).toISOString() : '(시작 시각)'}`
  );
  console.log('----------------------------------------');
  console.log(`인증 활성화: ${env.AUTH_ENABLED}`);
  if (env.AUTH_ENABLED) {
    console.log(`인증 토큰: ${maskToken(env.AUTH_TOKEN)}`);
  }
  console.log('========================================');
}

/**
 * 토큰 마스킹 (보안)
 */
function maskToken(token?: string): string {
  if (!token) return '(설정되지 않음)';
  if (token.length <= 8) return '****';
  return token.substring(0, 4) + '****' + token.substring(token.length - 4);
}
