/**
 * WebSocket 보안 미들웨어
 * - 인증 (토큰 기반)
 * - 명령 메시지 검증 (zod)
 */

import { IncomingMessage } from 'http';
import { z } from 'zod';
import { DashboardToSimulatorCommand } from '../../../shared/schemas';
import { SimulatorConfig } from '../config';

/** 메시지 최대 크기 (바이트) */
export const MAX_MESSAGE_BYTES = 64 * 1024;

/**
 * 인증 검증
 */
export function validateAuth(
  request: IncomingMessage,
  config: Pick<SimulatorConfig, 'authEnabled' | 'authToken'>
): { valid: boolean; reason?: string } {
  if (!config.authEnabled) {
    return { valid: true };
  }

  if (!config.authToken) {
    console.error('[Security] AUTH_ENABLED=true이지만 AUTH_TOKEN이 설정되지 않음');
    return { valid: false, reason: '서버 설정 오류' };
  }

  // URL 파라미터에서 토큰 추출
  const url = new URL(request.url || '', `http://${request.headers.host ?? 'localhost'}`);
  const token = url.searchParams.get('token');

  // Authorization 헤더에서 토큰 추출
  const authHeader = request.headers.authorization;
  const headerToken = authHeader?.startsWith('Bearer ')
    ? authHeader.substring(7)
    : null;

  const providedToken = token || headerToken;

  if (!providedToken) {
    return { valid: false, reason: '인증 토큰이 필요합니다' };
  }

  if (providedToken !== config.authToken) {
    return { valid: false, reason: '잘못된 인증 토큰입니다' };
  }

  return { valid: true };
}

/**
 * 클라이언트 IP 추출
 */
export function getClientId(request: IncomingMessage): string {
  // X-Forwarded-For 헤더 확인 (프록시 뒤에 있는 경우)
  const forwarded = request.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }

  // 직접 연결
  return request.socket.remoteAddress || 'unknown';
}

// ============================================
// 명령 스키마
// ============================================

const presetName = z.string().min(1).max(100);
const limit = z.number().int().positive().max(10000).optional();

const simulationControlSchema = z
  .object({
    type: z.literal('simulation_control'),
    action: z.enum(['start', 'pause', 'reset', 'step', 'set_speed']),
    seed: z.number().int().nonnegative().max(2 ** 32 - 1).optional(),
    speed_multiplier: z.number().positive().max(100).optional(),
  })
  .refine((cmd) => cmd.action !== 'set_speed' || cmd.speed_multiplier !== undefined, {
    message: 'set_speed 에는 speed_multiplier 가 필요합니다',
    path: ['speed_multiplier'],
  });

const scenarioSelectSchema = z.object({
  type: z.literal('scenario_select'),
  area: presetName.optional(),
  environment: presetName.optional(),
  envelope: presetName.optional(),
  threshold: presetName.optional(),
  fusion_strategy: presetName.optional(),
});

const getHistorySchema = z.object({ type: z.literal('get_history'), limit });
const getAuditChainSchema = z.object({ type: z.literal('get_audit_chain'), limit });
const verifyAuditSchema = z.object({ type: z.literal('verify_audit') });

export type MessageValidation =
  | { valid: true; command: DashboardToSimulatorCommand }
  | { valid: false; reason: string; kind: 'too_large' | 'malformed' | 'unknown_command' };

/**
 * 명령 메시지 검증
 *
 * 원시 텍스트를 받아 크기 → JSON → type → 명령별 스키마 순으로 검사한다.
 */
export function validateMessage(raw: string): MessageValidation {
  if (Buffer.byteLength(raw, 'utf8') > MAX_MESSAGE_BYTES) {
    return { valid: false, reason: `메시지 크기가 너무 큽니다 (최대 ${MAX_MESSAGE_BYTES} bytes)`, kind: 'too_large' };
  }

  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return { valid: false, reason: 'JSON 파싱 실패', kind: 'malformed' };
  }

  const envelope = z.object({ type: z.string().min(1).max(100) }).safeParse(message);
  if (!envelope.success) {
    return { valid: false, reason: 'type 필드가 필요합니다', kind: 'malformed' };
  }

  const type = envelope.data.type;
  switch (type) {
    case 'simulation_control':
      return toValidation(type, simulationControlSchema.safeParse(message));
    case 'scenario_select':
      return toValidation(type, scenarioSelectSchema.safeParse(message));
    case 'get_history':
      return toValidation(type, getHistorySchema.safeParse(message));
    case 'get_audit_chain':
      return toValidation(type, getAuditChainSchema.safeParse(message));
    case 'verify_audit':
      return toValidation(type, verifyAuditSchema.safeParse(message));
    default:
      return { valid: false, reason: `알 수 없는 명령: ${type}`, kind: 'unknown_command' };
  }
}

function toValidation<I, T extends DashboardToSimulatorCommand>(
  type: string,
  result: z.SafeParseReturnType<I, T>
): MessageValidation {
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || type}: ${issue.message}`)
      .join('; ');
    return { valid: false, reason, kind: 'malformed' };
  }
  return { valid: true, command: result.data };
}
