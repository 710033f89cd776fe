/**
 * WebSocket 에러 핸들링
 * 체계적인 에러 처리 및 로깅
 */

import WebSocket from 'ws';

/**
 * 에러 코드 정의
 */
export enum ErrorCode {
  // 인증 관련
  AUTH_REQUIRED = 4001,
  AUTH_INVALID = 4002,

  // 메시지 관련
  INVALID_MESSAGE = 4400,
  MESSAGE_TOO_LARGE = 4413,
  INVALID_COMMAND = 4404,

  // 시뮬레이션 명령 실행 실패
  COMMAND_FAILED = 4422,

  // 서버 에러
  INTERNAL_ERROR = 4500,

  // 연결 관련
  CONNECTION_TIMEOUT = 4408,
  TOO_MANY_CONNECTIONS = 4429,
}

/**
 * 에러 메시지 정의
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.AUTH_REQUIRED]: '인증이 필요합니다',
  [ErrorCode.AUTH_INVALID]: '잘못된 인증 정보입니다',
  [ErrorCode.INVALID_MESSAGE]: '잘못된 메시지 형식입니다',
  [ErrorCode.MESSAGE_TOO_LARGE]: '메시지 크기가 너무 큽니다',
  [ErrorCode.INVALID_COMMAND]: '알 수 없는 명령입니다',
  [ErrorCode.COMMAND_FAILED]: '명령을 실행할 수 없습니다',
  [ErrorCode.INTERNAL_ERROR]: '내부 서버 오류',
  [ErrorCode.CONNECTION_TIMEOUT]: '연결 시간 초과',
  [ErrorCode.TOO_MANY_CONNECTIONS]: '동시 연결 수 제한 초과',
};

export type ErrorDetails = Record<string, string | number | boolean>;

/**
 * 에러 응답 인터페이스
 */
export interface ErrorResponse {
  type: 'error';
  code: ErrorCode;
  message: string;
  timestamp: number;
  details?: ErrorDetails;
}

export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] ?? '알 수 없는 오류';
}

/**
 * 에러 응답 생성
 */
export function createErrorResponse(code: ErrorCode, details?: ErrorDetails): ErrorResponse {
  return {
    type: 'error',
    code,
    message: getErrorMessage(code),
    timestamp: Date.now(),
    details,
  };
}

/**
 * WebSocket으로 에러 전송
 */
export function sendError(ws: WebSocket, code: ErrorCode, details?: ErrorDetails): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(createErrorResponse(code, details)));
  }
}

/**
 * WebSocket 연결 종료 (에러와 함께)
 */
export function closeWithError(ws: WebSocket, code: ErrorCode, details?: ErrorDetails): void {
  sendError(ws, code, details);

  // 에러 메시지 전송 후 종료
  setTimeout(() => {
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.close(code, getErrorMessage(code));
    }
  }, 100);
}

interface ErrorEntry {
  code: ErrorCode;
  timestamp: number;
  clientId: string;
  details?: string;
}

/**
 * 에러 로거
 */
export class ErrorLogger {
  private static instance: ErrorLogger | null = null;
  private errorCounts: Map<ErrorCode, number> = new Map();
  private totalCounts: Map<ErrorCode, number> = new Map();
  private lastErrors: ErrorEntry[] = [];
  private statsTimer: ReturnType<typeof setInterval>;

  private constructor() {
    // 주기적으로 에러 통계 출력 (1분마다, 프로세스 종료를 막지 않음)
    this.statsTimer = setInterval(() => this.printStats(), 60000);
    this.statsTimer.unref();
  }

  static getInstance(): ErrorLogger {
    if (!ErrorLogger.instance) {
      ErrorLogger.instance = new ErrorLogger();
    }
    return ErrorLogger.instance;
  }

  /**
   * 싱글톤 폐기 (테스트용)
   */
  static resetInstance(): void {
    if (ErrorLogger.instance) {
      clearInterval(ErrorLogger.instance.statsTimer);
    }
    ErrorLogger.instance = null;
  }

  /**
   * 에러 기록
   */
  log(code: ErrorCode, clientId: string, details?: string): void {
    this.errorCounts.set(code, (this.errorCounts.get(code) ?? 0) + 1);
    this.totalCounts.set(code, (this.totalCounts.get(code) ?? 0) + 1);

    // 최근 에러 기록 (최대 100개)
    this.lastErrors.push({ code, timestamp: Date.now(), clientId, details });
    if (this.lastErrors.length > 100) {
      this.lastErrors.shift();
    }

    console.error(
      `[WS Error] ${getErrorMessage(code)} (Code: ${code}, Client: ${clientId})`,
      details ?? ''
    );
  }

  /**
   * 에러 통계 출력
   */
  private printStats(): void {
    if (this.errorCounts.size === 0) return;

    console.log('========================================');
    console.log('  WebSocket 에러 통계 (지난 1분)');
    console.log('========================================');

    for (const [code, count] of this.errorCounts.entries()) {
      console.log(`  ${getErrorMessage(code)}: ${count}회`);
    }

    console.log('========================================');

    this.errorCounts.clear();
  }

  /**
   * 누적 에러 횟수
   */
  getCount(code: ErrorCode): number {
    return this.totalCounts.get(code) ?? 0;
  }

  /**
   * 최근 에러 조회
   */
  getRecentErrors(limit: number = 10): ErrorEntry[] {
    return this.lastErrors.slice(-limit);
  }
}

/**
 * 에러 핸들링 헬퍼
 */
export function handleWebSocketError(error: Error, ws: WebSocket, clientId: string): void {
  const logger = ErrorLogger.getInstance();

  if (error.message.includes('timeout')) {
    closeWithError(ws, ErrorCode.CONNECTION_TIMEOUT);
    logger.log(ErrorCode.CONNECTION_TIMEOUT, clientId, error.message);
  } else {
    sendError(ws, ErrorCode.INTERNAL_ERROR);
    logger.log(ErrorCode.INTERNAL_ERROR, clientId, error.message);
  }

  // 스택 트레이스 출력 (개발 모드)
  if (process.env.NODE_ENV === 'development') {
    console.error('[WS Error Stack]', error.stack);
  }
}

/**
 * Ping/Pong 하트비트 설정
 */
export function setupHeartbeat(
  ws: WebSocket,
  clientId: string,
  intervalMs: number = 30000
): { interval: NodeJS.Timeout; cleanup: () => void } {
  let isAlive = true;

  ws.on('pong', () => {
    isAlive = true;
  });

  const interval = setInterval(() => {
    if (!isAlive) {
      console.warn(`[WS] 하트비트 실패, 연결 종료: ${clientId}`);
      ws.terminate();
      return;
    }

    isAlive = false;
    ws.ping();
  }, intervalMs);

  const cleanup = () => {
    clearInterval(interval);
  };

  return { interval, cleanup };
}
