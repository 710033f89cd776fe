/**
 * JSONL 로거 시스템
 *
 * 실행 이벤트를 JSONL 형식으로 파일에 저장합니다.
 * 파일명: {logsDir}/{run_id}_{timestamp}.jsonl
 *
 * 로그는 진단용으로 추가만 하며 다시 읽지 않습니다.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SystemState } from '../../../../shared/schemas';
import { LogEvent, RunStartEvent, RunStats } from './eventSchemas';

export interface LoggerConfig {
  logsDir: string;
  enabled: boolean;
  consoleOutput: boolean;  // 콘솔에도 출력할지 여부
  customFilename?: string;  // 커스텀 파일명 (선택사항)
}

const DEFAULT_CONFIG: LoggerConfig = {
  logsDir: './logs',
  enabled: true,
  consoleOutput: false,
  customFilename: undefined,
};

function emptyStateCounts(): Record<SystemState, number> {
  return { STABLE: 0, TENSE: 0, HIGH_RISK: 0, CRITICAL: 0 };
}

function emptyStats(): RunStats {
  return { ticks: 0, alerts: 0, critical_alerts: 0, state_counts: emptyStateCounts() };
}

export class RunLogger {
  private config: LoggerConfig;
  private currentFile: string | null = null;
  private writeStream: fs.WriteStream | null = null;
  private runId: string | null = null;
  private eventCount: number = 0;

  // 통계 추적
  private stats: RunStats = emptyStats();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * 로그 디렉토리 확인/생성
   */
  private ensureLogsDir(): void {
    if (!fs.existsSync(this.config.logsDir)) {
      fs.mkdirSync(this.config.logsDir, { recursive: true });
    }
  }

  /**
   * 새 실행 시작
   */
  startRun(event: Omit<RunStartEvent, 'event' | 'timestamp'>): void {
    // 이전 세션 종료
    if (this.runId !== null) {
      this.endRun();
    }

    this.runId = event.run_id;
    this.eventCount = 0;
    this.stats = emptyStats();

    // 파일 생성
    let filename: string;
    if (this.config.customFilename) {
      filename = this.config.customFilename;
    } else {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      filename = `${event.run_id}_${timestamp}.jsonl`;
    }
    this.currentFile = path.join(this.config.logsDir, filename);

    if (this.config.enabled) {
      this.ensureLogsDir();
      this.writeStream = fs.createWriteStream(this.currentFile, { flags: 'a' });
      console.log(`[Logger] 로그 파일 생성: ${this.currentFile}`);
    }

    this.log({ timestamp: 0, event: 'run_start', ...event });
  }

  /**
   * 실행 종료
   */
  endRun(missionTimeS: number = 0, finalTick: number = 0): void {
    if (this.runId === null) return;

    this.log({
      timestamp: missionTimeS,
      event: 'run_end',
      run_id: this.runId,
      final_tick: finalTick,
      summary: this.getStats(),
    });

    // 스트림 닫기
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
      console.log(`[Logger] 로그 저장 완료: ${this.eventCount}개 이벤트, ${this.currentFile}`);
    }

    this.runId = null;
    this.currentFile = null;
  }

  /**
   * 이벤트 로깅
   */
  log(event: LogEvent): void {
    // 통계는 파일 기록 여부와 무관하게 유지
    this.updateStats(event);

    if (!this.config.enabled) return;

    // JSONL 형식으로 기록
    const line = JSON.stringify(event) + '\n';

    if (this.writeStream) {
      this.writeStream.write(line);
      this.eventCount++;
    }

    if (this.config.consoleOutput) {
      console.log(`[Log] ${event.event}:`, JSON.stringify(event).substring(0, 100));
    }
  }

  /**
   * 통계 업데이트
   */
  private updateStats(event: LogEvent): void {
    switch (event.event) {
      case 'tick':
        this.stats.ticks++;
        this.stats.state_counts[event.state]++;
        break;
      case 'governance_alert':
        this.stats.alerts += event.alerts.length;
        this.stats.critical_alerts += event.alerts.filter((a) => a.severity === 'CRITICAL').length;
        break;
      case 'run_reset':
        this.stats = emptyStats();
        break;
    }
  }

  /**
   * 현재 통계 반환
   */
  getStats(): RunStats {
    return { ...this.stats, state_counts: { ...this.stats.state_counts } };
  }

  /**
   * 로거 활성화/비활성화
   */
  setEnabled(enabled: boolean): void {
    this.config.enabled = enabled;
  }

  /**
   * 현재 로그 파일 경로 반환
   */
  getCurrentLogFile(): string | null {
    return this.currentFile;
  }
}

// 싱글톤 인스턴스
let loggerInstance: RunLogger | null = null;

export function getLogger(config?: Partial<LoggerConfig>): RunLogger {
  if (!loggerInstance) {
    loggerInstance = new RunLogger(config);
  }
  return loggerInstance;
}

export function resetLogger(): void {
  if (loggerInstance) {
    loggerInstance.endRun();
  }
  loggerInstance = null;
}
