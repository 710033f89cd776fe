/**
 * 헤드리스 배치 러너
 *
 * 타이머 없이 스텝 엔진을 직접 호출하여 지정한 틱 수만큼 실행하고
 * 요약을 돌려준다. 같은 (시드, 에포크, 시나리오) 이면 요약도 같다.
 * outputDir 지정 시 telemetry.jsonl / audit.jsonl 저장.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AlertKind,
  AlertSeverity,
  AuditRecord,
  ScenarioSelection,
  SystemState,
  Telemetry,
} from '../../../shared/schemas';
import { createFusionConfig, FusionConfig } from '../config/fusionConfig';
import { verifyAuditRecord } from '../core/audit';
import { DEFAULT_EPOCH_MS, EngineState } from '../core/state';
import { StepEngine } from '../stepEngine';

export interface BatchRunOptions {
  seed: number;
  ticks: number;
  scenario?: Partial<ScenarioSelection>;
  /** 틱 0 의 UTC 시각 (ms), 기본 2024-01-01T00:00:00Z */
  epochMs?: number;
  outputDir?: string;
  fusionConfig?: FusionConfig;
  /** 진행률 출력 */
  verbose?: boolean;
}

export interface BatchRunSummary {
  seed: number;
  epochUtc: string;
  scenario: ScenarioSelection;
  finalTick: number;
  missionTimeS: number;
  finalStage: string;
  finalClarity: number;
  finalRisk: number;
  finalState: SystemState;
  meanFusionConf: number;
  stateCounts: Record<SystemState, number>;
  alertCounts: Record<AlertSeverity, number>;
  alertKinds: Record<AlertKind, number>;
  auditHead: string | null;
  /** 실행 중 생성된 모든 감사 레코드의 해시 재검증 결과 */
  allAuditVerified: boolean;
  outputFiles?: { telemetry: string; audit: string };
}

export class BatchRunner {
  /**
   * 단일 배치 실행
   */
  run(options: BatchRunOptions): BatchRunSummary {
    if (!Number.isInteger(options.ticks) || options.ticks < 0) {
      throw new RangeError(`ticks 는 0 이상의 정수여야 합니다: ${options.ticks}`);
    }

    const state = new EngineState({
      config: options.fusionConfig ?? createFusionConfig(),
      seed: options.seed,
      epochMs: options.epochMs ?? DEFAULT_EPOCH_MS,
      scenario: options.scenario,
    });
    const engine = new StepEngine();

    const telemetryLog: Telemetry[] = [];
    const auditLog: AuditRecord[] = [];

    const stateCounts: Record<SystemState, number> = { STABLE: 0, TENSE: 0, HIGH_RISK: 0, CRITICAL: 0 };
    const alertCounts: Record<AlertSeverity, number> = { WARNING: 0, CRITICAL: 0 };
    const alertKinds: Record<AlertKind, number> = {
      CLARITY: 0,
      FUSION_CONFIDENCE: 0,
      THREAT: 0,
      STALE_SENSOR: 0,
    };
    let fusionConfSum = 0;
    let allAuditVerified = true;

    if (options.verbose) {
      console.log(`[Batch] 실행 시작: seed=${options.seed}, ticks=${options.ticks}`);
    }
    const progressInterval = Math.max(1, Math.floor(options.ticks / 10));

    for (let i = 0; i < options.ticks; i++) {
      const { telemetry, audit, alerts } = engine.step(state);

      stateCounts[telemetry.state]++;
      fusionConfSum += telemetry.fusionConf;
      for (const alert of alerts) {
        alertCounts[alert.severity]++;
        alertKinds[alert.kind]++;
      }
      if (!verifyAuditRecord(audit)) {
        allAuditVerified = false;
      }

      if (options.outputDir) {
        telemetryLog.push(telemetry);
        auditLog.push(audit);
      }

      if (options.verbose && (i + 1) % progressInterval === 0) {
        process.stdout.write(`\r[Batch] 진행: ${Math.floor(((i + 1) / options.ticks) * 100)}%`);
      }
    }
    if (options.verbose) process.stdout.write('\n');

    const last = state.history.last();
    const summary: BatchRunSummary = {
      seed: state.rngSeed,
      epochUtc: state.utcFor(0),
      scenario: { ...state.scenario },
      finalTick: state.tick,
      missionTimeS: state.missionTimeS,
      finalStage: last?.missionStageCode ?? 'NONE',
      finalClarity: last?.clarity ?? engine.clarityEma * 100,
      finalRisk: last?.risk ?? 0,
      finalState: last?.state ?? 'STABLE',
      meanFusionConf: options.ticks > 0 ? fusionConfSum / options.ticks : 0,
      stateCounts,
      alertCounts,
      alertKinds,
      auditHead: state.auditChain.last()?.sha256 ?? null,
      allAuditVerified,
    };

    if (options.outputDir) {
      summary.outputFiles = this.writeOutputs(options.outputDir, telemetryLog, auditLog);
    }

    if (options.verbose) {
      console.log(
        `[Batch] 완료: tick=${summary.finalTick}, clarity=${summary.finalClarity.toFixed(1)}, ` +
          `risk=${summary.finalRisk.toFixed(1)}, state=${summary.finalState}`
      );
    }

    return summary;
  }

  /**
   * JSONL 저장 (1줄 1레코드)
   */
  private writeOutputs(
    outputDir: string,
    telemetry: Telemetry[],
    audit: AuditRecord[]
  ): { telemetry: string; audit: string } {
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }

    const telemetryPath = path.join(outputDir, 'telemetry.jsonl');
    const auditPath = path.join(outputDir, 'audit.jsonl');

    fs.writeFileSync(telemetryPath, telemetry.map((t) => JSON.stringify(t) + '\n').join(''));
    fs.writeFileSync(auditPath, audit.map((a) => JSON.stringify(a) + '\n').join(''));

    return { telemetry: telemetryPath, audit: auditPath };
  }
}
