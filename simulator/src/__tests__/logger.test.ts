/**
 * JSONL 로거 테스트
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createFusionConfig, toConfigFile } from '../config/fusionConfig';
import { RunLogger, getLogger, resetLogger } from '../core/logging/logger';

const runStart = {
  run_id: 'run-test',
  seed: 1,
  epoch_utc: '2024-01-01T00:00:00.000Z',
  scenario: {
    areaName: 'Kharkiv (synthetic)',
    environmentName: 'Clear Skies / Clean Link',
    envelopeName: 'Nominal Demo Flight',
    thresholdName: 'Balanced',
    fusionStrategyName: 'weighted',
  },
  config: toConfigFile(createFusionConfig()),
};

async function waitForLines(file: string, count: number, timeoutMs: number = 2000): Promise<string[]> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const lines = fs.existsSync(file) ? fs.readFileSync(file, 'utf-8').split('\n').filter((l) => l.length > 0) : [];
    if (lines.length >= count || Date.now() > deadline) return lines;
    await new Promise<void>((resolve) => setTimeout(resolve, 10));
  }
}

function tickEvent(tick: number, state: 'STABLE' | 'CRITICAL') {
  return {
    timestamp: tick,
    event: 'tick' as const,
    tick,
    stage: 'STAGE_1_BOOST',
    lat: 50,
    lon: 36,
    altitude_m: 1000,
    fusion_conf: 0.9,
    surprise: 0.1,
    clarity: 90,
    risk: 10,
    predicted_risk: 5,
    state,
    measurement_count: 6,
    used_count: 3,
  };
}

describe('RunLogger', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    resetLogger();
  });

  it('비활성화 상태에서도 통계를 집계해야 함', () => {
    const logger = new RunLogger({ enabled: false });
    logger.startRun(runStart);

    logger.log(tickEvent(1, 'STABLE'));
    logger.log(tickEvent(2, 'CRITICAL'));
    logger.log({
      timestamp: 2,
      event: 'governance_alert',
      tick: 2,
      alerts: [
        { severity: 'CRITICAL', kind: 'CLARITY', message: 'c', value: 50, threshold: 65 },
        { severity: 'WARNING', kind: 'THREAT', message: 't', value: 70, threshold: 65 },
      ],
    });

    expect(logger.getStats()).toEqual({
      ticks: 2,
      alerts: 2,
      critical_alerts: 1,
      state_counts: { STABLE: 1, TENSE: 0, HIGH_RISK: 0, CRITICAL: 1 },
    });
  });

  it('run_reset 은 통계를 비워야 함', () => {
    const logger = new RunLogger({ enabled: false });
    logger.startRun(runStart);
    logger.log(tickEvent(1, 'STABLE'));
    logger.log({ timestamp: 0, event: 'run_reset', previous_run_id: 'run-test', run_id: 'run-2', seed: 2 });

    expect(logger.getStats().ticks).toBe(0);
  });

  it('비활성화 상태에서는 로그 디렉토리를 만들지 않아야 함', () => {
    const dir = path.join(os.tmpdir(), `recon-logger-disabled-${process.pid}`);
    const logger = new RunLogger({ enabled: false, logsDir: dir });
    logger.startRun(runStart);
    logger.endRun(0, 0);

    expect(fs.existsSync(dir)).toBe(false);
  });

  it('활성화 상태에서는 JSONL 파일에 기록해야 함', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recon-logger-'));
    const logger = new RunLogger({ enabled: true, logsDir: dir, customFilename: 'run.jsonl' });
    logger.startRun(runStart);
    logger.log(tickEvent(1, 'STABLE'));

    const file = logger.getCurrentLogFile();
    expect(file).toBe(path.join(dir, 'run.jsonl'));

    logger.endRun(1, 1);

    const lines = await waitForLines(path.join(dir, 'run.jsonl'), 3);
    const events = lines.map((line) => /"event":"([a-z_]+)"/.exec(line)?.[1]);
    expect(events).toEqual(['run_start', 'tick', 'run_end']);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('getLogger 는 싱글톤을 돌려줘야 함', () => {
    const a = getLogger({ enabled: false });
    const b = getLogger({ enabled: true });
    expect(b).toBe(a);

    resetLogger();
    expect(getLogger({ enabled: false })).not.toBe(a);
  });
});
