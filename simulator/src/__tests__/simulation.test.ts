/**
 * 시뮬레이션 엔진 (타이머 구동 + 이벤트) 테스트
 */

import { SimulatorToDashboardEvent } from '../../../shared/schemas';
import { createFusionConfig } from '../config/fusionConfig';
import { RunLogger } from '../core/logging/logger';
import { DEFAULT_EPOCH_MS } from '../core/state';
import { SimulationEngine } from '../simulation';

function createEngine(events: SimulatorToDashboardEvent[], logger: RunLogger = new RunLogger({ enabled: false })) {
  return new SimulationEngine((event) => events.push(event), {
    fusionConfig: createFusionConfig(),
    seed: 11,
    epochMs: DEFAULT_EPOCH_MS,
    tickIntervalMs: 100,
    logger,
  });
}

describe('SimulationEngine', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.useRealTimers();
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('stepOnce 는 텔레메트리/감사 이벤트 후 상태 이벤트를 보내야 함', () => {
    const events: SimulatorToDashboardEvent[] = [];
    const engine = createEngine(events);

    const outcome = engine.stepOnce();

    expect(outcome?.telemetry.tick).toBe(1);
    const types = events.map((e) => e.type);
    expect(types[0]).toBe('telemetry_update');
    expect(types[1]).toBe('audit_appended');
    expect(types[types.length - 1]).toBe('simulation_status');

    const status = engine.getStatus();
    expect(status.tick).toBe(1);
    expect(status.seed).toBe(11);
    expect(status.is_running).toBe(false);
    engine.shutdown();
  });

  it('audit_appended 이벤트는 감사 레코드 해시를 담아야 함', () => {
    const events: SimulatorToDashboardEvent[] = [];
    const engine = createEngine(events);

    const outcome = engine.stepOnce();
    const appended = events.find((e) => e.type === 'audit_appended');

    expect(appended).toEqual({
      type: 'audit_appended',
      tick: 1,
      sha256: outcome?.audit.sha256,
      used_count: outcome?.audit.usedMeasurements.length,
    });
    engine.shutdown();
  });

  it('타이머는 속도 배율에 맞춰 틱을 진행해야 함', () => {
    jest.useFakeTimers();
    const events: SimulatorToDashboardEvent[] = [];
    const engine = createEngine(events);

    engine.start();
    jest.advanceTimersByTime(350);
    expect(engine.getState().tick).toBe(3);

    engine.setSpeedMultiplier(2);
    jest.advanceTimersByTime(100);
    expect(engine.getState().tick).toBe(5);

    engine.pause();
    jest.advanceTimersByTime(1000);
    expect(engine.getState().tick).toBe(5);
    expect(engine.getStatus().speed_multiplier).toBe(2);
    engine.shutdown();
  });

  it('0 이하의 속도 배율은 거부해야 함', () => {
    const engine = createEngine([]);
    expect(() => engine.setSpeedMultiplier(0)).toThrow(RangeError);
    expect(() => engine.setSpeedMultiplier(-1)).toThrow(RangeError);
    engine.shutdown();
  });

  it('틱 실패 시 루프를 멈추고 오류 이벤트를 보내야 함', () => {
    jest.useFakeTimers();
    const events: SimulatorToDashboardEvent[] = [];
    const engine = createEngine(events);

    engine.setScenario({ fusionStrategyName: 'kalman' });
    engine.start();
    jest.advanceTimersByTime(100);

    const error = events.find((e) => e.type === 'simulation_error');
    expect(error).toEqual({
      type: 'simulation_error',
      tick: 1,
      message: 'kalman 융합 전략은 구현되지 않았습니다. 검증 전에는 사용할 수 없습니다',
    });
    expect(engine.getStatus().is_running).toBe(false);
    expect(engine.getState().tick).toBe(0);

    jest.advanceTimersByTime(1000);
    expect(events.filter((e) => e.type === 'simulation_error')).toHaveLength(1);
    engine.shutdown();
  });

  it('stepOnce 실패는 null 을 돌려줘야 함', () => {
    const engine = createEngine([]);
    engine.setScenario({ fusionStrategyName: 'kalman' });

    expect(engine.stepOnce()).toBeNull();
    expect(engine.getState().tick).toBe(0);
    engine.shutdown();
  });

  it('시나리오 변경은 지정한 항목만 바꿔야 함', () => {
    const engine = createEngine([]);
    const before = engine.getStatus().scenario;

    engine.setScenario({ environmentName: 'EO/IR Degraded' });

    expect(engine.getStatus().scenario).toEqual({ ...before, environmentName: 'EO/IR Degraded' });
    engine.shutdown();
  });

  it('reset 은 새 시드로 틱 0 부터 다시 시작하고 통계를 비워야 함', () => {
    const logger = new RunLogger({ enabled: false });
    const engine = createEngine([], logger);
    engine.stepOnce();
    engine.stepOnce();
    expect(logger.getStats().ticks).toBe(2);

    const previousRunId = engine.getStatus().run_id;
    engine.reset(42);

    const status = engine.getStatus();
    expect(status.tick).toBe(0);
    expect(status.seed).toBe(42);
    expect(status.run_id).not.toBe(previousRunId);
    expect(engine.getHistory()).toEqual([]);
    expect(logger.getStats().ticks).toBe(0);
    engine.shutdown();
  });

  it('reset 후의 실행은 같은 시드의 새 엔진과 같은 텔레메트리/해시를 내야 함', () => {
    const engine = createEngine([]);
    for (let i = 0; i < 6; i++) engine.stepOnce();

    engine.reset(5);
    const fresh = new SimulationEngine(() => undefined, {
      fusionConfig: createFusionConfig(),
      seed: 5,
      epochMs: DEFAULT_EPOCH_MS,
      tickIntervalMs: 100,
      logger: new RunLogger({ enabled: false }),
    });

    for (let i = 0; i < 10; i++) {
      const replayed = engine.stepOnce();
      const expected = fresh.stepOnce();
      expect(replayed).not.toBeNull();
      expect(replayed?.telemetry).toEqual(expected?.telemetry);
      expect(replayed?.audit.sha256).toBe(expected?.audit.sha256);
    }
    expect(engine.getStatus().tick).toBe(10);
    engine.shutdown();
    fresh.shutdown();
  });

  it('히스토리/감사 조회와 검증이 동작해야 함', () => {
    const engine = createEngine([]);
    for (let i = 0; i < 4; i++) engine.stepOnce();

    expect(engine.getHistory().map((t) => t.tick)).toEqual([1, 2, 3, 4]);
    expect(engine.getHistory(2).map((t) => t.tick)).toEqual([3, 4]);
    expect(engine.getAuditChain(1).map((a) => a.tick)).toEqual([4]);
    expect(engine.verifyAuditChain()).toEqual({ verified: 4, invalidTicks: [] });
    engine.shutdown();
  });
});
