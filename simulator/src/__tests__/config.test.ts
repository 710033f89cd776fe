/**
 * 설정 모듈 테스트
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, getConfig } from '../config';
import {
  DEFAULT_FUSION_CONFIG,
  createFusionConfig,
  loadFusionConfig,
  toConfigFile,
} from '../config/fusionConfig';

describe('Config Module', () => {
  beforeEach(() => {
    // 환경 변수 초기화
    delete process.env.SIMULATOR_PORT;
    delete process.env.SIMULATOR_WS_URL;
    delete process.env.LOGS_DIR;
    delete process.env.LOG_CONSOLE_OUTPUT;
    delete process.env.LOG_ENABLED;
    delete process.env.FUSION_CONFIG_PATH;
    delete process.env.TICK_INTERVAL_MS;
    delete process.env.RUN_SEED;
    delete process.env.RUN_EPOCH_MS;
    delete process.env.AUTH_ENABLED;
    delete process.env.AUTH_TOKEN;
    process.env.NODE_ENV = 'test';
  });

  describe('loadConfig', () => {
    it('환경 변수가 없을 때 기본값을 반환해야 함', () => {
      const config = loadConfig();

      expect(config.port).toBe(8080);
      expect(config.wsUrl).toBe('ws://localhost:8080');
      expect(config.logsDir).toBe('./logs');
      expect(config.logConsoleOutput).toBe(false);
      expect(config.logEnabled).toBe(true);
      expect(config.fusionConfigPath).toBeUndefined();
      expect(config.tickIntervalMs).toBe(250);
      expect(config.runSeed).toBeUndefined();
      expect(config.runEpochMs).toBeUndefined();
      expect(config.authEnabled).toBe(false);
      expect(config.nodeEnv).toBe('test');
    });

    it('환경 변수에서 설정을 로드해야 함', () => {
      process.env.SIMULATOR_PORT = '9000';
      process.env.SIMULATOR_WS_URL = 'ws://localhost:9000';
      process.env.LOGS_DIR = './custom-logs';
      process.env.LOG_CONSOLE_OUTPUT = 'true';
      process.env.LOG_ENABLED = 'false';
      process.env.FUSION_CONFIG_PATH = './custom/fusion.json';
      process.env.TICK_INTERVAL_MS = '100';
      process.env.RUN_SEED = '42';
      process.env.RUN_EPOCH_MS = '1704067200000';
      process.env.NODE_ENV = 'production';
      process.env.AUTH_ENABLED = 'true';
      process.env.AUTH_TOKEN = 'test-secret';

      const config = loadConfig();

      expect(config.port).toBe(9000);
      expect(config.wsUrl).toBe('ws://localhost:9000');
      expect(config.logsDir).toBe('./custom-logs');
      expect(config.logConsoleOutput).toBe(true);
      expect(config.logEnabled).toBe(false);
      expect(config.fusionConfigPath).toBe('./custom/fusion.json');
      expect(config.tickIntervalMs).toBe(100);
      expect(config.runSeed).toBe(42);
      expect(config.runEpochMs).toBe(1704067200000);
      expect(config.nodeEnv).toBe('production');
      expect(config.authEnabled).toBe(true);
      expect(config.authToken).toBe('test-secret');
    });

    it('포트 번호를 올바르게 파싱해야 함', () => {
      process.env.SIMULATOR_PORT = '3000';
      const config = loadConfig();
      expect(config.port).toBe(3000);
      expect(typeof config.port).toBe('number');
    });

    it('인증 활성화 시 토큰이 없으면 예외를 던져야 함', () => {
      process.env.AUTH_ENABLED = 'true';
      expect(() => loadConfig()).toThrow('AUTH_ENABLED가 true일 때 AUTH_TOKEN은 필수입니다');
    });

    it('잘못된 값은 검증 오류로 거부해야 함', () => {
      process.env.TICK_INTERVAL_MS = '5';
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(() => loadConfig()).toThrow('환경 변수 설정이 올바르지 않습니다');
      errorSpy.mockRestore();
    });

    it('음수 시드는 거부해야 함', () => {
      process.env.RUN_SEED = '-1';
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(() => loadConfig()).toThrow('환경 변수 설정이 올바르지 않습니다');
      errorSpy.mockRestore();
    });

    it('정수가 아닌 기준 시각은 거부해야 함', () => {
      process.env.RUN_EPOCH_MS = '2024-01-01';
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(() => loadConfig()).toThrow('환경 변수 설정이 올바르지 않습니다');
      errorSpy.mockRestore();
    });
  });

  describe('getConfig', () => {
    it('싱글톤 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      const config2 = getConfig();

      expect(config1).toBe(config2);
    });

    it('환경 변수 변경 후에도 같은 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      process.env.SIMULATOR_PORT = '9999';
      const config2 = getConfig();

      // 싱글톤이므로 같은 인스턴스
      expect(config1).toBe(config2);
      // 하지만 값은 처음 로드된 값 유지
      expect(config1.port).toBe(config2.port);
    });
  });
});

describe('Fusion Config', () => {
  let tmpDir: string;
  let warnSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fusion-config-'));
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    logSpy.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('기본값이 문서화된 값과 같아야 함', () => {
    expect(DEFAULT_FUSION_CONFIG.dtSeconds).toBe(1.0);
    expect(DEFAULT_FUSION_CONFIG.fusionTimeGateMs).toBe(350);
    expect(DEFAULT_FUSION_CONFIG.staleTicks).toBe(6);
    expect(DEFAULT_FUSION_CONFIG.maxTelemetryHistory).toBe(600);
    expect(DEFAULT_FUSION_CONFIG.maxMeasurementHistory).toBe(3000);
    expect(DEFAULT_FUSION_CONFIG.maxAuditHistory).toBe(1000);
    expect(DEFAULT_FUSION_CONFIG.positionFusionWeight).toEqual({
      GNSS: 1.0,
      EOIR: 0.8,
      RADAR: 0.9,
      BARO: 0.3,
    });
  });

  it('부분 덮어쓰기 시 가중치 맵은 병합되어야 함', () => {
    const config = createFusionConfig({ fusionTimeGateMs: 500, positionFusionWeight: { GNSS: 0.5 } });
    expect(config.fusionTimeGateMs).toBe(500);
    expect(config.positionFusionWeight).toEqual({ GNSS: 0.5, EOIR: 0.8, RADAR: 0.9, BARO: 0.3 });
    expect(config.staleTicks).toBe(6);
  });

  it('파일이 없으면 기본값과 경고를 반환해야 함', () => {
    const filePath = path.join(tmpDir, 'missing.json');
    const result = loadFusionConfig(filePath);

    expect(result.source).toBe('default');
    expect(result.config).toEqual(DEFAULT_FUSION_CONFIG);
    expect(result.warnings).toEqual([`융합 설정 파일 없음: ${filePath}`]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('JSON 파싱 실패 시 기본값을 사용해야 함', () => {
    const filePath = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(filePath, '{ not json');

    const result = loadFusionConfig(filePath);

    expect(result.source).toBe('default');
    expect(result.config).toEqual(DEFAULT_FUSION_CONFIG);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith(`융합 설정 파일 파싱 실패 (${filePath})`)).toBe(true);
  });

  it('검증 실패 시 기본값을 사용해야 함', () => {
    const filePath = path.join(tmpDir, 'invalid.json');
    fs.writeFileSync(filePath, JSON.stringify({ fusion_time_gate_ms: -10 }));

    const result = loadFusionConfig(filePath);

    expect(result.source).toBe('default');
    expect(result.config.fusionTimeGateMs).toBe(350);
    expect(result.warnings[0].startsWith(`융합 설정 검증 실패 (${filePath})`)).toBe(true);
  });

  it('부분 설정 파일은 기본값 위에 병합되어야 함', () => {
    const filePath = path.join(tmpDir, 'partial.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({ fusion_time_gate_ms: 500, position_fusion_weight: { RADAR: 0.5 } })
    );

    const result = loadFusionConfig(filePath);

    expect(result.source).toBe('file');
    expect(result.warnings).toEqual([]);
    expect(result.config.fusionTimeGateMs).toBe(500);
    expect(result.config.dtSeconds).toBe(1.0);
    expect(result.config.positionFusionWeight).toEqual({ GNSS: 1.0, EOIR: 0.8, RADAR: 0.5, BARO: 0.3 });
  });

  it('내보낸 설정 파일을 다시 읽으면 같은 설정이어야 함', () => {
    const filePath = path.join(tmpDir, 'full.json');
    const config = createFusionConfig({ staleTicks: 9, clarityWarningThreshold: 80 });
    fs.writeFileSync(filePath, JSON.stringify(toConfigFile(config)));

    expect(loadFusionConfig(filePath).config).toEqual(config);
  });

  it('저장소의 기본 설정 파일은 기본값과 같아야 함', () => {
    const filePath = path.resolve(__dirname, '../../../config/fusion_config.json');
    const result = loadFusionConfig(filePath);

    expect(result.source).toBe('file');
    expect(result.config).toEqual(DEFAULT_FUSION_CONFIG);
  });
});
