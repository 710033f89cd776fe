/**
 * WebSocket 서버
 *
 * 대시보드 ↔ 시뮬레이터 양방향 통신
 * - 텔레메트리 / 감사 / 경보 이벤트 브로드캐스트
 * - 제어 명령, 시나리오 선택, 히스토리 조회, 감사 검증
 */

import WebSocket, { WebSocketServer } from 'ws';
import { IncomingMessage } from 'http';
import {
  DashboardToSimulatorCommand,
  InitialStateMessage,
  ScenarioSelectCommand,
  ScenarioSelection,
  SimulationControlCommand,
  SimulatorResponse,
  SimulatorToDashboardEvent,
} from '../../../shared/schemas';
import { SimulationEngine, SimulationEngineOptions } from '../simulation';
import { FUSION_STRATEGY_NAMES } from '../core/fusion';
import { listPresetNames } from '../core/scenario/presets';
import { getConfig, SimulatorConfig } from '../config';
import { validateAuth, validateMessage, getClientId } from './security';
import {
  ErrorCode,
  sendError,
  handleWebSocketError,
  setupHeartbeat,
  ErrorLogger,
} from './errorHandler';

/** 동시 연결 최대 수 */
const MAX_CLIENTS = 100;

export class SimulatorWebSocketServer {
  private wss: WebSocketServer;
  private simulation: SimulationEngine;
  private clients: Map<WebSocket, string> = new Map(); // WebSocket -> clientId
  private config: SimulatorConfig;
  private errorLogger: ErrorLogger;
  private heartbeats: Map<WebSocket, { cleanup: () => void }> = new Map();

  constructor(port?: number, simulationOptions: SimulationEngineOptions = {}) {
    this.config = getConfig();
    const serverPort = port ?? this.config.port;

    this.errorLogger = ErrorLogger.getInstance();

    // 시뮬레이션 엔진 초기화
    this.simulation = new SimulationEngine((event) => {
      this.broadcast(event);
    }, simulationOptions);

    // WebSocket 서버 생성 (연결 검증 포함)
    this.wss = new WebSocketServer({
      port: serverPort,
      verifyClient: (info, callback) => {
        this.verifyClient(info, callback);
      },
    });

    this.wss.on('connection', (ws, request) => {
      this.handleConnection(ws, request);
    });

    this.wss.on('error', (error) => {
      console.error('[Simulator] WebSocket 서버 에러:', error);
    });

    console.log(`[Simulator] WebSocket 서버 시작: ws://localhost:${serverPort}`);

    if (this.config.authEnabled) {
      console.log('[Simulator] 인증 활성화됨');
    }
  }

  /**
   * 클라이언트 연결 검증
   */
  private verifyClient(
    info: { origin: string; secure: boolean; req: IncomingMessage },
    callback: (result: boolean, code?: number, message?: string) => void
  ): void {
    const clientId = getClientId(info.req);

    // 인증 검증
    const authValidation = validateAuth(info.req, this.config);
    if (!authValidation.valid) {
      const errorCode = authValidation.reason?.includes('필요')
        ? ErrorCode.AUTH_REQUIRED
        : ErrorCode.AUTH_INVALID;
      this.errorLogger.log(errorCode, clientId, authValidation.reason);
      callback(false, 401, authValidation.reason);
      return;
    }

    // 동시 연결 수 제한
    if (this.clients.size >= MAX_CLIENTS) {
      this.errorLogger.log(ErrorCode.TOO_MANY_CONNECTIONS, clientId);
      callback(false, 429, 'Too Many Connections');
      return;
    }

    callback(true);
  }

  /**
   * 새 연결 처리
   */
  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const clientId = getClientId(request);
    console.log(`[Simulator] 클라이언트 연결: ${clientId}`);

    this.clients.set(ws, clientId);

    // 하트비트 설정
    const heartbeat = setupHeartbeat(ws, clientId);
    this.heartbeats.set(ws, heartbeat);

    // 현재 상태 전송
    this.send(ws, this.createInitialState());

    ws.on('message', (data) => {
      const validation = validateMessage(data.toString());
      if (!validation.valid) {
        const code =
          validation.kind === 'too_large'
            ? ErrorCode.MESSAGE_TOO_LARGE
            : validation.kind === 'unknown_command'
              ? ErrorCode.INVALID_COMMAND
              : ErrorCode.INVALID_MESSAGE;
        sendError(ws, code, { reason: validation.reason });
        this.errorLogger.log(code, clientId, validation.reason);
        return;
      }

      try {
        this.handleCommand(validation.command, ws, clientId);
      } catch (error) {
        if (error instanceof RangeError) {
          sendError(ws, ErrorCode.COMMAND_FAILED, { reason: error.message });
          this.errorLogger.log(ErrorCode.COMMAND_FAILED, clientId, error.message);
        } else {
          handleWebSocketError(
            error instanceof Error ? error : new Error(String(error)),
            ws,
            clientId
          );
        }
      }
    });

    ws.on('close', (code) => {
      console.log(`[Simulator] 클라이언트 연결 해제: ${clientId} (${code})`);
      this.cleanupClient(ws);
    });

    ws.on('error', (error) => {
      console.error(`[Simulator] WebSocket 오류 (${clientId}):`, error.message);
      handleWebSocketError(error, ws, clientId);
      this.cleanupClient(ws);
    });
  }

  /**
   * 클라이언트 정리
   */
  private cleanupClient(ws: WebSocket): void {
    this.clients.delete(ws);

    // 하트비트 정리
    const heartbeat = this.heartbeats.get(ws);
    if (heartbeat) {
      heartbeat.cleanup();
      this.heartbeats.delete(ws);
    }
  }

  private createInitialState(): InitialStateMessage {
    return {
      type: 'initial_state',
      status: this.simulation.getStatus(),
      presets: { ...listPresetNames(), fusion_strategies: [...FUSION_STRATEGY_NAMES] },
      latest: this.simulation.getState().history.last(),
    };
  }

  /**
   * 대시보드로부터 받은 명령 처리
   */
  private handleCommand(command: DashboardToSimulatorCommand, ws: WebSocket, clientId: string): void {
    console.log(`[Simulator] 명령 수신 (${clientId}):`, command.type);

    switch (command.type) {
      case 'simulation_control':
        this.handleSimulationControl(command);
        break;

      case 'scenario_select':
        this.handleScenarioSelect(command);
        break;

      case 'get_history':
        this.send(ws, { type: 'history', telemetry: this.simulation.getHistory(command.limit) });
        break;

      case 'get_audit_chain':
        this.send(ws, { type: 'audit_chain', records: this.simulation.getAuditChain(command.limit) });
        break;

      case 'verify_audit': {
        const result = this.simulation.verifyAuditChain();
        this.send(ws, {
          type: 'audit_verification',
          verified: result.verified,
          invalid_ticks: result.invalidTicks,
        });
        break;
      }
    }
  }

  /**
   * 시뮬레이션 제어 명령
   */
  private handleSimulationControl(command: SimulationControlCommand): void {
    switch (command.action) {
      case 'start':
        this.simulation.start();
        console.log('[Simulator] 시뮬레이션 시작');
        break;

      case 'pause':
        this.simulation.pause();
        console.log('[Simulator] 시뮬레이션 일시정지');
        break;

      case 'step':
        this.simulation.stepOnce();
        break;

      case 'reset':
        this.simulation.reset(command.seed);
        console.log('[Simulator] 시뮬레이션 리셋');
        break;

      case 'set_speed':
        if (command.speed_multiplier !== undefined) {
          this.simulation.setSpeedMultiplier(command.speed_multiplier);
          console.log(`[Simulator] 속도 변경: x${command.speed_multiplier}`);
        }
        break;
    }
  }

  /**
   * 시나리오 선택 명령
   */
  private handleScenarioSelect(command: ScenarioSelectCommand): void {
    const selection: Partial<ScenarioSelection> = {};
    if (command.area !== undefined) selection.areaName = command.area;
    if (command.environment !== undefined) selection.environmentName = command.environment;
    if (command.envelope !== undefined) selection.envelopeName = command.envelope;
    if (command.threshold !== undefined) selection.thresholdName = command.threshold;
    if (command.fusion_strategy !== undefined) selection.fusionStrategyName = command.fusion_strategy;

    this.simulation.setScenario(selection);
    console.log('[Simulator] 시나리오 변경:', JSON.stringify(selection));
  }

  private send(ws: WebSocket, message: SimulatorResponse): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  /**
   * 모든 클라이언트에 이벤트 브로드캐스트
   */
  private broadcast(event: SimulatorToDashboardEvent): void {
    const message = JSON.stringify(event);
    this.clients.forEach((clientId, client) => {
      if (client.readyState === WebSocket.OPEN) {
        try {
          client.send(message);
        } catch (error) {
          console.error(`[Simulator] 브로드캐스트 실패 (${clientId}):`, error);
        }
      }
    });
  }

  /**
   * 서버 종료
   */
  close(): void {
    console.log('[Simulator] 서버 종료 중...');

    // 시뮬레이션 정지 + 로그 마무리
    this.simulation.shutdown();

    // 모든 클라이언트 연결 정리
    this.clients.forEach((_clientId, client) => {
      this.cleanupClient(client);
      if (client.readyState === WebSocket.OPEN) {
        client.close(1000, 'Server shutting down');
      }
    });

    this.wss.close();

    console.log('[Simulator] 서버 종료 완료');
  }
}
