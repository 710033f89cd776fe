/**
 * 도메인 값 객체 - 진입점
 */

export * from './errors';
export * from './measurement';
export * from './estimate';
export * from './telemetry';
