/**
 * 센서 융합 모듈 - 진입점
 */

export * from './types';
export * from './weightedFusion';
export * from './fusionEngine';
export { KalmanFusion } from './kalmanFusion';
