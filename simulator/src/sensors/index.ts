/**
 * 센서 모듈 - 진입점
 */

export * from './sensorSimulator';
export { LINK_SENSOR_ID, simulateLink } from './linkSensor';
export { IMU_SENSOR_ID, simulateImu } from './imuSensor';
export { BARO_SENSOR_ID, simulateBaro } from './baroSensor';
export { GNSS_SENSOR_ID, simulateGnss } from './gnssSensor';
export { EOIR_SENSOR_ID, simulateEoir } from './eoirSensor';
export { RADAR_SENSOR_ID, RADAR_COVERAGE_PROBABILITY, simulateRadar } from './radar';
