export * from './ringBuffer';
export * from './engineState';
