export * from './clarityRisk';
export * from './alerts';
