export * from './auditChain';
