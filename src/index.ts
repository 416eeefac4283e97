// Main entry point for rbac-migrate
export * from './types';
export * from './config';
export * from './errors';
export * from './logging';
export * from './concurrency';
export * from './identity';
export * from './resolver';
export * from './reconciler';
export * from './collector';
export * from './interchange';
export * from './clients';
export * from './storage/export-store';
export * from './reporter';
export * from './migration-service';
