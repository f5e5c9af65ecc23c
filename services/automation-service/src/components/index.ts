export * from './action-schema';
export * from './plan-validator';
export * from './interpreter';
export * from './engine';
export * from './confirmation-gate';
export * from './run-queue';
export * from './task-store';
export * from './task-manager';
