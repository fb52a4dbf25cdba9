export * from './registry';
export * from './graph';
export * from './executor';
export * from './workflow-service';
