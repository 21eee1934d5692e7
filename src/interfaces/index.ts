export * from './tool.interface';
export * from './mapping.interface';
export * from './query.interface';
export * from './context.interface';
export * from './config.interface';
export * from './agent.interface';
