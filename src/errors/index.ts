export * from './simulator.errors';
export * from './http-exception.mapper';
