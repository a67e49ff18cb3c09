export * from './route.interface';
export * from './simulation-state.model';
