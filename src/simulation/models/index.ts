export * from './simulation.model';
