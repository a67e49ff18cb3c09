export * from './start-simulation.dto';
