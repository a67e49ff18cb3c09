export * from './device-sink.interface';
export * from './simulation-status.interface';
