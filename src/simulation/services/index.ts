export * from './jitter.service';
export * from './pacing.service';
export * from './status-publisher.service';
export * from './simulation-session.service';
