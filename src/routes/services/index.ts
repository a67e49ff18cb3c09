export * from './route-parser.service';
export * from './route-store.service';
