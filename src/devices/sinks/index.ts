export * from './ios-bridge.sink';
export * from './android-bridge.sink';
