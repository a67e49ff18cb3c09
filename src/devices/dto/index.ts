export * from './bridge-device.dto';
