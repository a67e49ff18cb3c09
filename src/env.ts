// Environment configuration
import * as dotenv from 'dotenv';

dotenv.config();

// Server
export const PORT = parseInt(process.env.PORT || '3001', 10);
export const NODE_ENV = process.env.NODE_ENV || 'development';

// Redis (publicación de snapshots de estado)
export const REDIS_HOST = process.env.REDIS_HOST || 'localhost';
export const REDIS_PORT = parseInt(process.env.REDIS_PORT || '6379', 10);
export const REDIS_DB = parseInt(process.env.REDIS_DB || '0', 10);
export const REDIS_PASSWORD = process.env.REDIS_PASSWORD;
export const REDIS_KEY_PREFIX = process.env.REDIS_KEY_PREFIX || 'gpsim:';
export const STATUS_SNAPSHOT_TTL = parseInt(
  process.env.STATUS_SNAPSHOT_TTL || String(60 * 60),
  10,
); // 1 hora por defecto

// Device bridge (transporte USB/WiFi/ADB, externo a este servicio)
export const DEVICE_BRIDGE_URL =
  process.env.DEVICE_BRIDGE_URL || 'http://localhost:8765';
export const DEVICE_BRIDGE_TIMEOUT_MS = parseInt(
  process.env.DEVICE_BRIDGE_TIMEOUT_MS || '5000',
  10,
);

// Rutas GPX almacenadas
export const ROUTES_DIR = process.env.ROUTES_DIR || 'uploads';

// Simulación
export const SIMULATION_TICK_MS = parseInt(
  process.env.SIMULATION_TICK_MS || '500',
  10,
);
export const DEVICE_PUSH_TIMEOUT_MS = parseInt(
  process.env.DEVICE_PUSH_TIMEOUT_MS || '1500',
  10,
);
export const JITTER_SIGMA_METERS = parseFloat(
  process.env.JITTER_SIGMA_METERS || '3',
); // desviación estándar en metros
export const MAX_CONSECUTIVE_TICK_FAILURES = parseInt(
  process.env.MAX_CONSECUTIVE_TICK_FAILURES || '3',
  10,
);
export const DEFAULT_SECONDS_PER_POINT = parseFloat(
  process.env.DEFAULT_SECONDS_PER_POINT || '1',
); // ritmo para rutas sin timestamps ni duración objetivo
