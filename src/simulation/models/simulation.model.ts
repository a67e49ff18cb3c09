import { PacingMode } from '../../models';
import {
  DEFAULT_SECONDS_PER_POINT,
  DEVICE_PUSH_TIMEOUT_MS,
  JITTER_SIGMA_METERS,
  MAX_CONSECUTIVE_TICK_FAILURES,
  SIMULATION_TICK_MS,
} from '../../env';

/**
 * Fuente de números uniformes en [0, 1)
 */
export type RandomSource = () => number;

/**
 * Configuración de ritmo ya validada
 */
export type IPacingConfig =
  | { mode: PacingMode.NATIVE; speedMultiplier: number }
  | { mode: PacingMode.TARGET_DURATION; targetDurationSeconds: number };

/**
 * Parámetros de ritmo tal como llegan del operador (sin validar)
 */
export interface IPacingRequest {
  speedMultiplier?: number;
  targetDurationSeconds?: number;
}

/**
 * Posición calculada por el controlador de ritmo
 */
export interface IPacingPosition {
  index: number; // último punto alcanzado
  fraction: number; // avance hacia index + 1, en [0, 1)
  complete: boolean; // true si index es el último punto
}

/**
 * Parámetros de inicio de una sesión
 */
export interface IStartSimulationRequest extends IPacingRequest {
  loop?: boolean;
  jitterMeters?: number; // desviación estándar del jitter
  seed?: number; // jitter reproducible
}

export interface IStartSimulationResult {
  deviceCount: number;
  deviceIds: string[];
  skippedDevices: string[]; // ids no encontrados en el registro
  pacing: IPacingConfig;
}

/**
 * Opciones del loop de simulación
 */
export interface ISimulationOptions {
  // Cadencia del loop de ritmo (ms)
  tickIntervalMs: number;

  // Tiempo máximo de espera por envío a un dispositivo (ms)
  devicePushTimeoutMs: number;

  // Desviación estándar del jitter por defecto (metros)
  defaultJitterMeters: number;

  // Fallas internas consecutivas antes de degradar la sesión a IDLE
  maxConsecutiveTickFailures: number;

  // Ritmo para rutas sin timestamps ni duración objetivo (segundos por punto)
  defaultSecondsPerPoint: number;

  // Fuente aleatoria cuando el inicio no trae seed
  random: RandomSource;
}

/**
 * Opciones por defecto (desde el entorno)
 */
export const DEFAULT_SIMULATION_OPTIONS: ISimulationOptions = {
  tickIntervalMs: SIMULATION_TICK_MS,
  devicePushTimeoutMs: DEVICE_PUSH_TIMEOUT_MS,
  defaultJitterMeters: JITTER_SIGMA_METERS,
  maxConsecutiveTickFailures: MAX_CONSECUTIVE_TICK_FAILURES,
  defaultSecondsPerPoint: DEFAULT_SECONDS_PER_POINT,
  random: Math.random,
};

/**
 * Token de inyección de ISimulationOptions
 */
export const SIMULATION_OPTIONS = 'SIMULATION_OPTIONS';

/**
 * Segmentos con timestamps muy separados (pausas en la grabación) se acortan
 */
export const MAX_SEGMENT_SECONDS = 300;
export const CLAMPED_SEGMENT_SECONDS = 5;
