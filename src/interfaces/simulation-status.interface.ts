import { IRouteSummary, PacingMode, SimulationState } from '../models';

/**
 * Snapshot de estado de la sesión de simulación
 *
 * Canal: Redis PubSub 'simulation:status'
 * Consumers: UI de control, dashboards
 */

export interface IDeviceStatus {
  pushCount: number; // envíos exitosos
  errorCount: number; // envíos fallidos (incluye timeouts)
  lastError: string | null;
  lastErrorAt: string | null; // ISO 8601
  lastSuccessAt: string | null; // ISO 8601
}

export interface IPacingSummary {
  mode: PacingMode;
  speedMultiplier?: number;
  targetDurationSeconds?: number;
}

export interface ISimulationSnapshot {
  state: SimulationState;
  running: boolean;
  currentIndex: number;
  totalPoints: number;
  progress: number; // 0..1
  loop: boolean;
  loops: number; // vueltas completadas en modo loop
  currentLat: number | null; // coordenada enviada (con jitter)
  currentLon: number | null;
  pacing: IPacingSummary | null;
  route: IRouteSummary | null;
  devices: Record<string, IDeviceStatus>;
  error: string | null; // falla interna que degradó la sesión a IDLE
  startedAt: string | null; // ISO 8601
  updatedAt: string; // ISO 8601
}

/**
 * Destino de los snapshots (Redis PubSub en producción)
 */
export interface IStatusPublisher {
  publish(snapshot: ISimulationSnapshot): Promise<void>;
}

/**
 * Token de inyección del publicador de estado
 */
export const STATUS_PUBLISHER = 'STATUS_PUBLISHER';
