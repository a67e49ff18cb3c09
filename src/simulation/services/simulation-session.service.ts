import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  describeError,
  DeviceTimeoutError,
  NoDevicesAvailableError,
  SimulationAlreadyRunningError,
  SimulationNotRunningError,
  ValidationError,
} from '../../errors';
import {
  DEVICE_REGISTRY,
  IDeviceRegistry,
  IDeviceSink,
  IDeviceStatus,
  ISimulationSnapshot,
  IStatusPublisher,
  STATUS_PUBLISHER,
} from '../../interfaces';
import { IRoute, PacingMode, SimulationState } from '../../models';
import { summarizeRoute } from '../../routes/route.model';
import {
  IPacingConfig,
  ISimulationOptions,
  IStartSimulationRequest,
  IStartSimulationResult,
  RandomSource,
  SIMULATION_OPTIONS,
} from '../models';
import { createSeededRandom, JitterService } from './jitter.service';
import { PacingService } from './pacing.service';

/**
 * Dispositivo objetivo de la sesión actual
 */
interface IDeviceTarget {
  id: string;
  sink: IDeviceSink;
  status: IDeviceStatus;
  failing: boolean; // el último envío falló; se reintenta en el próximo tick
}

/**
 * Reproducción en curso (existe entre start y reset)
 */
interface IActiveRun {
  route: IRoute;
  pacing: IPacingConfig;
  loop: boolean;
  jitterMeters: number;
  random: RandomSource;
  devices: IDeviceTarget[];

  // Ancla del ritmo: índice y momento del último start/resume/vuelta
  anchorIndex: number;
  anchorTime: number;

  currentIndex: number;
  lastEmittedIndex: number | null;
  currentLat: number | null;
  currentLon: number | null;
  loops: number;
  startedAt: Date;
}

/**
 * Sesión de simulación: máquina de estados IDLE / RUNNING / PAUSED y loop de
 * ritmo que reparte cada coordenada a todos los dispositivos en paralelo.
 *
 * Exclusión mutua: las operaciones de control son síncronas y el loop solo
 * cede el event loop mientras espera a los dispositivos. Cada operación de
 * control incrementa `epoch`; un tick que vuelve de sus envíos con un epoch
 * distinto no avanza el índice.
 *
 * Los errores de dispositivos y las fallas internas del loop nunca salen como
 * excepción: quedan en el snapshot.
 */
@Injectable()
export class SimulationSessionService implements OnModuleDestroy {
  private readonly logger = new Logger(SimulationSessionService.name);

  private state = SimulationState.IDLE;
  private run: IActiveRun | null = null;
  private timer: NodeJS.Timeout | null = null;
  private tickInFlight = false;
  private epoch = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private current: ISimulationSnapshot;

  constructor(
    @Inject(DEVICE_REGISTRY) private readonly registry: IDeviceRegistry,
    @Inject(STATUS_PUBLISHER) private readonly publisher: IStatusPublisher,
    private readonly pacing: PacingService,
    private readonly jitter: JitterService,
    @Inject(SIMULATION_OPTIONS) private readonly options: ISimulationOptions,
  ) {
    this.current = this.buildSnapshot();
  }

  onModuleDestroy() {
    this.stopTimer();
    this.epoch++;
  }

  /**
   * Inicia la reproducción de una ruta en los dispositivos indicados
   *
   * Los ids que no están en el registro se omiten. Sin estado modificado si
   * falla cualquier validación.
   *
   * @throws SimulationAlreadyRunningError si hay una sesión RUNNING o PAUSED
   * @throws ValidationError si velocidad, duración o jitter no son válidos
   * @throws NoDevicesAvailableError si no queda ningún dispositivo
   */
  start(
    route: IRoute,
    deviceIds: string[],
    request: IStartSimulationRequest = {},
  ): IStartSimulationResult {
    if (this.state !== SimulationState.IDLE) {
      this.logger.warn('Simulation is already running.');
      throw new SimulationAlreadyRunningError();
    }

    const pacing = this.pacing.resolve(
      route,
      request,
      this.options.defaultSecondsPerPoint,
    );

    const jitterMeters = request.jitterMeters ?? this.options.defaultJitterMeters;
    if (!Number.isFinite(jitterMeters) || jitterMeters < 0) {
      throw new ValidationError('jitterMeters must be >= 0', 'jitterMeters');
    }

    const devices: IDeviceTarget[] = [];
    const skippedDevices: string[] = [];
    for (const deviceId of new Set(deviceIds)) {
      const device = this.registry.get(deviceId);
      if (!device) {
        this.logger.warn(`Device ${deviceId} not found in registry, skipping`);
        skippedDevices.push(deviceId);
        continue;
      }
      devices.push({
        id: deviceId,
        sink: device.sink,
        status: {
          pushCount: 0,
          errorCount: 0,
          lastError: null,
          lastErrorAt: null,
          lastSuccessAt: null,
        },
        failing: false,
      });
    }

    if (devices.length === 0) {
      this.logger.error('No valid devices available for simulation.');
      throw new NoDevicesAvailableError();
    }

    const now = Date.now();
    this.run = {
      route,
      pacing,
      loop: request.loop ?? false,
      jitterMeters,
      random:
        request.seed !== undefined
          ? createSeededRandom(request.seed)
          : this.options.random,
      devices,
      anchorIndex: 0,
      anchorTime: now,
      currentIndex: 0,
      lastEmittedIndex: null,
      currentLat: null,
      currentLon: null,
      loops: 0,
      startedAt: new Date(now),
    };
    this.state = SimulationState.RUNNING;
    this.epoch++;
    this.consecutiveFailures = 0;
    this.lastError = null;

    this.logger.log(
      `Simulation started for ${devices.length} devices: ${route.pointCount} points, ` +
        `${this.describePacing(pacing)}, loop=${this.run.loop}`,
    );

    this.refreshSnapshot();
    this.startTimer();
    // Primer punto sin esperar al primer intervalo
    this.runTick();

    return {
      deviceCount: devices.length,
      deviceIds: devices.map((device) => device.id),
      skippedDevices,
      pacing,
    };
  }

  /**
   * Detiene el avance conservando el índice actual
   *
   * @throws SimulationNotRunningError si no está RUNNING
   */
  pause(): void {
    if (this.state !== SimulationState.RUNNING) {
      throw new SimulationNotRunningError();
    }

    this.state = SimulationState.PAUSED;
    this.epoch++;
    this.logger.log(`Simulation paused at point ${this.run?.currentIndex ?? 0}`);
    this.refreshSnapshot();
  }

  /**
   * Alias de pause()
   */
  stop(): void {
    this.pause();
  }

  /**
   * Reanuda desde el índice actual, re-anclando el reloj de ritmo a ahora
   *
   * @throws SimulationAlreadyRunningError si ya está RUNNING
   * @throws SimulationNotRunningError si no hay sesión pausada
   */
  resume(): void {
    if (this.state === SimulationState.RUNNING) {
      throw new SimulationAlreadyRunningError();
    }
    const run = this.run;
    if (this.state !== SimulationState.PAUSED || !run) {
      throw new SimulationNotRunningError();
    }

    run.anchorIndex = run.currentIndex;
    run.anchorTime = Date.now();
    this.state = SimulationState.RUNNING;
    this.epoch++;
    this.logger.log(`Simulation resumed at point ${run.currentIndex}`);
    this.refreshSnapshot();
  }

  /**
   * Vuelve a IDLE con índice 0 desde cualquier estado y libera los
   * dispositivos (restaura su ubicación real en segundo plano)
   */
  reset(): void {
    const run = this.run;

    this.stopTimer();
    this.run = null;
    this.state = SimulationState.IDLE;
    this.epoch++;
    this.consecutiveFailures = 0;
    this.lastError = null;

    if (run) {
      this.logger.log(`Resetting locations for ${run.devices.length} devices...`);
      this.releaseDevices(run.devices).catch((error) => {
        this.logger.error('Error releasing devices', describeError(error).stack);
      });
    }

    this.logger.log('Simulation reset complete.');
    this.refreshSnapshot();
  }

  /**
   * Último snapshot publicado (objeto inmutable, no bloquea al loop)
   */
  snapshot(): ISimulationSnapshot {
    return this.current;
  }

  getState(): SimulationState {
    return this.state;
  }

  private startTimer(): void {
    this.stopTimer();
    this.timer = setInterval(() => this.runTick(), this.options.tickIntervalMs);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private runTick(): void {
    this.tick().catch((error) => {
      this.logger.error('Unhandled error in simulation tick', describeError(error).stack);
    });
  }

  private async tick(): Promise<void> {
    const run = this.run;
    // En pausa no hay llamadas a dispositivos
    if (!run || this.state !== SimulationState.RUNNING) {
      return;
    }

    if (this.tickInFlight) {
      this.logger.debug('Previous tick still waiting for devices, skipping');
      return;
    }

    this.tickInFlight = true;
    const epoch = this.epoch;
    try {
      await this.advance(run, epoch);
      if (this.run === run) {
        this.consecutiveFailures = 0;
      }
    } catch (error) {
      this.handleTickFailure(run, error);
    } finally {
      this.tickInFlight = false;
    }
  }

  private async advance(run: IActiveRun, epoch: number): Promise<void> {
    const now = Date.now();
    const last = run.route.pointCount - 1;
    const position = this.pacing.computePosition(
      run.route,
      run.pacing,
      run.anchorIndex,
      now - run.anchorTime,
    );

    let target = position.index;
    let wrapped = false;
    if (position.complete && run.loop && run.lastEmittedIndex === last) {
      target = 0;
      wrapped = true;
    }

    if (target === run.lastEmittedIndex && !wrapped) {
      if (position.complete && !run.loop) {
        this.complete(run);
        return;
      }
      await this.retryFailing(run);
      return;
    }

    const waypoint = run.route.waypoints[target];
    const [lat, lon] = this.jitter.apply(
      waypoint.lat,
      waypoint.lon,
      run.jitterMeters,
      run.random,
    );

    const results = await this.fanOut(run.devices, lat, lon);

    if (this.run !== run) {
      return;
    }
    this.recordResults(run.devices, results);

    if (this.epoch !== epoch) {
      this.logger.debug(`Control operation during tick, point ${target} not committed`);
      this.refreshSnapshot();
      return;
    }

    run.currentIndex = target;
    run.lastEmittedIndex = target;
    run.currentLat = lat;
    run.currentLon = lon;

    if (wrapped) {
      run.anchorIndex = 0;
      run.anchorTime = now;
      run.loops++;
      this.logger.log(`Route finished, looping (lap ${run.loops + 1})`);
    }

    if (position.complete && !run.loop) {
      this.complete(run);
      return;
    }

    this.refreshSnapshot();
  }

  /**
   * Reenvía la última coordenada a los dispositivos cuyo envío anterior falló
   */
  private async retryFailing(run: IActiveRun): Promise<void> {
    const failing = run.devices.filter((device) => device.failing);
    if (failing.length === 0 || run.currentLat === null || run.currentLon === null) {
      return;
    }

    const results = await this.fanOut(failing, run.currentLat, run.currentLon);
    if (this.run !== run) {
      return;
    }
    this.recordResults(failing, results);
    this.refreshSnapshot();
  }

  /**
   * Envía la coordenada a todos los dispositivos en paralelo; cada envío está
   * acotado por devicePushTimeoutMs y ninguno afecta a los demás
   */
  private fanOut(
    devices: IDeviceTarget[],
    lat: number,
    lon: number,
  ): Promise<PromiseSettledResult<void>[]> {
    return Promise.allSettled(
      devices.map((device) =>
        this.callSink(device.id, () => device.sink.push(device.id, lat, lon)),
      ),
    );
  }

  private callSink(deviceId: string, call: () => Promise<void>): Promise<void> {
    let pending: Promise<void>;
    try {
      pending = call();
    } catch (error) {
      return Promise.reject(error);
    }

    const timeoutMs = this.options.devicePushTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new DeviceTimeoutError(deviceId, timeoutMs)),
        timeoutMs,
      );
      pending.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }

  private recordResults(
    devices: IDeviceTarget[],
    results: PromiseSettledResult<void>[],
  ): void {
    const at = new Date().toISOString();

    results.forEach((result, i) => {
      const device = devices[i];

      if (result.status === 'fulfilled') {
        device.status.pushCount++;
        device.status.lastSuccessAt = at;
        if (device.failing) {
          this.logger.log(`Device ${device.id} recovered`);
          device.failing = false;
        }
        return;
      }

      const { message } = describeError(result.reason);
      device.status.errorCount++;
      device.status.lastError = message;
      device.status.lastErrorAt = at;

      if (!device.failing) {
        this.logger.warn(`Device ${device.id} push failed: ${message}`);
        device.failing = true;
      } else {
        this.logger.debug(
          `Device ${device.id} still failing (${device.status.errorCount} errors): ${message}`,
        );
      }
    });
  }

  private complete(run: IActiveRun): void {
    this.state = SimulationState.IDLE;
    this.epoch++;
    this.stopTimer();
    this.logger.log(
      `Simulation finished at point ${run.currentIndex + 1}/${run.route.pointCount}`,
    );
    this.refreshSnapshot();
  }

  private handleTickFailure(run: IActiveRun, error: unknown): void {
    if (this.run !== run) {
      return;
    }

    this.consecutiveFailures++;
    const { message, stack } = describeError(error);
    const max = this.options.maxConsecutiveTickFailures;
    this.logger.error(
      `Simulation tick failed (${this.consecutiveFailures}/${max}): ${message}`,
      stack,
    );

    if (this.consecutiveFailures >= max) {
      this.lastError = message;
      this.state = SimulationState.IDLE;
      this.epoch++;
      this.stopTimer();
      this.logger.error(
        `Simulation stopped after ${this.consecutiveFailures} consecutive tick failures`,
      );
      this.refreshSnapshot();
    }
  }

  private async releaseDevices(devices: IDeviceTarget[]): Promise<void> {
    const results = await Promise.allSettled(
      devices.map((device) =>
        this.callSink(device.id, () => device.sink.clear(device.id)),
      ),
    );

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error(
          `Error resetting device ${devices[i].id}: ${describeError(result.reason).message}`,
        );
      }
    });
  }

  private refreshSnapshot(): void {
    this.current = this.buildSnapshot();
    this.publisher.publish(this.current).catch((error) => {
      this.logger.error('Error publishing status snapshot', describeError(error).stack);
    });
  }

  private buildSnapshot(): ISimulationSnapshot {
    const run = this.run;
    const devices: Record<string, IDeviceStatus> = {};
    for (const device of run?.devices ?? []) {
      devices[device.id] = { ...device.status };
    }

    const totalPoints = run?.route.pointCount ?? 0;
    const currentIndex = run?.currentIndex ?? 0;
    let progress = 0;
    if (totalPoints > 1) {
      progress = currentIndex / (totalPoints - 1);
    } else if (run?.lastEmittedIndex === 0) {
      progress = 1;
    }

    return Object.freeze({
      state: this.state,
      running: this.state === SimulationState.RUNNING,
      currentIndex,
      totalPoints,
      progress,
      loop: run?.loop ?? false,
      loops: run?.loops ?? 0,
      currentLat: run?.currentLat ?? null,
      currentLon: run?.currentLon ?? null,
      pacing: run ? { ...run.pacing } : null,
      route: run ? summarizeRoute(run.route) : null,
      devices,
      error: this.lastError,
      startedAt: run ? run.startedAt.toISOString() : null,
      updatedAt: new Date().toISOString(),
    });
  }

  private describePacing(pacing: IPacingConfig): string {
    if (pacing.mode === PacingMode.NATIVE) {
      return `native pacing x${pacing.speedMultiplier.toFixed(2)}`;
    }
    return `target duration ${pacing.targetDurationSeconds.toFixed(1)}s`;
  }
}
