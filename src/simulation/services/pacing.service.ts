import { Injectable } from '@nestjs/common';
import { ValidationError } from '../../errors';
import { IRoute, PacingMode } from '../../models';
import {
  CLAMPED_SEGMENT_SECONDS,
  IPacingConfig,
  IPacingPosition,
  IPacingRequest,
  MAX_SEGMENT_SECONDS,
} from '../models';

function isPositiveNumber(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Controlador de ritmo: traduce tiempo transcurrido a posición en la ruta
 *
 * No guarda estado; la sesión le pasa el ancla (índice y momento del último
 * inicio/resume) en cada tick.
 */
@Injectable()
export class PacingService {
  /**
   * Elige y valida el modo de ritmo para una ruta
   *
   * - Ruta con timestamps → NATIVE. Si se pide una duración objetivo, el
   *   multiplicador pasa a ser duración original / duración objetivo.
   * - Ruta sin timestamps → TARGET_DURATION, con la duración pedida o
   *   pointCount * defaultSecondsPerPoint / speedMultiplier.
   *
   * @throws ValidationError si la velocidad o la duración no son > 0
   */
  resolve(
    route: IRoute,
    request: IPacingRequest,
    defaultSecondsPerPoint: number,
  ): IPacingConfig {
    const { speedMultiplier, targetDurationSeconds } = request;

    if (speedMultiplier !== undefined && !isPositiveNumber(speedMultiplier)) {
      throw new ValidationError('speed multiplier must be greater than 0', 'speed');
    }
    if (
      targetDurationSeconds !== undefined &&
      !isPositiveNumber(targetDurationSeconds)
    ) {
      throw new ValidationError(
        'target duration must be greater than 0',
        'targetDuration',
      );
    }

    if (route.timed) {
      if (targetDurationSeconds !== undefined) {
        return {
          mode: PacingMode.NATIVE,
          speedMultiplier: route.totalDuration / targetDurationSeconds,
        };
      }
      return { mode: PacingMode.NATIVE, speedMultiplier: speedMultiplier ?? 1 };
    }

    if (targetDurationSeconds !== undefined) {
      return { mode: PacingMode.TARGET_DURATION, targetDurationSeconds };
    }

    if (!isPositiveNumber(defaultSecondsPerPoint)) {
      throw new ValidationError(
        'default seconds per point must be greater than 0',
        'targetDuration',
      );
    }

    return {
      mode: PacingMode.TARGET_DURATION,
      targetDurationSeconds:
        (route.pointCount * defaultSecondsPerPoint) / (speedMultiplier ?? 1),
    };
  }

  /**
   * Calcula la posición actual
   *
   * @param anchorIndex Índice al momento del último inicio/resume
   * @param elapsedMs Tiempo de reloj desde ese momento
   */
  computePosition(
    route: IRoute,
    config: IPacingConfig,
    anchorIndex: number,
    elapsedMs: number,
  ): IPacingPosition {
    const last = route.pointCount - 1;
    const anchor = Math.min(Math.max(0, anchorIndex), last);
    const elapsed = Math.max(0, elapsedMs) / 1000;

    if (config.mode === PacingMode.NATIVE) {
      return this.nativePosition(route, config.speedMultiplier, anchor, elapsed);
    }
    return this.targetDurationPosition(
      route,
      config.targetDurationSeconds,
      anchor,
      elapsed,
    );
  }

  /**
   * Avanza desde el ancla acumulando (t[i+1] - t[i]) / velocidad hasta
   * superar el tiempo transcurrido
   */
  private nativePosition(
    route: IRoute,
    speedMultiplier: number,
    anchor: number,
    elapsed: number,
  ): IPacingPosition {
    if (!isPositiveNumber(speedMultiplier)) {
      throw new ValidationError('speed multiplier must be greater than 0', 'speed');
    }
    if (!route.timed) {
      throw new ValidationError('native pacing requires a route with timestamps');
    }

    const last = route.pointCount - 1;
    let accumulated = 0;

    for (let i = anchor; i < last; i++) {
      const segment = this.segmentSeconds(route, i, speedMultiplier);
      if (accumulated + segment > elapsed) {
        return {
          index: i,
          fraction: (elapsed - accumulated) / segment,
          complete: false,
        };
      }
      accumulated += segment;
    }

    return { index: last, fraction: 0, complete: true };
  }

  /**
   * index = ancla + floor(pointCount * elapsed / duración), acotado a
   * [ancla, último]
   */
  private targetDurationPosition(
    route: IRoute,
    targetDurationSeconds: number,
    anchor: number,
    elapsed: number,
  ): IPacingPosition {
    if (!isPositiveNumber(targetDurationSeconds)) {
      throw new ValidationError(
        'target duration must be greater than 0',
        'targetDuration',
      );
    }

    const last = route.pointCount - 1;
    const position = (route.pointCount * elapsed) / targetDurationSeconds;
    const steps = Math.floor(position);
    const index = Math.min(last, anchor + steps);
    const complete = index >= last;

    return {
      index,
      fraction: complete ? 0 : position - steps,
      complete,
    };
  }

  /**
   * Duración escalada del segmento i → i+1, en segundos
   */
  private segmentSeconds(route: IRoute, i: number, speedMultiplier: number): number {
    const from = route.waypoints[i].timestamp ?? 0;
    const to = route.waypoints[i + 1].timestamp ?? from;

    // Timestamps fuera de orden no retroceden el reloj
    const scaled = Math.max(0, (to - from) / 1000) / speedMultiplier;

    return scaled > MAX_SEGMENT_SECONDS ? CLAMPED_SEGMENT_SECONDS : scaled;
  }
}
