import { Injectable } from '@nestjs/common';
import { ValidationError } from '../../errors';
import { RandomSource } from '../models';

/**
 * Metros por grado de latitud (aprox. constante)
 */
export const METERS_PER_DEGREE_LAT = 111_320;

/**
 * Generador determinístico (mulberry32) para jitter reproducible
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Servicio de jitter: desplazamiento aleatorio acotado por coordenada emitida
 *
 * Genera dos offsets normales independientes (media 0, desviación sigma) en el
 * plano local este/norte y los convierte a grados según la escala local.
 */
@Injectable()
export class JitterService {
  /**
   * Aplica jitter a una coordenada
   *
   * @param sigmaMeters Desviación estándar en metros (0 = sin jitter)
   * @param random Fuente uniforme en [0, 1)
   * @returns [lat, lon] perturbados
   */
  apply(
    lat: number,
    lon: number,
    sigmaMeters: number,
    random: RandomSource,
  ): [number, number] {
    if (!Number.isFinite(sigmaMeters) || sigmaMeters < 0) {
      throw new ValidationError('jitterMeters must be >= 0', 'jitterMeters');
    }
    if (sigmaMeters === 0) {
      return [lat, lon];
    }

    const [east, north] = this.gaussianPair(random);

    const dLat = (north * sigmaMeters) / METERS_PER_DEGREE_LAT;
    const metersPerDegreeLon =
      METERS_PER_DEGREE_LAT * Math.cos((lat * Math.PI) / 180);
    // En los polos la longitud no tiene escala útil
    const dLon =
      Math.abs(metersPerDegreeLon) < 1e-6
        ? 0
        : (east * sigmaMeters) / metersPerDegreeLon;

    return [
      Math.min(90, Math.max(-90, lat + dLat)),
      this.normalizeLongitude(lon + dLon),
    ];
  }

  /**
   * Box-Muller: dos normales estándar independientes
   */
  private gaussianPair(random: RandomSource): [number, number] {
    // log(0) no está definido
    const u1 = Math.max(random(), Number.MIN_VALUE);
    const u2 = random();

    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;
    return [radius * Math.cos(theta), radius * Math.sin(theta)];
  }

  private normalizeLongitude(lon: number): number {
    if (lon > 180) return lon - 360;
    if (lon < -180) return lon + 360;
    return lon;
  }
}
