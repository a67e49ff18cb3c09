import { ValidationError } from '../../errors';
import {
  createSeededRandom,
  JitterService,
  METERS_PER_DEGREE_LAT,
} from './jitter.service';

function stats(values: number[]): { mean: number; std: number } {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

describe('JitterService', () => {
  const jitter = new JitterService();

  it('returns the coordinate untouched when sigma is 0', () => {
    const random = jest.fn(() => 0.3);
    expect(jitter.apply(40.4168, -3.7038, 0, random)).toEqual([40.4168, -3.7038]);
    expect(random).not.toHaveBeenCalled();
  });

  it.each([-1, Number.NaN])('rejects sigma %p', (sigma) => {
    expect(() => jitter.apply(0, 0, sigma, Math.random)).toThrow(ValidationError);
  });

  it('produces offsets with mean 0 and the requested deviation', () => {
    const random = createSeededRandom(42);
    const lat = 40;
    const lon = -3;
    const sigma = 5;
    const metersPerDegreeLon = METERS_PER_DEGREE_LAT * Math.cos((lat * Math.PI) / 180);

    const north: number[] = [];
    const east: number[] = [];
    for (let i = 0; i < 20000; i++) {
      const [jLat, jLon] = jitter.apply(lat, lon, sigma, random);
      north.push((jLat - lat) * METERS_PER_DEGREE_LAT);
      east.push((jLon - lon) * metersPerDegreeLon);
    }

    for (const axis of [stats(north), stats(east)]) {
      expect(Math.abs(axis.mean)).toBeLessThan(0.25);
      expect(axis.std).toBeGreaterThan(sigma * 0.95);
      expect(axis.std).toBeLessThan(sigma * 1.05);
    }
  });

  it('is reproducible with the same seed', () => {
    const first = createSeededRandom(7);
    const second = createSeededRandom(7);

    for (let i = 0; i < 5; i++) {
      expect(jitter.apply(10, 20, 3, first)).toEqual(jitter.apply(10, 20, 3, second));
    }
  });

  it('keeps the seeded source within [0, 1)', () => {
    const random = createSeededRandom(1);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('wraps longitude across the antimeridian', () => {
    // u1 = u2 = 0.5 → desplazamiento de ~11.8 m hacia el oeste
    const [lat, lon] = jitter.apply(0, -179.99999, 10, () => 0.5);

    expect(lat).toBeCloseTo(0, 10);
    expect(lon).toBeCloseTo(179.9999042, 6);
  });

  it('does not move longitude at the poles', () => {
    const [lat, lon] = jitter.apply(90, 12, 10, () => 0.25);

    expect(lat).toBeLessThanOrEqual(90);
    expect(lon).toBe(12);
  });
});
