import { ValidationError } from '../../errors';
import { PacingMode } from '../../models';
import { createRoute } from '../../routes/route.model';
import { catchError, timedRoute, untimedRoute } from '../../testing/fakes';
import { IPacingConfig } from '../models';
import { PacingService } from './pacing.service';

describe('PacingService', () => {
  const pacing = new PacingService();

  describe('resolve', () => {
    it('plays timed routes natively at 1x by default', () => {
      expect(pacing.resolve(timedRoute(3, 10), {}, 1)).toEqual({
        mode: PacingMode.NATIVE,
        speedMultiplier: 1,
      });
    });

    it('keeps the requested speed multiplier for timed routes', () => {
      expect(pacing.resolve(timedRoute(3, 10), { speedMultiplier: 2 }, 1)).toEqual({
        mode: PacingMode.NATIVE,
        speedMultiplier: 2,
      });
    });

    it('turns a target duration on a timed route into a speed multiplier', () => {
      // 20 s de grabación reproducidos en 10 s
      expect(
        pacing.resolve(timedRoute(3, 10), { targetDurationSeconds: 10 }, 1),
      ).toEqual({ mode: PacingMode.NATIVE, speedMultiplier: 2 });
    });

    it('uses the target duration for untimed routes', () => {
      expect(
        pacing.resolve(untimedRoute(100), { targetDurationSeconds: 60 }, 1),
      ).toEqual({ mode: PacingMode.TARGET_DURATION, targetDurationSeconds: 60 });
    });

    it('derives a duration for untimed routes without a target', () => {
      expect(pacing.resolve(untimedRoute(100), {}, 1)).toEqual({
        mode: PacingMode.TARGET_DURATION,
        targetDurationSeconds: 100,
      });
      expect(pacing.resolve(untimedRoute(100), { speedMultiplier: 2 }, 1)).toEqual({
        mode: PacingMode.TARGET_DURATION,
        targetDurationSeconds: 50,
      });
    });

    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
      'rejects speed multiplier %p',
      (speedMultiplier) => {
        expect(() =>
          pacing.resolve(timedRoute(3, 10), { speedMultiplier }, 1),
        ).toThrow(ValidationError);
      },
    );

    it.each([0, -30])('rejects target duration %p', (targetDurationSeconds) => {
      const error = catchError(() =>
        pacing.resolve(untimedRoute(10), { targetDurationSeconds }, 1),
      );
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        field: 'targetDuration',
        message: 'target duration must be greater than 0',
      });
    });
  });

  describe('computePosition in native mode', () => {
    const route = timedRoute(3, 10);
    const config: IPacingConfig = { mode: PacingMode.NATIVE, speedMultiplier: 2 };

    it('starts on the first point', () => {
      expect(pacing.computePosition(route, config, 0, 0)).toEqual({
        index: 0,
        fraction: 0,
        complete: false,
      });
    });

    it('reports the fraction towards the next point', () => {
      expect(pacing.computePosition(route, config, 0, 2500)).toEqual({
        index: 0,
        fraction: 0.5,
        complete: false,
      });
    });

    it('reaches the last point at 10 s with speed 2 and not before', () => {
      expect(pacing.computePosition(route, config, 0, 9999).index).toBe(1);

      const end = pacing.computePosition(route, config, 0, 10000);
      expect(end.index).toBe(2);
      expect(end.complete).toBe(true);
    });

    it('never moves backwards as time advances', () => {
      let previous = 0;
      for (let elapsed = 0; elapsed <= 12000; elapsed += 250) {
        const { index } = pacing.computePosition(route, config, 0, elapsed);
        expect(index).toBeGreaterThanOrEqual(previous);
        previous = index;
      }
      expect(previous).toBe(2);
    });

    it('counts from the anchor index', () => {
      expect(pacing.computePosition(route, config, 1, 0).index).toBe(1);
      expect(pacing.computePosition(route, config, 1, 5000)).toEqual({
        index: 2,
        fraction: 0,
        complete: true,
      });
    });

    it('shortens recording gaps longer than five minutes to 5 s', () => {
      const start = Date.UTC(2024, 4, 1, 8, 0, 0);
      const gapped = createRoute([
        { lat: 0, lon: 0, timestamp: start },
        { lat: 0, lon: 0.001, timestamp: start + 600_000 },
        { lat: 0, lon: 0.002, timestamp: start + 610_000 },
      ]);
      const native: IPacingConfig = { mode: PacingMode.NATIVE, speedMultiplier: 1 };

      expect(pacing.computePosition(gapped, native, 0, 4999).index).toBe(0);
      expect(pacing.computePosition(gapped, native, 0, 5000).index).toBe(1);
      expect(pacing.computePosition(gapped, native, 0, 14999).index).toBe(1);
      expect(pacing.computePosition(gapped, native, 0, 15000).complete).toBe(true);
    });

    it('treats timestamps that go backwards as zero-length segments', () => {
      const start = Date.UTC(2024, 4, 1, 8, 0, 0);
      const unordered = createRoute([
        { lat: 0, lon: 0, timestamp: start },
        { lat: 0, lon: 0.001, timestamp: start + 20_000 },
        { lat: 0, lon: 0.002, timestamp: start + 10_000 },
        { lat: 0, lon: 0.003, timestamp: start + 30_000 },
      ]);
      const native: IPacingConfig = { mode: PacingMode.NATIVE, speedMultiplier: 1 };

      expect(pacing.computePosition(unordered, native, 0, 20000).index).toBe(2);
    });

    it('refuses native pacing on an untimed route', () => {
      expect(() =>
        pacing.computePosition(untimedRoute(5), config, 0, 1000),
      ).toThrow(ValidationError);
    });
  });

  describe('computePosition in target duration mode', () => {
    const route = untimedRoute(100);
    const config: IPacingConfig = {
      mode: PacingMode.TARGET_DURATION,
      targetDurationSeconds: 60,
    };

    it('is halfway through 100 points after 30 of 60 s', () => {
      expect(pacing.computePosition(route, config, 0, 30000)).toEqual({
        index: 50,
        fraction: 0,
        complete: false,
      });
    });

    it('reaches the last point no later than the target duration', () => {
      expect(pacing.computePosition(route, config, 0, 59500)).toEqual({
        index: 99,
        fraction: 0,
        complete: true,
      });
      expect(pacing.computePosition(route, config, 0, 120000).index).toBe(99);
    });

    it('advances from the anchor index after a resume', () => {
      expect(pacing.computePosition(route, config, 10, 1500).index).toBe(12);
    });
  });
});
