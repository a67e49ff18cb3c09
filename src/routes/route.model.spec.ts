import { EmptyRouteError } from '../errors';
import { createRoute, haversineDistance, summarizeRoute } from './route.model';

describe('route model', () => {
  describe('haversineDistance', () => {
    it('is 0 for the same point', () => {
      expect(haversineDistance(41.39, 2.17, 41.39, 2.17)).toBe(0);
    });

    it('measures one degree of longitude on the equator', () => {
      expect(haversineDistance(0, 0, 0, 1)).toBeCloseTo(111319.49, 1);
    });

    it('is symmetric', () => {
      expect(haversineDistance(40.4168, -3.7038, 41.3874, 2.1686)).toBeCloseTo(
        haversineDistance(41.3874, 2.1686, 40.4168, -3.7038),
        6,
      );
    });
  });

  describe('createRoute', () => {
    const t0 = Date.UTC(2024, 4, 1, 10, 0, 0);

    it('computes distance and duration for timed routes', () => {
      const route = createRoute(
        [
          { lat: 0, lon: 0, timestamp: t0 },
          { lat: 0, lon: 0.5, timestamp: t0 + 30_000 },
          { lat: 0, lon: 1, timestamp: t0 + 90_000 },
        ],
        { name: 'ecuador' },
      );

      expect(route.name).toBe('ecuador');
      expect(route.pointCount).toBe(3);
      expect(route.totalDistance).toBeCloseTo(111319.49, 1);
      expect(route.totalDuration).toBe(90);
      expect(route.timed).toBe(true);
    });

    it('treats a route as untimed when any point lacks a timestamp', () => {
      const route = createRoute([
        { lat: 0, lon: 0, timestamp: t0 },
        { lat: 0, lon: 0.001 },
        { lat: 0, lon: 0.002, timestamp: t0 + 20_000 },
      ]);

      expect(route.totalDuration).toBe(0);
      expect(route.timed).toBe(false);
    });

    it('treats identical timestamps as untimed', () => {
      const route = createRoute([
        { lat: 0, lon: 0, timestamp: t0 },
        { lat: 0, lon: 0.001, timestamp: t0 },
      ]);

      expect(route.totalDuration).toBe(0);
      expect(route.timed).toBe(false);
    });

    it('accepts a single point', () => {
      const route = createRoute([{ lat: 10, lon: 20, elevation: 5 }]);

      expect(route.pointCount).toBe(1);
      expect(route.totalDistance).toBe(0);
      expect(route.totalDuration).toBe(0);
    });

    it('rejects an empty route', () => {
      expect(() => createRoute([], { source: 'vacia.gpx' })).toThrow(EmptyRouteError);
      expect(() => createRoute([], { source: 'vacia.gpx' })).toThrow(
        "Failed to parse GPX file 'vacia.gpx': file contains no track points",
      );
    });

    it('freezes the waypoints', () => {
      const input = [{ lat: 1, lon: 2 }];
      const route = createRoute(input);
      input[0].lat = 50;

      expect(route.waypoints[0].lat).toBe(1);
      expect(Object.isFrozen(route.waypoints)).toBe(true);
      expect(Object.isFrozen(route.waypoints[0])).toBe(true);
    });
  });

  it('summarizes a route without its points', () => {
    const route = createRoute([{ lat: 0, lon: 0 }, { lat: 0, lon: 0 }], { name: 'x' });

    expect(summarizeRoute(route)).toEqual({
      name: 'x',
      pointCount: 2,
      totalDistance: 0,
      totalDuration: 0,
      timed: false,
    });
  });
});
